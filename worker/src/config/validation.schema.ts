import { z } from 'zod';
import { LedgerDriver } from '@media-pipeline/shared';

const positiveInt = z.coerce.number().int().positive();
const bool = z.enum(['true', 'false']);

/**
 * Environment accepted by the worker. Unknown variables pass through.
 */
export const envSchema = z
  .object({
    PORT: positiveInt.optional(),
    REDIS_HOST: z.string().optional(),
    REDIS_PORT: positiveInt.optional(),
    REDIS_PASSWORD: z.string().optional(),
    LEDGER_DRIVER: z.nativeEnum(LedgerDriver).optional(),
    S3_ENDPOINT: z.string().url().optional(),
    S3_PUBLIC_ENDPOINT: z.string().url().optional(),
    S3_REGION: z.string().optional(),
    S3_BUCKET: z.string().optional(),
    S3_ACCESS_KEY_ID: z.string().min(1),
    S3_SECRET_ACCESS_KEY: z.string().min(1),
    S3_FORCE_PATH_STYLE: bool.optional(),
    S3_PRESIGN_EXPIRE_SECONDS: positiveInt.optional(),
    WORKER_ID: z.string().optional(),
    WORKER_CONCURRENCY: positiveInt.optional(),
    LEASE_TTL_MS: z.coerce.number().int().min(1000).optional(),
    STEP_MAX_ATTEMPTS: positiveInt.optional(),
    STEP_BACKOFF_BASE_MS: z.coerce.number().int().min(0).optional(),
    STEP_BACKOFF_MAX_MS: z.coerce.number().int().min(0).optional(),
    STEP_TIMEOUT_MS: positiveInt.optional(),
    RECOVERY_ENABLED: bool.optional(),
    RECOVERY_INTERVAL_MS: positiveInt.optional(),
    RECOVERY_STALE_MS: positiveInt.optional(),
    FFMPEG_PATH: z.string().optional(),
  })
  .passthrough();

export type WorkerEnv = z.infer<typeof envSchema>;

/**
 * ConfigModule `validate` hook
 */
export function validateEnv(config: Record<string, unknown>): WorkerEnv {
  const result = envSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return result.data;
}
