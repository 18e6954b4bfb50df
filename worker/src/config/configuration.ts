import { hostname } from 'os';
import { StepName } from '@media-pipeline/shared';

const int = (value: string | undefined, fallback: number): number =>
  value === undefined || value === '' ? fallback : parseInt(value, 10);

/**
 * Per-step timeout, STEP_TIMEOUT_<STEP>_MS, falling back to STEP_TIMEOUT_MS
 */
const stepTimeout = (step: StepName, fallback: number): number =>
  int(process.env[`STEP_TIMEOUT_${step.toUpperCase()}_MS`], fallback);

export default () => {
  const defaultStepTimeoutMs = int(process.env.STEP_TIMEOUT_MS, 15 * 60 * 1000);

  return {
    port: int(process.env.PORT, 3001),

    redis: {
      host: process.env.REDIS_HOST || 'localhost',
      port: int(process.env.REDIS_PORT, 6379),
      password: process.env.REDIS_PASSWORD,
    },

    ledger: {
      driver: process.env.LEDGER_DRIVER || 'redis',
    },

    storage: {
      endpoint: process.env.S3_ENDPOINT,
      publicEndpoint: process.env.S3_PUBLIC_ENDPOINT,
      region: process.env.S3_REGION || 'us-east-1',
      bucket: process.env.S3_BUCKET || 'media-local',
      accessKeyId: process.env.S3_ACCESS_KEY_ID,
      secretAccessKey: process.env.S3_SECRET_ACCESS_KEY,
      forcePathStyle: process.env.S3_FORCE_PATH_STYLE === 'true',
      presignExpirySeconds: int(process.env.S3_PRESIGN_EXPIRE_SECONDS, 900),
    },

    worker: {
      id: process.env.WORKER_ID || `${hostname()}-${process.pid}`,
      concurrency: int(process.env.WORKER_CONCURRENCY, 2),
      leaseTtlMs: int(process.env.LEASE_TTL_MS, 60000),
    },

    retry: {
      maxAttempts: int(process.env.STEP_MAX_ATTEMPTS, 3),
      baseDelayMs: int(process.env.STEP_BACKOFF_BASE_MS, 5000),
      maxDelayMs: int(process.env.STEP_BACKOFF_MAX_MS, 60000),
      jitterFactor: 0.1,
    },

    steps: {
      timeoutMs: {
        [StepName.THUMBNAIL]: stepTimeout(StepName.THUMBNAIL, defaultStepTimeoutMs),
        [StepName.WATERMARK]: stepTimeout(StepName.WATERMARK, defaultStepTimeoutMs),
        [StepName.TRANSCODE_720P]: stepTimeout(
          StepName.TRANSCODE_720P,
          defaultStepTimeoutMs
        ),
        [StepName.HLS_720P]: stepTimeout(StepName.HLS_720P, defaultStepTimeoutMs),
      },
    },

    recovery: {
      enabled: process.env.RECOVERY_ENABLED !== 'false',
      intervalMs: int(process.env.RECOVERY_INTERVAL_MS, 30000),
      staleMs: int(process.env.RECOVERY_STALE_MS, 120000),
    },

    ffmpeg: {
      path: process.env.FFMPEG_PATH || 'ffmpeg',
    },
  };
};
