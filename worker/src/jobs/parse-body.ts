import { BadRequestException } from '@nestjs/common';
import type { z } from 'zod';

/**
 * Validate a request body against a zod schema
 *
 * @throws BadRequestException listing every issue
 */
export function parseBody<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown
): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new BadRequestException({
      error: 'Invalid request body',
      issues: result.error.issues.map(
        (issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`
      ),
    });
  }
  return result.data;
}
