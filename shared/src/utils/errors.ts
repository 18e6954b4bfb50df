/**
 * Error taxonomy for the media pipeline.
 *
 * Every error carries a stable `code` so that callers can branch without
 * relying on `instanceof` across package boundaries.
 */

export type PipelineErrorCode =
  | 'PIPELINE_VALIDATION'
  | 'TRANSIENT_STEP'
  | 'PERMANENT_STEP'
  | 'LEASE_CONFLICT'
  | 'LEASE_LOST'
  | 'JOB_NOT_FOUND'
  | 'OUTPUT_NOT_FOUND';

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Unknown step name or empty pipeline. Raised at job creation, never at
 * execution time.
 */
export class PipelineValidationError extends PipelineError {
  readonly code = 'PIPELINE_VALIDATION';

  constructor(
    message: string,
    readonly invalidSteps: string[] = []
  ) {
    super(message);
  }
}

/**
 * Recoverable step failure (timeout, temporary storage error, killed process)
 */
export class TransientStepError extends PipelineError {
  readonly code = 'TRANSIENT_STEP';
}

/**
 * Unrecoverable step failure (corrupt input, decoder rejection)
 */
export class PermanentStepError extends PipelineError {
  readonly code = 'PERMANENT_STEP';
}

export class LeaseConflictError extends PipelineError {
  readonly code = 'LEASE_CONFLICT';

  constructor(readonly jobId: string) {
    super(`Job ${jobId} is leased by another worker`);
  }
}

/**
 * The lease expired or was taken over while this worker was still writing
 */
export class LeaseLostError extends PipelineError {
  readonly code = 'LEASE_LOST';

  constructor(
    readonly jobId: string,
    readonly holder: string
  ) {
    super(`Lease on job ${jobId} is no longer held by ${holder}`);
  }
}

export class JobNotFoundError extends PipelineError {
  readonly code = 'JOB_NOT_FOUND';

  constructor(readonly jobId: string) {
    super(`Job ${jobId} not found`);
  }
}

/**
 * No output at the requested index, or not one that can be served that way
 */
export class OutputNotFoundError extends PipelineError {
  readonly code = 'OUTPUT_NOT_FOUND';

  constructor(
    readonly jobId: string,
    readonly index: number
  ) {
    super(`Job ${jobId} has no playlist output at index ${index}`);
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Upper bound on the error text stored on a failed job */
export const MAX_ERROR_LENGTH = 4000;

export function truncateErrorMessage(message: string): string {
  return message.length > MAX_ERROR_LENGTH
    ? message.slice(0, MAX_ERROR_LENGTH)
    : message;
}
