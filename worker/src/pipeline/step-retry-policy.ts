import { Logger } from '@nestjs/common';
import {
  PermanentStepError,
  TransientStepError,
  calculateBackoff,
  classifyFailure,
  sleep,
  toErrorMessage,
  type RetryConfig,
} from '@media-pipeline/shared';

export type AttemptFn<T> = (signal: AbortSignal) => Promise<T>;

/**
 * Runs one step with a per-attempt timeout and exponential backoff between
 * transient failures. Permanent failures are rethrown at once; exhausted
 * retries become permanent.
 *
 * When `parentSignal` aborts, the running attempt is aborted and the
 * signal's reason is thrown without further attempts.
 */
export class StepRetryPolicy {
  private readonly logger = new Logger(StepRetryPolicy.name);

  constructor(
    private readonly config: RetryConfig,
    private readonly sleepFn: (ms: number) => Promise<void> = sleep,
    private readonly random: () => number = Math.random
  ) {}

  async run<T>(
    label: string,
    timeoutMs: number,
    attemptFn: AttemptFn<T>,
    parentSignal?: AbortSignal
  ): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      this.throwIfAborted(parentSignal);

      try {
        return await this.runAttempt(label, timeoutMs, attemptFn, parentSignal);
      } catch (error) {
        this.throwIfAborted(parentSignal);

        if (classifyFailure(error) === 'permanent') {
          throw error;
        }

        lastError = error;
        if (attempt < this.config.maxAttempts) {
          const delay = calculateBackoff(attempt, this.config, this.random);
          this.logger.warn(
            `${label} attempt ${attempt}/${this.config.maxAttempts} failed, retrying in ${delay}ms: ${toErrorMessage(error)}`
          );
          await this.sleepFn(delay);
        }
      }
    }

    throw new PermanentStepError(
      `${label} failed after ${this.config.maxAttempts} attempts: ${toErrorMessage(lastError)}`,
      { cause: lastError }
    );
  }

  private async runAttempt<T>(
    label: string,
    timeoutMs: number,
    attemptFn: AttemptFn<T>,
    parentSignal?: AbortSignal
  ): Promise<T> {
    const controller = new AbortController();
    const onParentAbort = () => controller.abort(parentSignal?.reason);
    parentSignal?.addEventListener('abort', onParentAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new TransientStepError(`${label} timed out after ${timeoutMs}ms`);
        reject(error);
        controller.abort(error);
      }, timeoutMs);
    });

    try {
      return await Promise.race([attemptFn(controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
      parentSignal?.removeEventListener('abort', onParentAbort);
    }
  }

  private throwIfAborted(signal?: AbortSignal): void {
    if (!signal?.aborted) return;
    throw signal.reason instanceof Error
      ? signal.reason
      : new Error(String(signal.reason));
  }
}
