import { PermanentStepError } from './errors';

/**
 * Retry configuration for step execution
 */
export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the delay added or removed at random, 0..1 */
  jitterFactor: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 5000,
  maxDelayMs: 60000,
  jitterFactor: 0.1,
};

export type FailureKind = 'transient' | 'permanent';

/**
 * Classify a step failure. Anything not explicitly permanent is retried;
 * exhausting the attempts turns it into a permanent failure.
 */
export function classifyFailure(error: unknown): FailureKind {
  return error instanceof PermanentStepError ? 'permanent' : 'transient';
}

/**
 * Exponential backoff delay before the retry that follows `attempt` (1-based).
 *
 * @param random - source of randomness in [0, 1), injectable for tests
 */
export function calculateBackoff(
  attempt: number,
  config: RetryConfig,
  random: () => number = Math.random
): number {
  const exponential = config.baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
  const capped = Math.min(exponential, config.maxDelayMs);
  const jitter = capped * config.jitterFactor * (random() * 2 - 1);
  return Math.max(0, Math.round(capped + jitter));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
