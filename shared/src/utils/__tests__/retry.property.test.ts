/**
 * Property tests for step retry backoff
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { calculateBackoff, classifyFailure, type RetryConfig } from '../retry';
import { PermanentStepError, TransientStepError } from '../errors';

const config: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 10000,
  jitterFactor: 0,
};

describe('calculateBackoff', () => {
  it('doubles per attempt without jitter', () => {
    expect(calculateBackoff(1, config)).toBe(1000);
    expect(calculateBackoff(2, config)).toBe(2000);
    expect(calculateBackoff(3, config)).toBe(4000);
    expect(calculateBackoff(4, config)).toBe(8000);
  });

  it('caps at maxDelayMs', () => {
    expect(calculateBackoff(5, config)).toBe(10000);
    expect(calculateBackoff(30, config)).toBe(10000);
  });

  it('stays within the jitter band', () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 20 }),
        fc.double({ min: 0, max: 0.999, noNaN: true }),
        fc.double({ min: 0, max: 1, noNaN: true }),
        (attempt, random, jitterFactor) => {
          const jittered = { ...config, jitterFactor };
          const base = Math.min(
            config.baseDelayMs * Math.pow(2, attempt - 1),
            config.maxDelayMs
          );
          const delay = calculateBackoff(attempt, jittered, () => random);
          expect(delay).toBeGreaterThanOrEqual(
            Math.floor(base * (1 - jitterFactor))
          );
          expect(delay).toBeLessThanOrEqual(Math.ceil(base * (1 + jitterFactor)));
        }
      )
    );
  });
});

describe('classifyFailure', () => {
  it('only treats PermanentStepError as permanent', () => {
    expect(classifyFailure(new PermanentStepError('corrupt'))).toBe('permanent');
    expect(classifyFailure(new TransientStepError('timeout'))).toBe('transient');
    expect(classifyFailure(new Error('boom'))).toBe('transient');
    expect(classifyFailure('string failure')).toBe('transient');
  });
});
