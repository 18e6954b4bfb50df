import { describe, it, expect } from 'vitest';
import { PermanentStepError, StepName } from '@media-pipeline/shared';
import { ExecutorRegistry, type ExecutorMap } from '../executor-registry';
import type { IStepExecutor } from '../interfaces';

function stubExecutor(name: StepName): IStepExecutor {
  return {
    name,
    params: {},
    execute: async () => ({ primary: `outputs/${name}`, auxiliary: [] }),
  };
}

function allExecutors(): ExecutorMap {
  return {
    [StepName.THUMBNAIL]: stubExecutor(StepName.THUMBNAIL),
    [StepName.WATERMARK]: stubExecutor(StepName.WATERMARK),
    [StepName.TRANSCODE_720P]: stubExecutor(StepName.TRANSCODE_720P),
    [StepName.HLS_720P]: stubExecutor(StepName.HLS_720P),
  };
}

describe('ExecutorRegistry', () => {
  it('returns the executor registered for a step', () => {
    const executors = allExecutors();
    const registry = new ExecutorRegistry(executors);

    expect(registry.get('hls_720p')).toBe(executors[StepName.HLS_720P]);
  });

  it('fails permanently for names outside the allowed set', () => {
    const registry = new ExecutorRegistry(allExecutors());

    expect(() => registry.get('transcode_4k')).toThrow(
      new PermanentStepError('Unsupported step: transcode_4k')
    );
  });

  it('refuses an executor registered under another name', () => {
    const executors = allExecutors();
    executors[StepName.WATERMARK] = stubExecutor(StepName.THUMBNAIL);

    expect(() => new ExecutorRegistry(executors)).toThrow(
      'Executor registered for watermark reports name thumbnail'
    );
  });
});
