import { PermanentStepError, StepName, isStepName } from '@media-pipeline/shared';
import type { IStepExecutor } from './interfaces';

export type ExecutorMap = Record<StepName, IStepExecutor>;

/**
 * Closed mapping from step name to executor. Every allowed step must have
 * exactly one executor registered under its own name.
 */
export class ExecutorRegistry {
  constructor(private readonly executors: ExecutorMap) {
    for (const name of Object.values(StepName)) {
      if (executors[name].name !== name) {
        throw new Error(
          `Executor registered for ${name} reports name ${executors[name].name}`
        );
      }
    }
  }

  /**
   * @throws PermanentStepError for a name outside the allowed set
   */
  get(name: string): IStepExecutor {
    if (!isStepName(name)) {
      throw new PermanentStepError(`Unsupported step: ${name}`);
    }
    return this.executors[name];
  }
}
