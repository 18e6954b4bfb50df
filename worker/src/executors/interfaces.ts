/**
 * Executor interfaces for pipeline steps
 *
 * Executors are pure strategy implementations: they read one input object,
 * write deterministic output objects and never touch the job ledger.
 */

import type { StepName, StepParams } from '@media-pipeline/shared';

/**
 * One step of a job's pipeline, built immediately before the executor runs
 * and never persisted
 */
export interface PipelineStep {
  name: StepName;
  /** 0-based position in the pipeline */
  index: number;
  /** Object key the step reads */
  inputKey: string;
  params: StepParams;
}

export interface StepContext {
  jobId: string;
  /** Aborted on timeout; executors must stop their child processes */
  signal: AbortSignal;
}

/**
 * Keys written by a step. `primary` feeds the next step of a composable
 * pair; `auxiliary` objects are recorded but never chained.
 */
export interface StepArtifacts {
  primary: string;
  auxiliary: string[];
}

export interface IStepExecutor {
  readonly name: StepName;
  /** Fixed parameters, part of the deterministic output key */
  readonly params: StepParams;

  execute(step: PipelineStep, context: StepContext): Promise<StepArtifacts>;
}
