import { StepName } from '@media-pipeline/shared';
import { ExecutorRegistry } from '../executors/executor-registry';
import type {
  IStepExecutor,
  PipelineStep,
  StepArtifacts,
  StepContext,
} from '../executors/interfaces';

/**
 * Executor that records its calls. By default it writes
 * outputs/stub/<index>-<name>; tests swap `behaviour` to fail or stall.
 */
export class StubExecutor implements IStepExecutor {
  readonly params = {};
  readonly calls: PipelineStep[] = [];
  behaviour: (step: PipelineStep, context: StepContext) => Promise<StepArtifacts> =
    async (step) => ({
      primary: `outputs/stub/${step.index}-${step.name}`,
      auxiliary: [],
    });

  constructor(readonly name: StepName) {}

  async execute(step: PipelineStep, context: StepContext): Promise<StepArtifacts> {
    this.calls.push(step);
    return this.behaviour(step, context);
  }
}

export function createStubExecutors() {
  const executors = {
    [StepName.THUMBNAIL]: new StubExecutor(StepName.THUMBNAIL),
    [StepName.WATERMARK]: new StubExecutor(StepName.WATERMARK),
    [StepName.TRANSCODE_720P]: new StubExecutor(StepName.TRANSCODE_720P),
    [StepName.HLS_720P]: new StubExecutor(StepName.HLS_720P),
  };
  return { executors, registry: new ExecutorRegistry(executors) };
}
