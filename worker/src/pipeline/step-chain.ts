import {
  OutputRole,
  PermanentStepError,
  StepName,
  type Job,
} from '@media-pipeline/shared';

/**
 * Pairs whose second step consumes the first step's primary output.
 * Every other step reads the job's original input.
 */
export const COMPOSABLE_PAIRS: ReadonlyArray<readonly [StepName, StepName]> = [
  [StepName.TRANSCODE_720P, StepName.HLS_720P],
  [StepName.WATERMARK, StepName.THUMBNAIL],
  [StepName.WATERMARK, StepName.TRANSCODE_720P],
];

export function isComposable(previous: string, next: string): boolean {
  return COMPOSABLE_PAIRS.some(([from, to]) => from === previous && to === next);
}

/**
 * Object key step `index` reads
 */
export function resolveStepInput(
  job: Pick<Job, 'pipeline' | 'input_key' | 'outputs'>,
  index: number
): string {
  if (index === 0 || !isComposable(job.pipeline[index - 1], job.pipeline[index])) {
    return job.input_key;
  }

  const previous = job.outputs.find(
    (output) => output.step === index - 1 && output.role === OutputRole.PRIMARY
  );
  if (!previous) {
    throw new PermanentStepError(
      `Step ${index} depends on step ${index - 1}, which has no recorded output`
    );
  }
  return previous.s3_key;
}
