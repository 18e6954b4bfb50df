import * as path from 'path';
import { MediaKind, StepName } from '../enums';
import { PipelineValidationError } from '../utils/errors';

export const ALLOWED_STEPS: readonly StepName[] = Object.values(StepName);

const STEP_NAMES = new Set<string>(ALLOWED_STEPS);

export function isStepName(value: string): value is StepName {
  return STEP_NAMES.has(value);
}

const EXTENSION_KINDS: Record<string, MediaKind> = {
  '.jpg': MediaKind.IMAGE,
  '.jpeg': MediaKind.IMAGE,
  '.png': MediaKind.IMAGE,
  '.gif': MediaKind.IMAGE,
  '.webp': MediaKind.IMAGE,
  '.bmp': MediaKind.IMAGE,
  '.tif': MediaKind.IMAGE,
  '.tiff': MediaKind.IMAGE,
  '.mp4': MediaKind.VIDEO,
  '.m4v': MediaKind.VIDEO,
  '.mov': MediaKind.VIDEO,
  '.mkv': MediaKind.VIDEO,
  '.webm': MediaKind.VIDEO,
  '.avi': MediaKind.VIDEO,
  '.mpeg': MediaKind.VIDEO,
  '.mpg': MediaKind.VIDEO,
  '.ts': MediaKind.VIDEO,
};

/**
 * Media kind guessed from the key's extension
 */
export function detectMediaKind(key: string): MediaKind {
  const ext = path.posix.extname(key).toLowerCase();
  return EXTENSION_KINDS[ext] ?? MediaKind.OTHER;
}

/**
 * Pipeline used when a job is created without one
 */
export function defaultPipelineFor(kind: MediaKind): StepName[] | null {
  switch (kind) {
    case MediaKind.IMAGE:
      return [StepName.THUMBNAIL];
    case MediaKind.VIDEO:
      return [StepName.TRANSCODE_720P];
    case MediaKind.OTHER:
      return null;
  }
}

/**
 * Validate requested step names and drop repeats, keeping the first
 * occurrence of each.
 *
 * @throws PipelineValidationError on an empty pipeline or unknown names
 */
export function validatePipeline(steps: readonly string[]): StepName[] {
  if (steps.length === 0) {
    throw new PipelineValidationError('Pipeline must contain at least one step');
  }

  const invalid = steps.filter((step) => !isStepName(step));
  if (invalid.length > 0) {
    throw new PipelineValidationError(
      `Unsupported steps: ${invalid.join(', ')}. Allowed: ${[...ALLOWED_STEPS].sort().join(', ')}`,
      invalid
    );
  }

  const seen = new Set<StepName>();
  const deduped: StepName[] = [];
  for (const step of steps) {
    if (isStepName(step) && !seen.has(step)) {
      seen.add(step);
      deduped.push(step);
    }
  }
  return deduped;
}

/**
 * Resolve the pipeline for a new job: explicit steps are validated, an
 * omitted pipeline falls back to the default for the input's media kind.
 */
export function resolvePipeline(
  inputKey: string,
  requested: readonly string[] | undefined
): StepName[] {
  if (requested !== undefined) {
    return validatePipeline(requested);
  }

  const fallback = defaultPipelineFor(detectMediaKind(inputKey));
  if (!fallback) {
    throw new PipelineValidationError(
      'Unsupported file type. Provide a valid pipeline.'
    );
  }
  return fallback;
}
