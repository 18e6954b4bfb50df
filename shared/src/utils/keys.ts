import { createHash, randomUUID } from 'crypto';
import * as path from 'path';
import type { StepName } from '../enums';

export type StepParams = Record<string, string | number | boolean>;

/**
 * JSON with object keys sorted, so equal params always hash the same
 */
export function canonicalParams(params: StepParams): string {
  const sorted: StepParams = {};
  for (const key of Object.keys(params).sort()) {
    sorted[key] = params[key];
  }
  return JSON.stringify(sorted);
}

export function stepHash(
  inputKey: string,
  step: StepName,
  params: StepParams
): string {
  return createHash('sha256')
    .update(inputKey)
    .update('\0')
    .update(step)
    .update('\0')
    .update(canonicalParams(params))
    .digest('hex')
    .slice(0, 16);
}

/**
 * Base name of a key without its extension
 *
 * @example
 * keyStem('uploads/abc_clip.final.mp4') // 'abc_clip.final'
 */
export function keyStem(key: string): string {
  return path.posix.basename(key, path.posix.extname(key));
}

/**
 * Deterministic output prefix for a step: outputs/<input stem>/<step>-<hash>
 *
 * The same (inputKey, step, params) always maps to the same prefix, which is
 * what makes re-running a step after a crash safe.
 */
export function outputKeyPrefix(
  inputKey: string,
  step: StepName,
  params: StepParams
): string {
  return `outputs/${keyStem(inputKey)}/${step}-${stepHash(inputKey, step, params)}`;
}

/**
 * Key recommended for a direct upload: uploads/<uuid hex>_<basename>
 */
export function uploadKeyFor(
  filename: string,
  uuid: () => string = randomUUID
): string {
  const safeName = path.posix.basename(filename.replace(/\\/g, '/'));
  return `uploads/${uuid().replace(/-/g, '')}_${safeName}`;
}
