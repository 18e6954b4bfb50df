import { describe, it, expect } from 'vitest';
import { OutputRole, PermanentStepError, StepName } from '@media-pipeline/shared';
import { isComposable, resolveStepInput } from '../step-chain';

describe('step chaining', () => {
  it.each([
    [StepName.TRANSCODE_720P, StepName.HLS_720P, true],
    [StepName.WATERMARK, StepName.THUMBNAIL, true],
    [StepName.WATERMARK, StepName.TRANSCODE_720P, true],
    [StepName.THUMBNAIL, StepName.WATERMARK, false],
    [StepName.HLS_720P, StepName.TRANSCODE_720P, false],
    [StepName.TRANSCODE_720P, StepName.THUMBNAIL, false],
  ])('%s -> %s composable: %s', (previous, next, expected) => {
    expect(isComposable(previous, next)).toBe(expected);
  });

  const job = {
    pipeline: [StepName.WATERMARK, StepName.TRANSCODE_720P, StepName.HLS_720P],
    input_key: 'uploads/a_clip.mp4',
    outputs: [
      { type: StepName.WATERMARK, s3_key: 'outputs/a_clip/wm.mp4', step: 0, role: OutputRole.PRIMARY },
      { type: StepName.TRANSCODE_720P, s3_key: 'outputs/wm/t.mp4', step: 1, role: OutputRole.PRIMARY },
      {
        type: StepName.TRANSCODE_720P,
        s3_key: 'outputs/wm/t.poster.jpg',
        step: 1,
        role: OutputRole.AUXILIARY,
      },
    ],
  };

  it('reads the original input for the first step', () => {
    expect(resolveStepInput(job, 0)).toBe('uploads/a_clip.mp4');
  });

  it('follows primary outputs through composable pairs', () => {
    expect(resolveStepInput(job, 1)).toBe('outputs/a_clip/wm.mp4');
    expect(resolveStepInput(job, 2)).toBe('outputs/wm/t.mp4');
  });

  it('falls back to the original input for other pairs', () => {
    const imageJob = {
      pipeline: [StepName.THUMBNAIL, StepName.WATERMARK],
      input_key: 'uploads/a_photo.jpg',
      outputs: [
        { type: StepName.THUMBNAIL, s3_key: 'outputs/a_photo/th.jpg', step: 0, role: OutputRole.PRIMARY },
      ],
    };
    expect(resolveStepInput(imageJob, 1)).toBe('uploads/a_photo.jpg');
  });

  it('fails permanently when a chained output is missing', () => {
    expect(() => resolveStepInput({ ...job, outputs: [] }, 1)).toThrow(PermanentStepError);
  });
});
