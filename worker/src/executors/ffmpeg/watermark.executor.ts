import { Injectable } from '@nestjs/common';
import { MediaKind, StepName } from '@media-pipeline/shared';
import * as path from 'path';
import { FFmpegService } from '../../shared/services/ffmpeg.service';
import { StorageService } from '../../shared/services/storage.service';
import {
  BaseFFmpegExecutor,
  type OutputPlan,
  type RenderInput,
} from './base-ffmpeg.executor';

const WATERMARK_PARAMS = {
  text: 'WATERMARK',
  opacity: 0.5,
};

/**
 * Burns a semi-transparent text mark into the bottom-right corner.
 * Images stay JPEG, videos stay MP4.
 */
@Injectable()
export class FFmpegWatermarkExecutor extends BaseFFmpegExecutor {
  readonly name = StepName.WATERMARK;
  readonly params = WATERMARK_PARAMS;
  protected readonly inputKinds = [MediaKind.IMAGE, MediaKind.VIDEO];

  constructor(
    storage: StorageService,
    private readonly ffmpegService: FFmpegService
  ) {
    super(storage);
  }

  protected planOutputs(prefix: string, kind: MediaKind): OutputPlan {
    const primary =
      kind === MediaKind.VIDEO
        ? { key: `${prefix}.mp4`, localName: 'watermarked.mp4', contentType: 'video/mp4' }
        : { key: `${prefix}.jpg`, localName: 'watermarked.jpg', contentType: 'image/jpeg' };

    return { primary, auxiliary: [] };
  }

  protected async render({ inputPath, workDir, kind, plan, signal }: RenderInput) {
    await this.ffmpegService.drawWatermark(
      inputPath,
      path.join(workDir, plan.primary.localName),
      WATERMARK_PARAMS.text,
      WATERMARK_PARAMS.opacity,
      kind === MediaKind.VIDEO,
      signal
    );
  }
}
