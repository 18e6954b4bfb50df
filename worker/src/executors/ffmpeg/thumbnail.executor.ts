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

const THUMBNAIL_PARAMS = {
  maxSize: 512,
  seekSeconds: 1,
};

/**
 * FFmpeg implementation of the thumbnail step
 * Images are scaled down; videos are sampled one second in
 */
@Injectable()
export class FFmpegThumbnailExecutor extends BaseFFmpegExecutor {
  readonly name = StepName.THUMBNAIL;
  readonly params = THUMBNAIL_PARAMS;
  protected readonly inputKinds = [MediaKind.IMAGE, MediaKind.VIDEO];

  constructor(
    storage: StorageService,
    private readonly ffmpegService: FFmpegService
  ) {
    super(storage);
  }

  protected planOutputs(prefix: string): OutputPlan {
    return {
      primary: {
        key: `${prefix}.jpg`,
        localName: 'thumbnail.jpg',
        contentType: 'image/jpeg',
      },
      auxiliary: [],
    };
  }

  protected async render({ inputPath, workDir, kind, plan, signal }: RenderInput) {
    await this.ffmpegService.generateThumbnail(
      inputPath,
      path.join(workDir, plan.primary.localName),
      THUMBNAIL_PARAMS.maxSize,
      kind === MediaKind.VIDEO ? THUMBNAIL_PARAMS.seekSeconds : null,
      signal
    );
  }
}
