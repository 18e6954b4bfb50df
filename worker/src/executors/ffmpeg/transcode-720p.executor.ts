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

const TRANSCODE_PARAMS = {
  height: 720,
  crf: 23,
  preset: 'veryfast',
  audioBitrate: '128k',
};

/**
 * FFmpeg implementation of the 720p transcode step
 * Writes an H.264/AAC MP4 and a poster frame taken from it
 */
@Injectable()
export class FFmpegTranscode720pExecutor extends BaseFFmpegExecutor {
  readonly name = StepName.TRANSCODE_720P;
  readonly params = TRANSCODE_PARAMS;
  protected readonly inputKinds = [MediaKind.VIDEO];

  constructor(
    storage: StorageService,
    private readonly ffmpegService: FFmpegService
  ) {
    super(storage);
  }

  protected planOutputs(prefix: string): OutputPlan {
    return {
      primary: { key: `${prefix}.mp4`, localName: '720p.mp4', contentType: 'video/mp4' },
      auxiliary: [
        { key: `${prefix}.poster.jpg`, localName: 'poster.jpg', contentType: 'image/jpeg' },
      ],
    };
  }

  protected async render({ inputPath, workDir, plan, signal }: RenderInput) {
    const videoPath = path.join(workDir, plan.primary.localName);
    await this.ffmpegService.transcode(inputPath, videoPath, TRANSCODE_PARAMS, signal);

    for (const poster of plan.auxiliary) {
      await this.ffmpegService.extractPoster(
        videoPath,
        path.join(workDir, poster.localName),
        signal
      );
    }
  }
}
