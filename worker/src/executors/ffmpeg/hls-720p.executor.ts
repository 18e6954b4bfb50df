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

const HLS_PARAMS = {
  height: 720,
  segmentSeconds: 4,
  crf: 23,
  preset: 'veryfast',
  audioBitrate: '128k',
};

export const HLS_PLAYLIST_NAME = 'index.m3u8';
export const HLS_SEGMENT_PATTERN = 'seg_%04d.ts';

/**
 * Packages a 720p HLS rendition. Segments are uploaded beside the playlist
 * under the same prefix but are not recorded as outputs.
 */
@Injectable()
export class FFmpegHls720pExecutor extends BaseFFmpegExecutor {
  readonly name = StepName.HLS_720P;
  readonly params = HLS_PARAMS;
  protected readonly inputKinds = [MediaKind.VIDEO];

  constructor(
    storage: StorageService,
    private readonly ffmpegService: FFmpegService
  ) {
    super(storage);
  }

  protected planOutputs(prefix: string): OutputPlan {
    return {
      primary: {
        key: `${prefix}/${HLS_PLAYLIST_NAME}`,
        localName: HLS_PLAYLIST_NAME,
        contentType: 'application/vnd.apple.mpegurl',
      },
      auxiliary: [],
    };
  }

  protected async render({ inputPath, workDir, plan, signal }: RenderInput) {
    await this.ffmpegService.packageHls(
      inputPath,
      path.join(workDir, plan.primary.localName),
      path.join(workDir, HLS_SEGMENT_PATTERN),
      HLS_PARAMS.segmentSeconds,
      HLS_PARAMS,
      signal
    );
  }

  protected async uploadAuxiliary(
    plan: OutputPlan,
    workDir: string,
    signal: AbortSignal
  ): Promise<void> {
    const segmentPrefix = path.posix.dirname(plan.primary.key);
    await this.storage.uploadDirectory(
      workDir,
      segmentPrefix,
      { '.ts': 'video/mp2t' },
      { skip: [plan.primary.localName], signal }
    );
  }
}
