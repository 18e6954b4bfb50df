import { Module } from '@nestjs/common';
import { StepName } from '@media-pipeline/shared';
import { ExecutorRegistry } from './executor-registry';
import { FFmpegThumbnailExecutor } from './ffmpeg/thumbnail.executor';
import { FFmpegWatermarkExecutor } from './ffmpeg/watermark.executor';
import { FFmpegTranscode720pExecutor } from './ffmpeg/transcode-720p.executor';
import { FFmpegHls720pExecutor } from './ffmpeg/hls-720p.executor';

@Module({
  providers: [
    FFmpegThumbnailExecutor,
    FFmpegWatermarkExecutor,
    FFmpegTranscode720pExecutor,
    FFmpegHls720pExecutor,
    {
      provide: ExecutorRegistry,
      useFactory: (
        thumbnail: FFmpegThumbnailExecutor,
        watermark: FFmpegWatermarkExecutor,
        transcode: FFmpegTranscode720pExecutor,
        hls: FFmpegHls720pExecutor
      ) =>
        new ExecutorRegistry({
          [StepName.THUMBNAIL]: thumbnail,
          [StepName.WATERMARK]: watermark,
          [StepName.TRANSCODE_720P]: transcode,
          [StepName.HLS_720P]: hls,
        }),
      inject: [
        FFmpegThumbnailExecutor,
        FFmpegWatermarkExecutor,
        FFmpegTranscode720pExecutor,
        FFmpegHls720pExecutor,
      ],
    },
  ],
  exports: [ExecutorRegistry],
})
export class ExecutorsModule {}
