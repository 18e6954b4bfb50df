import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  PermanentStepError,
  TransientStepError,
  type PipelineError,
} from '@media-pipeline/shared';
import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

/** stderr fragments that mean the input itself cannot be decoded */
const PERMANENT_STDERR_PATTERNS = [
  /Invalid data found when processing input/i,
  /moov atom not found/i,
  /does not contain any stream/i,
  /Output file #0 does not contain any stream/i,
  /Invalid argument/i,
  /Decoder \(codec .+\) not found/i,
  /could not find codec parameters/i,
];

interface ExecFailure {
  code?: number | string | null;
  signal?: string | null;
  killed?: boolean;
  stderr?: string;
  name?: string;
  message: string;
}

function isExecFailure(error: unknown): error is Error & ExecFailure {
  return error instanceof Error;
}

/** Last few lines of stderr; ffmpeg prints the cause at the end */
function stderrTail(stderr: string | undefined, lines = 5): string {
  if (!stderr) return '';
  return stderr.trim().split('\n').slice(-lines).join('\n');
}

/**
 * Map an ffmpeg process failure to the pipeline's retry taxonomy
 */
export function classifyFFmpegFailure(error: unknown): PipelineError {
  if (!isExecFailure(error)) {
    return new TransientStepError(`ffmpeg failed: ${String(error)}`);
  }

  if (error.name === 'AbortError') {
    return new TransientStepError('ffmpeg was aborted', { cause: error });
  }
  if (error.killed || error.signal) {
    return new TransientStepError(
      `ffmpeg was killed by signal ${error.signal ?? 'unknown'}`,
      { cause: error }
    );
  }

  const tail = stderrTail(error.stderr);
  if (PERMANENT_STDERR_PATTERNS.some((pattern) => pattern.test(tail))) {
    return new PermanentStepError(`ffmpeg rejected input: ${tail}`, {
      cause: error,
    });
  }

  return new TransientStepError(
    `ffmpeg exited with code ${String(error.code)}: ${tail || error.message}`,
    { cause: error }
  );
}

export interface ScaleToHeightOptions {
  height: number;
  crf: number;
  preset: string;
  audioBitrate: string;
}

/**
 * Thin wrapper around the ffmpeg binary. Every call runs a single child
 * process that is killed when `signal` aborts.
 */
@Injectable()
export class FFmpegService {
  private readonly logger = new Logger(FFmpegService.name);
  private readonly binary: string;

  constructor(configService: ConfigService) {
    this.binary = configService.get<string>('ffmpeg.path', 'ffmpeg');
  }

  async run(args: string[], signal?: AbortSignal): Promise<void> {
    const fullArgs = ['-hide_banner', '-nostdin', '-y', ...args];
    this.logger.debug(`${this.binary} ${fullArgs.join(' ')}`);

    try {
      await execFileAsync(this.binary, fullArgs, {
        signal,
        maxBuffer: 32 * 1024 * 1024,
      });
    } catch (error) {
      throw classifyFFmpegFailure(error);
    }
  }

  /**
   * Single JPEG frame bounded to `maxSize` on its longest side. Videos are
   * sampled at `seekSeconds`; images ignore it.
   */
  async generateThumbnail(
    inputPath: string,
    outputPath: string,
    maxSize: number,
    seekSeconds: number | null,
    signal?: AbortSignal
  ): Promise<void> {
    const seek = seekSeconds === null ? [] : ['-ss', String(seekSeconds)];
    await this.run(
      [
        ...seek,
        '-i',
        inputPath,
        '-vf',
        `scale='min(${maxSize},iw)':'min(${maxSize},ih)':force_original_aspect_ratio=decrease`,
        '-frames:v',
        '1',
        '-q:v',
        '2',
        outputPath,
      ],
      signal
    );
  }

  /**
   * Representative frame of a video, used as a poster image
   */
  async extractPoster(
    inputPath: string,
    outputPath: string,
    signal?: AbortSignal
  ): Promise<void> {
    await this.run(
      ['-i', inputPath, '-vf', 'thumbnail', '-frames:v', '1', '-q:v', '2', outputPath],
      signal
    );
  }

  /**
   * Burn `text` into the bottom-right corner. Video keeps its audio stream.
   */
  async drawWatermark(
    inputPath: string,
    outputPath: string,
    text: string,
    opacity: number,
    isVideo: boolean,
    signal?: AbortSignal
  ): Promise<void> {
    const filter =
      `drawtext=text='${text}':fontcolor=white@${opacity}` +
      `:fontsize=h/20:x=w-tw-max(8\\,min(w\\,h)*0.02):y=h-th-max(8\\,min(w\\,h)*0.02)`;

    const codec = isVideo
      ? ['-c:v', 'libx264', '-preset', 'veryfast', '-crf', '23', '-c:a', 'copy']
      : ['-frames:v', '1', '-q:v', '2'];

    await this.run(['-i', inputPath, '-vf', filter, ...codec, outputPath], signal);
  }

  /**
   * H.264/AAC MP4 scaled to `height`, width kept even
   */
  async transcode(
    inputPath: string,
    outputPath: string,
    options: ScaleToHeightOptions,
    signal?: AbortSignal
  ): Promise<void> {
    await this.run(
      [
        '-i',
        inputPath,
        ...this.h264Args(options),
        '-movflags',
        '+faststart',
        outputPath,
      ],
      signal
    );
  }

  /**
   * VOD HLS rendition: `playlistPath` plus `seg_%04d.ts` segments beside it
   */
  async packageHls(
    inputPath: string,
    playlistPath: string,
    segmentPattern: string,
    segmentSeconds: number,
    options: ScaleToHeightOptions,
    signal?: AbortSignal
  ): Promise<void> {
    await this.run(
      [
        '-i',
        inputPath,
        ...this.h264Args(options),
        '-hls_time',
        String(segmentSeconds),
        '-hls_list_size',
        '0',
        '-hls_playlist_type',
        'vod',
        '-hls_segment_filename',
        segmentPattern,
        '-f',
        'hls',
        playlistPath,
      ],
      signal
    );
  }

  private h264Args(options: ScaleToHeightOptions): string[] {
    return [
      '-vf',
      `scale=-2:${options.height}`,
      '-c:v',
      'libx264',
      '-preset',
      options.preset,
      '-crf',
      String(options.crf),
      '-c:a',
      'aac',
      '-b:a',
      options.audioBitrate,
    ];
  }
}
