import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';
import { FFmpegService } from '../shared/services/ffmpeg.service';

/**
 * FFmpegService that writes placeholder files instead of spawning ffmpeg.
 * HLS playlists get two segments beside them.
 */
export class FakeFFmpegService extends FFmpegService {
  readonly calls: string[][] = [];
  failWith: Error | null = null;

  constructor() {
    super(new ConfigService({ ffmpeg: { path: 'ffmpeg' } }));
  }

  async run(args: string[]): Promise<void> {
    this.calls.push(args);
    if (this.failWith) {
      throw this.failWith;
    }

    const outputPath = args[args.length - 1];
    if (outputPath.endsWith('.m3u8')) {
      const dir = path.dirname(outputPath);
      await fs.promises.writeFile(path.join(dir, 'seg_0000.ts'), 'segment-0');
      await fs.promises.writeFile(path.join(dir, 'seg_0001.ts'), 'segment-1');
      await fs.promises.writeFile(
        outputPath,
        '#EXTM3U\n#EXT-X-TARGETDURATION:4\n#EXTINF:4.0,\nseg_0000.ts\n#EXTINF:2.5,\nseg_0001.ts\n#EXT-X-ENDLIST\n'
      );
      return;
    }

    await fs.promises.writeFile(outputPath, `rendered:${path.basename(outputPath)}`);
  }
}
