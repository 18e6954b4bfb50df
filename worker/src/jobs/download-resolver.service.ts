import { Injectable } from '@nestjs/common';
import {
  OutputNotFoundError,
  OutputRole,
  StepName,
  type Job,
  type JobView,
  type OutputView,
} from '@media-pipeline/shared';
import * as path from 'path';
import { StorageService } from '../shared/services/storage.service';

const ABSOLUTE_URI = /^[a-z][a-z0-9+.-]*:/i;
const URI_ATTRIBUTE = /URI="([^"]+)"/g;

/**
 * Builds the external view of a job. Every URL is signed on demand and
 * never stored, so each call returns fresh links.
 */
@Injectable()
export class DownloadResolverService {
  constructor(private readonly storage: StorageService) {}

  async resolve(job: Job): Promise<JobView> {
    const outputs: OutputView[] = [];
    for (const output of job.outputs) {
      outputs.push({
        type: output.type,
        s3_key: output.s3_key,
        url: await this.storage.getUrl(output.s3_key),
      });
    }

    return {
      id: job.id,
      status: job.status,
      progress: job.progress,
      outputs,
      error: job.error,
      pipeline: job.pipeline,
      created_at: job.created_at,
      updated_at: job.updated_at,
      input_url: await this.storage.getUrl(job.input_key),
    };
  }

  /**
   * The HLS playlist at `outputIndex` with every segment (and any URI
   * attribute such as EXT-X-MAP) replaced by a freshly signed URL.
   *
   * @throws OutputNotFoundError when the index is not a playlist output
   */
  async signHlsManifest(job: Job, outputIndex: number): Promise<string> {
    const output = job.outputs[outputIndex];
    if (
      !output ||
      output.type !== StepName.HLS_720P ||
      output.role !== OutputRole.PRIMARY
    ) {
      throw new OutputNotFoundError(job.id, outputIndex);
    }

    const playlist = await this.storage.readText(output.s3_key);
    const baseDir = path.posix.dirname(output.s3_key);

    const lines: string[] = [];
    for (const line of playlist.split('\n')) {
      lines.push(await this.signLine(line, baseDir));
    }
    return lines.join('\n');
  }

  private async signLine(line: string, baseDir: string): Promise<string> {
    const trimmed = line.trim();
    if (trimmed === '') {
      return line;
    }

    if (!trimmed.startsWith('#')) {
      return this.signReference(trimmed, baseDir);
    }

    let signed = trimmed;
    for (const match of trimmed.matchAll(URI_ATTRIBUTE)) {
      const url = await this.signReference(match[1], baseDir);
      signed = signed.replace(match[0], `URI="${url}"`);
    }
    return signed;
  }

  private async signReference(reference: string, baseDir: string): Promise<string> {
    if (ABSOLUTE_URI.test(reference)) {
      return reference;
    }
    return this.storage.getUrl(path.posix.normalize(path.posix.join(baseDir, reference)));
  }
}
