import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  JobNotFoundError,
  resolvePipeline,
  uploadKeyFor,
  type CreateJobInput,
  type Job,
  type JobView,
  type PresignUploadInput,
} from '@media-pipeline/shared';
import { randomUUID } from 'crypto';
import { JOB_LEDGER, type JobLedger } from '../ledger/job-ledger';
import { QueueService } from '../queue/queue.service';
import { StorageService } from '../shared/services/storage.service';
import { DownloadResolverService } from './download-resolver.service';

export interface CreatedJob {
  job_id: string;
}

export interface PresignedUploadView {
  key: string;
  url: string;
  headers: Record<string, string>;
  expires_at: string;
}

/**
 * Intake and read side of the job ledger
 */
@Injectable()
export class JobsService {
  private readonly logger = new Logger(JobsService.name);

  constructor(
    @Inject(JOB_LEDGER) private readonly ledger: JobLedger,
    private readonly queueService: QueueService,
    private readonly storage: StorageService,
    private readonly resolver: DownloadResolverService
  ) {}

  /**
   * Record a PENDING job and announce it. If the announcement fails the
   * job stays PENDING and the recovery sweeper enqueues it later.
   *
   * @throws PipelineValidationError for an empty or unknown pipeline, or an
   *   input whose kind has no default pipeline
   */
  async createJob(input: CreateJobInput): Promise<CreatedJob> {
    const pipeline = resolvePipeline(input.key, input.pipeline);

    const job = await this.ledger.create({
      id: randomUUID(),
      pipeline,
      input_key: input.key,
    });
    this.logger.log(`[${job.id}] Created for ${job.input_key}: ${pipeline.join(' -> ')}`);

    await this.queueService.enqueueJobReady(job.id);
    return { job_id: job.id };
  }

  async getJob(id: string): Promise<JobView> {
    return this.resolver.resolve(await this.load(id));
  }

  async getHlsManifest(id: string, outputIndex: number): Promise<string> {
    return this.resolver.signHlsManifest(await this.load(id), outputIndex);
  }

  /**
   * Signed PUT for a direct upload to uploads/<uuid hex>_<basename>
   */
  async presignUpload(input: PresignUploadInput): Promise<PresignedUploadView> {
    const key = uploadKeyFor(input.filename);
    const upload = await this.storage.getUploadUrl(key, input.content_type);

    return {
      key,
      url: upload.url,
      headers: upload.headers,
      expires_at: upload.expiresAt.toISOString(),
    };
  }

  private async load(id: string): Promise<Job> {
    const job = await this.ledger.get(id);
    if (!job) {
      throw new JobNotFoundError(id);
    }
    return job;
  }
}
