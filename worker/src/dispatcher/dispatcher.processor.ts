import { Processor, WorkerHost, OnWorkerEvent } from '@nestjs/bullmq';
import { Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Job } from 'bullmq';
import { QUEUE_NAMES } from '../queue/queue.constants';
import type { JobReadyData } from '../queue/types/job.types';
import { DispatcherService, type DispatchOutcome } from './dispatcher.service';

/**
 * BullMQ consumer for job-ready messages. Concurrency comes from
 * WORKER_CONCURRENCY; a thrown error leaves the message unacked so BullMQ
 * redelivers it with backoff.
 */
@Processor(QUEUE_NAMES.JOB_READY)
export class DispatcherProcessor extends WorkerHost implements OnApplicationBootstrap {
  private readonly logger = new Logger(DispatcherProcessor.name);

  constructor(
    private readonly dispatcher: DispatcherService,
    private readonly configService: ConfigService
  ) {
    super();
  }

  onApplicationBootstrap() {
    const concurrency = this.configService.get<number>('worker.concurrency', 2);
    this.worker.concurrency = concurrency;
    this.logger.log(`Consuming ${QUEUE_NAMES.JOB_READY} with concurrency ${concurrency}`);
  }

  async process(job: Job<JobReadyData>): Promise<DispatchOutcome> {
    return this.dispatcher.dispatch(job.data.jobId);
  }

  @OnWorkerEvent('completed')
  onCompleted(job: Job<JobReadyData>, outcome: DispatchOutcome) {
    if (outcome.kind === 'completed') {
      this.logger.log(`[${job.data.jobId}] Dispatch completed with ${outcome.status}`);
      return;
    }
    this.logger.log(`[${job.data.jobId}] Dispatch ${outcome.kind}: ${outcome.error.message}`);
  }

  @OnWorkerEvent('failed')
  onFailed(job: Job<JobReadyData> | undefined, error: Error) {
    this.logger.error(
      `[${job?.data.jobId ?? 'unknown'}] Dispatch failed (attempt ${job?.attemptsMade ?? 0}): ${error.message}`
    );
  }
}
