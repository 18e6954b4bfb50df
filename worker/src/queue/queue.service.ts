import { Injectable, Logger } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { JOB_READY, QUEUE_NAMES } from './queue.constants';
import type { JobReadyQueue, JobReadyReason } from './types/job.types';

export interface QueueMetrics {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}

/** Queue states in which a message will still reach a worker */
const PENDING_STATES = new Set([
  'waiting',
  'delayed',
  'active',
  'prioritized',
  'waiting-children',
]);

export function recoveryMessageId(jobId: string): string {
  return `recovery-${jobId}`;
}

/**
 * QueueService provides a thin wrapper around the job-ready queue.
 * Fresh jobs use the ledger id as BullMQ job id for deduplication.
 * Recovery messages use a second fixed id per job and are only sent when
 * no delivery for the job is still pending.
 */
@Injectable()
export class QueueService {
  private readonly logger = new Logger(QueueService.name);

  constructor(
    @InjectQueue(QUEUE_NAMES.JOB_READY) private readonly jobReadyQueue: JobReadyQueue
  ) {}

  /**
   * @returns the queue id of the message, or null when a recovery message
   *   was not needed because a delivery is already pending
   */
  async enqueueJobReady(
    jobId: string,
    reason: JobReadyReason = 'created'
  ): Promise<string | null> {
    if (reason === 'recovery') {
      return this.enqueueRecovery(jobId);
    }

    const queued = await this.jobReadyQueue.add(JOB_READY, { jobId, reason }, { jobId });
    this.logger.log(
      `Enqueued ${JOB_READY} for job ${jobId} (${reason}), queue id: ${queued.id ?? 'unknown'}`
    );
    return queued.id ?? jobId;
  }

  private async enqueueRecovery(jobId: string): Promise<string | null> {
    const recoveryId = recoveryMessageId(jobId);

    for (const id of [jobId, recoveryId]) {
      const existing = await this.jobReadyQueue.getJob(id);
      if (existing && PENDING_STATES.has(await existing.getState())) {
        this.logger.debug(`Job ${jobId} already has a pending delivery (${id})`);
        return null;
      }
    }

    // A finished or failed recovery message kept by the queue would swallow the new one
    const previous = await this.jobReadyQueue.getJob(recoveryId);
    if (previous) {
      await previous.remove();
    }

    const queued = await this.jobReadyQueue.add(
      JOB_READY,
      { jobId, reason: 'recovery' },
      { jobId: recoveryId }
    );
    this.logger.log(`Enqueued ${JOB_READY} for job ${jobId} (recovery), queue id: ${recoveryId}`);
    return queued.id ?? recoveryId;
  }

  /**
   * Counts for the job-ready queue
   */
  async getQueueMetrics(): Promise<QueueMetrics> {
    const counts = await this.jobReadyQueue.getJobCounts(
      'waiting',
      'active',
      'completed',
      'failed',
      'delayed'
    );

    return {
      waiting: counts.waiting ?? 0,
      active: counts.active ?? 0,
      completed: counts.completed ?? 0,
      failed: counts.failed ?? 0,
      delayed: counts.delayed ?? 0,
    };
  }
}
