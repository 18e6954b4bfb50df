import type { JobsOptions } from 'bullmq';

export type JobReadyReason = 'created' | 'recovery';

/**
 * Payload of a job-ready message. Delivery is at-least-once; the ledger
 * lease decides which delivery does the work.
 */
export interface JobReadyData {
  jobId: string;
  reason: JobReadyReason;
}

/**
 * A job-ready message as held by the queue
 */
export interface QueuedJobReady {
  getState(): Promise<string>;
  remove(): Promise<void>;
}

/**
 * The part of a BullMQ queue the producer needs
 */
export interface JobReadyQueue {
  add(name: string, data: JobReadyData, opts?: JobsOptions): Promise<{ id?: string }>;
  getJob(id: string): Promise<QueuedJobReady | undefined>;
  getJobCounts(...types: string[]): Promise<Record<string, number>>;
}
