import type {
  Job,
  JobStatus,
  Output,
  StepName,
} from '@media-pipeline/shared';

export const JOB_LEDGER = Symbol('JOB_LEDGER');

export interface NewJob {
  id: string;
  pipeline: StepName[];
  input_key: string;
}

/**
 * Changes applied by one ledger commit. All fields are optional and applied
 * together; outputs are appended, never replaced.
 */
export interface JobPatch {
  status?: JobStatus;
  progress?: number;
  error?: string;
  appendOutputs?: Output[];
}

export type LeaseAcquireResult = 'acquired' | 'conflict' | 'not_found';

/**
 * Durable store of jobs keyed by id.
 *
 * Lease operations are atomic compare-and-set: a lease is granted only when
 * the job has no holder or the current lease has expired. `commit` is fenced
 * by the lease holder so that a worker whose lease was taken over can no
 * longer write. Lease operations never touch `updated_at`.
 */
export interface JobLedger {
  create(job: NewJob): Promise<Job>;

  get(id: string): Promise<Job | null>;

  acquireLease(id: string, holder: string, ttlMs: number): Promise<LeaseAcquireResult>;

  /** @returns false when the lease is no longer held by `holder` */
  renewLease(id: string, holder: string, ttlMs: number): Promise<boolean>;

  releaseLease(id: string, holder: string): Promise<void>;

  /**
   * Apply a patch as one transactional write.
   *
   * @throws LeaseLostError when `holder` does not hold a live lease
   */
  commit(id: string, holder: string, patch: JobPatch): Promise<Job>;

  /**
   * Non-terminal jobs with no live lease whose last update is older than
   * `staleBefore` (epoch ms). Used to re-enqueue jobs orphaned by crashed
   * workers.
   */
  findStale(staleBefore: number, limit: number): Promise<string[]>;
}

/**
 * Raised when a commit targets a job that already reached SUCCESS or FAILURE
 */
export class JobTerminalError extends Error {
  constructor(readonly jobId: string) {
    super(`Job ${jobId} is already terminal`);
    this.name = 'JobTerminalError';
  }
}
