import {
  JobStatus,
  LeaseLostError,
  isTerminalStatus,
  type Job,
} from '@media-pipeline/shared';
import {
  JobTerminalError,
  type JobLedger,
  type JobPatch,
  type LeaseAcquireResult,
  type NewJob,
} from './job-ledger';

/**
 * Process-local ledger. Every operation runs without awaiting, so each one
 * is atomic with respect to the event loop; suitable for a single worker
 * process and for tests.
 */
export class InMemoryJobLedger implements JobLedger {
  private readonly jobs = new Map<string, Job>();

  constructor(private readonly now: () => number = Date.now) {}

  async create(input: NewJob): Promise<Job> {
    if (this.jobs.has(input.id)) {
      throw new Error(`Job ${input.id} already exists`);
    }

    const timestamp = new Date(this.now()).toISOString();
    const job: Job = {
      id: input.id,
      status: JobStatus.PENDING,
      pipeline: [...input.pipeline],
      input_key: input.input_key,
      progress: 0,
      outputs: [],
      error: '',
      created_at: timestamp,
      updated_at: timestamp,
      lease: null,
    };
    this.jobs.set(job.id, job);
    return structuredClone(job);
  }

  async get(id: string): Promise<Job | null> {
    const job = this.jobs.get(id);
    return job ? structuredClone(job) : null;
  }

  async acquireLease(
    id: string,
    holder: string,
    ttlMs: number
  ): Promise<LeaseAcquireResult> {
    const job = this.jobs.get(id);
    if (!job) {
      return 'not_found';
    }

    const now = this.now();
    if (job.lease && job.lease.holder !== holder && job.lease.expiresAt > now) {
      return 'conflict';
    }

    job.lease = { holder, expiresAt: now + ttlMs };
    return 'acquired';
  }

  async renewLease(id: string, holder: string, ttlMs: number): Promise<boolean> {
    const job = this.jobs.get(id);
    if (!job || !this.holds(job, holder)) {
      return false;
    }

    job.lease = { holder, expiresAt: this.now() + ttlMs };
    return true;
  }

  async releaseLease(id: string, holder: string): Promise<void> {
    const job = this.jobs.get(id);
    if (job?.lease?.holder === holder) {
      job.lease = null;
    }
  }

  async commit(id: string, holder: string, patch: JobPatch): Promise<Job> {
    const job = this.jobs.get(id);
    if (!job || !this.holds(job, holder)) {
      throw new LeaseLostError(id, holder);
    }
    if (isTerminalStatus(job.status)) {
      throw new JobTerminalError(id);
    }

    if (patch.status !== undefined) {
      job.status = patch.status;
    }
    if (patch.progress !== undefined) {
      job.progress = Math.max(job.progress, patch.progress);
    }
    if (patch.error !== undefined) {
      job.error = patch.error;
    }
    if (patch.appendOutputs?.length) {
      job.outputs.push(...structuredClone(patch.appendOutputs));
    }
    job.updated_at = new Date(this.now()).toISOString();

    return structuredClone(job);
  }

  async findStale(staleBefore: number, limit: number): Promise<string[]> {
    const now = this.now();
    const stale: string[] = [];

    for (const job of this.jobs.values()) {
      if (stale.length >= limit) break;
      if (isTerminalStatus(job.status)) continue;
      if (job.lease && job.lease.expiresAt > now) continue;
      if (Date.parse(job.updated_at) >= staleBefore) continue;
      stale.push(job.id);
    }

    return stale;
  }

  private holds(job: Job, holder: string): boolean {
    return job.lease?.holder === holder && job.lease.expiresAt > this.now();
  }
}
