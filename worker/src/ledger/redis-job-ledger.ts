import { Logger } from '@nestjs/common';
import type Redis from 'ioredis';
import { z } from 'zod';
import {
  JobSchema,
  JobStatus,
  LeaseLostError,
  OutputSchema,
  type Job,
} from '@media-pipeline/shared';
import {
  JobTerminalError,
  type JobLedger,
  type JobPatch,
  type LeaseAcquireResult,
  type NewJob,
} from './job-ledger';
import {
  ACQUIRE_LEASE_SCRIPT,
  COMMIT_SCRIPT,
  CREATE_SCRIPT,
  RELEASE_LEASE_SCRIPT,
  RENEW_LEASE_SCRIPT,
} from './redis-scripts';

const KEY_PREFIX = 'media-pipeline';

const HashSchema = z.record(z.string());
const OutputListSchema = z.array(z.string());

/**
 * Ledger on Redis. A job is a hash plus an append-only list of outputs;
 * non-terminal jobs are indexed in a sorted set scored by last update.
 */
export class RedisJobLedger implements JobLedger {
  private readonly logger = new Logger(RedisJobLedger.name);

  constructor(
    private readonly redis: Redis,
    private readonly now: () => number = Date.now
  ) {}

  private jobKey(id: string): string {
    return `${KEY_PREFIX}:job:${id}`;
  }

  private outputsKey(id: string): string {
    return `${KEY_PREFIX}:job:${id}:outputs`;
  }

  private activeKey(): string {
    return `${KEY_PREFIX}:jobs:active`;
  }

  async create(input: NewJob): Promise<Job> {
    const nowMs = this.now();
    const timestamp = new Date(nowMs).toISOString();

    const created = await this.redis.eval(
      CREATE_SCRIPT,
      2,
      this.jobKey(input.id),
      this.activeKey(),
      input.id,
      String(nowMs),
      timestamp,
      JobStatus.PENDING,
      JSON.stringify(input.pipeline),
      input.input_key
    );

    if (created !== 1) {
      throw new Error(`Job ${input.id} already exists`);
    }

    return {
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
  }

  async get(id: string): Promise<Job | null> {
    const results = await this.redis
      .multi()
      .hgetall(this.jobKey(id))
      .lrange(this.outputsKey(id), 0, -1)
      .exec();

    if (!results) {
      throw new Error(`Transaction aborted while reading job ${id}`);
    }

    const [[hashError, rawHash], [listError, rawOutputs]] = results;
    if (hashError) throw hashError;
    if (listError) throw listError;

    const hash = HashSchema.parse(rawHash);
    if (Object.keys(hash).length === 0) {
      return null;
    }

    const outputs = OutputListSchema.parse(rawOutputs).map((raw) =>
      OutputSchema.parse(JSON.parse(raw))
    );

    return JobSchema.parse({
      id: hash.id,
      status: hash.status,
      pipeline: JSON.parse(hash.pipeline),
      input_key: hash.input_key,
      progress: Number(hash.progress),
      outputs,
      error: hash.error ?? '',
      created_at: hash.created_at,
      updated_at: hash.updated_at,
      lease: hash.lease_holder
        ? {
            holder: hash.lease_holder,
            expiresAt: Number(hash.lease_expires_at),
          }
        : null,
    });
  }

  async acquireLease(
    id: string,
    holder: string,
    ttlMs: number
  ): Promise<LeaseAcquireResult> {
    const result = await this.redis.eval(
      ACQUIRE_LEASE_SCRIPT,
      1,
      this.jobKey(id),
      holder,
      String(ttlMs),
      String(this.now())
    );

    if (result === 'acquired' || result === 'conflict' || result === 'not_found') {
      return result;
    }
    throw new Error(`Unexpected lease acquisition reply for job ${id}: ${String(result)}`);
  }

  async renewLease(id: string, holder: string, ttlMs: number): Promise<boolean> {
    const result = await this.redis.eval(
      RENEW_LEASE_SCRIPT,
      1,
      this.jobKey(id),
      holder,
      String(ttlMs),
      String(this.now())
    );
    return result === 1;
  }

  async releaseLease(id: string, holder: string): Promise<void> {
    const released = await this.redis.eval(
      RELEASE_LEASE_SCRIPT,
      1,
      this.jobKey(id),
      holder
    );
    if (released !== 1) {
      this.logger.debug(`Lease on job ${id} was not held by ${holder} at release`);
    }
  }

  async commit(id: string, holder: string, patch: JobPatch): Promise<Job> {
    const nowMs = this.now();
    const outputs = (patch.appendOutputs ?? []).map((output) =>
      JSON.stringify(output)
    );

    const result = await this.redis.eval(
      COMMIT_SCRIPT,
      3,
      this.jobKey(id),
      this.outputsKey(id),
      this.activeKey(),
      holder,
      String(nowMs),
      new Date(nowMs).toISOString(),
      id,
      patch.status ?? '',
      patch.progress === undefined ? '' : String(patch.progress),
      patch.error ?? '',
      ...outputs
    );

    if (result === 'lease_lost') {
      throw new LeaseLostError(id, holder);
    }
    if (result === 'terminal') {
      throw new JobTerminalError(id);
    }
    if (result !== 'ok') {
      throw new Error(`Unexpected commit reply for job ${id}: ${String(result)}`);
    }

    const job = await this.get(id);
    if (!job) {
      throw new Error(`Job ${id} disappeared after commit`);
    }
    return job;
  }

  async findStale(staleBefore: number, limit: number): Promise<string[]> {
    const candidates = await this.redis.zrangebyscore(
      this.activeKey(),
      '-inf',
      `(${staleBefore}`,
      'LIMIT',
      0,
      limit
    );
    if (candidates.length === 0) {
      return [];
    }

    const now = this.now();
    const stale: string[] = [];
    for (const id of candidates) {
      const expiresAt = await this.redis.hget(this.jobKey(id), 'lease_expires_at');
      if (!expiresAt || Number(expiresAt) <= now) {
        stale.push(id);
      }
    }
    return stale;
  }
}
