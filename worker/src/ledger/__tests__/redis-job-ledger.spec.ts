import { describe, it, expect, vi, beforeEach } from 'vitest';
import RedisMock from 'ioredis-mock';
import { ConfigService } from '@nestjs/config';
import { JobStatus, OutputRole, StepName } from '@media-pipeline/shared';
import { createStubExecutors } from '@/__mocks__/step-executors';
import { PipelineEngineService } from '../../pipeline/pipeline-engine.service';
import { StepRetryPolicy } from '../../pipeline/step-retry-policy';
import { RedisJobLedger } from '../redis-job-ledger';
import { JOB_ID, describeJobLedgerContract } from './job-ledger.contract';

vi.mock('@nestjs/common', async () => {
  const actual = await vi.importActual<typeof import('@nestjs/common')>(
    '@nestjs/common'
  );
  const { MockLogger } = await import('@/__mocks__/logger');
  return { ...actual, Logger: MockLogger };
});

async function createRedisLedger(now: () => number) {
  const redis = new RedisMock();
  await redis.flushall();
  return { redis, ledger: new RedisJobLedger(redis, now) };
}

describeJobLedgerContract('RedisJobLedger', async (now) => {
  const { ledger } = await createRedisLedger(now);
  return ledger;
});

describe('RedisJobLedger stored pipelines', () => {
  const clock = Date.UTC(2024, 0, 1);
  let redis: InstanceType<typeof RedisMock>;
  let ledger: RedisJobLedger;

  beforeEach(async () => {
    ({ redis, ledger } = await createRedisLedger(() => clock));
    await ledger.create({
      id: JOB_ID,
      pipeline: [StepName.THUMBNAIL],
      input_key: 'uploads/a_photo.jpg',
    });
  });

  it('loads a job whose pipeline names a step this worker does not know', async () => {
    await redis.hset(`media-pipeline:job:${JOB_ID}`, 'pipeline', '["resize_4k"]');

    const job = await ledger.get(JOB_ID);
    expect(job?.pipeline).toEqual(['resize_4k']);
    expect(job?.status).toBe(JobStatus.PENDING);
  });

  it('fails the job at the unknown step instead of leaving it stuck', async () => {
    await redis.hset(
      `media-pipeline:job:${JOB_ID}`,
      'pipeline',
      '["thumbnail","resize_4k"]'
    );
    const { executors, registry } = createStubExecutors();
    const engine = new PipelineEngineService(
      ledger,
      registry,
      new StepRetryPolicy(
        { maxAttempts: 3, baseDelayMs: 10, maxDelayMs: 100, jitterFactor: 0 },
        async () => {},
        () => 0.5
      ),
      new ConfigService({})
    );

    await ledger.acquireLease(JOB_ID, 'w1', 60000);
    expect(await engine.execute(JOB_ID, 'w1')).toBe(JobStatus.FAILURE);

    const job = await ledger.get(JOB_ID);
    expect(job?.status).toBe(JobStatus.FAILURE);
    expect(job?.error).toBe('Unsupported step: resize_4k');
    expect(job?.outputs).toEqual([
      {
        type: StepName.THUMBNAIL,
        s3_key: 'outputs/stub/0-thumbnail',
        step: 0,
        role: OutputRole.PRIMARY,
      },
    ]);
    expect(executors[StepName.THUMBNAIL].calls).toHaveLength(1);
  });
});
