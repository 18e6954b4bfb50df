import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ConfigService } from '@nestjs/config';
import {
  JobNotFoundError,
  JobStatus,
  LeaseConflictError,
  LeaseLostError,
  StepName,
  TransientStepError,
} from '@media-pipeline/shared';
import { createStubExecutors, type StubExecutor } from '@/__mocks__/step-executors';
import { InMemoryJobLedger } from '../../ledger/in-memory-job-ledger';
import { PipelineEngineService } from '../../pipeline/pipeline-engine.service';
import { StepRetryPolicy } from '../../pipeline/step-retry-policy';
import { DispatcherService } from '../dispatcher.service';

vi.mock('@nestjs/common', async () => {
  const actual = await vi.importActual<typeof import('@nestjs/common')>(
    '@nestjs/common'
  );
  const { MockLogger } = await import('@/__mocks__/logger');
  return { ...actual, Logger: MockLogger };
});

const JOB_ID = '3d2c1b0a-9f8e-4d7c-8b6a-5f4e3d2c1b0a';

describe('DispatcherService', () => {
  let clock: number;
  let ledger: InMemoryJobLedger;
  let executors: Record<StepName, StubExecutor>;
  let dispatcher: DispatcherService;

  beforeEach(async () => {
    clock = Date.UTC(2024, 0, 1);
    ledger = new InMemoryJobLedger(() => clock);
    const stubs = createStubExecutors();
    executors = stubs.executors;
    const config = new ConfigService({ worker: { id: 'worker-a', leaseTtlMs: 30 } });
    const engine = new PipelineEngineService(
      ledger,
      stubs.registry,
      new StepRetryPolicy(
        { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 1, jitterFactor: 0 },
        async () => {}
      ),
      config
    );
    dispatcher = new DispatcherService(ledger, engine, config);

    await ledger.create({
      id: JOB_ID,
      pipeline: [StepName.THUMBNAIL],
      input_key: 'uploads/a_photo.jpg',
    });
  });

  it('runs the job and releases the lease', async () => {
    const outcome = await dispatcher.dispatch(JOB_ID);

    expect(outcome).toEqual({ kind: 'completed', jobId: JOB_ID, status: JobStatus.SUCCESS });
    const job = await ledger.get(JOB_ID);
    expect(job?.status).toBe(JobStatus.SUCCESS);
    expect(job?.lease).toBeNull();
  });

  it('executes a job exactly once for two concurrent deliveries', async () => {
    const outcomes = await Promise.all([
      dispatcher.dispatch(JOB_ID),
      dispatcher.dispatch(JOB_ID),
    ]);

    expect(outcomes.map((outcome) => outcome.kind).sort()).toEqual(['completed', 'skipped']);
    expect(outcomes.find((outcome) => outcome.kind === 'skipped')).toMatchObject({
      reason: 'lease_conflict',
      error: expect.any(LeaseConflictError),
    });
    expect(executors[StepName.THUMBNAIL].calls).toHaveLength(1);
  });

  it('acks a redelivery of a finished job without running steps', async () => {
    await dispatcher.dispatch(JOB_ID);
    const outcome = await dispatcher.dispatch(JOB_ID);

    expect(outcome).toEqual({ kind: 'completed', jobId: JOB_ID, status: JobStatus.SUCCESS });
    expect(executors[StepName.THUMBNAIL].calls).toHaveLength(1);
  });

  it('drops messages for unknown jobs', async () => {
    expect(await dispatcher.dispatch('missing')).toMatchObject({
      kind: 'dropped',
      jobId: 'missing',
      reason: 'not_found',
      error: expect.any(JobNotFoundError),
    });
  });

  it('abandons the run when renewal finds the lease taken over', async () => {
    executors[StepName.THUMBNAIL].behaviour = async (_step, context) => {
      clock += 60000;
      await ledger.acquireLease(JOB_ID, 'intruder', 60000);
      return new Promise((_, reject) => {
        context.signal.addEventListener('abort', () =>
          reject(new TransientStepError('ffmpeg was aborted'))
        );
      });
    };

    const outcome = await dispatcher.dispatch(JOB_ID);

    expect(outcome).toMatchObject({
      kind: 'dropped',
      jobId: JOB_ID,
      reason: 'lease_lost',
      error: expect.any(LeaseLostError),
    });
    const job = await ledger.get(JOB_ID);
    expect(job?.status).toBe(JobStatus.STARTED);
    expect(job?.lease?.holder).toBe('intruder');
  });

  it('propagates ledger failures so the message is redelivered', async () => {
    vi.spyOn(ledger, 'acquireLease').mockRejectedValue(new Error('connect ECONNREFUSED'));

    await expect(dispatcher.dispatch(JOB_ID)).rejects.toThrow('connect ECONNREFUSED');
  });
});
