import { describe, it, expect, beforeEach, vi } from 'vitest';
import { FakeJobReadyQueue } from '@/__mocks__/job-ready-queue';
import { QueueService } from '../queue.service';

vi.mock('@nestjs/common', async () => {
  const actual = await vi.importActual<typeof import('@nestjs/common')>(
    '@nestjs/common'
  );
  const { MockLogger } = await import('@/__mocks__/logger');
  return { ...actual, Logger: MockLogger };
});

describe('QueueService', () => {
  let queue: FakeJobReadyQueue;
  let service: QueueService;

  beforeEach(() => {
    queue = new FakeJobReadyQueue();
    service = new QueueService(queue);
  });

  it('deduplicates fresh jobs on the ledger id', async () => {
    const id = await service.enqueueJobReady('job-1');

    expect(id).toBe('job-1');
    expect(queue.added).toEqual([
      { data: { jobId: 'job-1', reason: 'created' }, opts: { jobId: 'job-1' } },
    ]);
  });

  describe('recovery', () => {
    it('sends nothing while the original delivery is still waiting', async () => {
      await service.enqueueJobReady('job-1');

      expect(await service.enqueueJobReady('job-1', 'recovery')).toBeNull();
      expect(queue.added).toHaveLength(1);
    });

    it('sends one message under the recovery id once earlier deliveries are gone', async () => {
      await service.enqueueJobReady('job-1');
      queue.settle('job-1', 'completed');

      expect(await service.enqueueJobReady('job-1', 'recovery')).toBe('recovery-job-1');
      expect(await service.enqueueJobReady('job-1', 'recovery')).toBeNull();
      expect(queue.added[1]).toEqual({
        data: { jobId: 'job-1', reason: 'recovery' },
        opts: { jobId: 'recovery-job-1' },
      });
      expect(queue.added).toHaveLength(2);
    });

    it('is not blocked by a failed message kept by the queue', async () => {
      await service.enqueueJobReady('job-1', 'recovery');
      queue.settle('recovery-job-1', 'failed');

      expect(await service.enqueueJobReady('job-1', 'recovery')).toBe('recovery-job-1');
      expect(await queue.getJobCounts('waiting', 'failed')).toEqual({ waiting: 1 });
    });
  });

  it('fills missing counts with zero', async () => {
    await service.enqueueJobReady('job-1');
    await service.enqueueJobReady('job-2');
    await service.enqueueJobReady('job-3');
    queue.settle('job-3', 'failed');

    expect(await service.getQueueMetrics()).toEqual({
      waiting: 2,
      active: 0,
      completed: 0,
      failed: 1,
      delayed: 0,
    });
  });
});
