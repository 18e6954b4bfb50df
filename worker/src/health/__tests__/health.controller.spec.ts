import { describe, it, expect, vi, afterEach } from 'vitest';
import { QueueService } from '../../queue/queue.service';
import type { QueuedJobReady } from '../../queue/types/job.types';
import { HealthController } from '../health.controller';

vi.mock('@nestjs/common', async () => {
  const actual = await vi.importActual<typeof import('@nestjs/common')>(
    '@nestjs/common'
  );
  const { MockLogger } = await import('@/__mocks__/logger');
  return { ...actual, Logger: MockLogger };
});

describe('HealthController', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('reports status with queue counts', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(Date.UTC(2024, 0, 1, 12));
    const controller = new HealthController(
      new QueueService({
        add: async () => ({ id: 'unused' }),
        getJob: async (): Promise<QueuedJobReady | undefined> => undefined,
        getJobCounts: async (): Promise<Record<string, number>> => ({ waiting: 3 }),
      })
    );

    const health = await controller.check();

    expect(health.status).toBe('ok');
    expect(health.timestamp).toBe('2024-01-01T12:00:00.000Z');
    expect(health.queue).toEqual({
      waiting: 3,
      active: 0,
      completed: 0,
      failed: 0,
      delayed: 0,
    });
  });
});
