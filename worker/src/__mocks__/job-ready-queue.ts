import type { JobsOptions } from 'bullmq';
import type {
  JobReadyData,
  JobReadyQueue,
  QueuedJobReady,
} from '../queue/types/job.types';

type FakeState = 'waiting' | 'active' | 'completed' | 'failed';

class FakeQueuedJob implements QueuedJobReady {
  state: FakeState = 'waiting';

  constructor(
    readonly id: string,
    readonly data: JobReadyData,
    private readonly entries: Map<string, FakeQueuedJob>
  ) {}

  async getState(): Promise<string> {
    return this.state;
  }

  async remove(): Promise<void> {
    this.entries.delete(this.id);
  }
}

/**
 * Job-ready queue held in a Map. Like BullMQ, adding under an id that is
 * already present keeps the existing message.
 */
export class FakeJobReadyQueue implements JobReadyQueue {
  readonly entries = new Map<string, FakeQueuedJob>();
  readonly added: { data: JobReadyData; opts: JobsOptions }[] = [];
  private sequence = 0;

  async add(
    _name: string,
    data: JobReadyData,
    opts: JobsOptions = {}
  ): Promise<{ id?: string }> {
    this.sequence += 1;
    const id = opts.jobId ?? String(this.sequence);
    this.added.push({ data, opts });
    if (!this.entries.has(id)) {
      this.entries.set(id, new FakeQueuedJob(id, data, this.entries));
    }
    return { id };
  }

  async getJob(id: string): Promise<QueuedJobReady | undefined> {
    return this.entries.get(id);
  }

  async getJobCounts(...types: string[]): Promise<Record<string, number>> {
    const counts: Record<string, number> = {};
    for (const entry of this.entries.values()) {
      if (types.includes(entry.state)) {
        counts[entry.state] = (counts[entry.state] ?? 0) + 1;
      }
    }
    return counts;
  }

  /** Settle a message the way a worker would; completed ones are removed */
  settle(id: string, state: 'completed' | 'failed'): void {
    const entry = this.entries.get(id);
    if (!entry) {
      throw new Error(`No queued message ${id}`);
    }
    if (state === 'completed') {
      this.entries.delete(id);
    } else {
      entry.state = state;
    }
  }
}
