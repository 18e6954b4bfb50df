import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { toErrorMessage } from '@media-pipeline/shared';
import { JOB_LEDGER, type JobLedger } from '../ledger/job-ledger';
import { QueueService } from '../queue/queue.service';

const RECOVERY_INTERVAL_NAME = 'job-recovery';
const RECOVERY_BATCH = 100;

/**
 * Re-enqueues jobs whose worker went away: non-terminal, no live lease and
 * no ledger write for longer than RECOVERY_STALE_MS.
 */
@Injectable()
export class RecoveryService implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(RecoveryService.name);
  private readonly enabled: boolean;
  private readonly intervalMs: number;
  private readonly staleMs: number;
  private running = false;

  constructor(
    @Inject(JOB_LEDGER) private readonly ledger: JobLedger,
    private readonly queueService: QueueService,
    private readonly schedulerRegistry: SchedulerRegistry,
    configService: ConfigService
  ) {
    this.enabled = configService.get<boolean>('recovery.enabled', true);
    this.intervalMs = configService.get<number>('recovery.intervalMs', 30000);
    this.staleMs = configService.get<number>('recovery.staleMs', 120000);
  }

  onApplicationBootstrap() {
    if (!this.enabled) {
      this.logger.log('Recovery sweeper disabled');
      return;
    }

    const interval = setInterval(() => void this.handleInterval(), this.intervalMs);
    this.schedulerRegistry.addInterval(RECOVERY_INTERVAL_NAME, interval);
    this.logger.log(
      `Recovery sweeper every ${this.intervalMs}ms for jobs idle over ${this.staleMs}ms`
    );
  }

  onApplicationShutdown() {
    if (this.schedulerRegistry.doesExist('interval', RECOVERY_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(RECOVERY_INTERVAL_NAME);
    }
  }

  /**
   * One sweep, skipped while the previous one is still running. Errors are
   * logged and retried on the next tick.
   */
  async handleInterval(): Promise<void> {
    if (this.running) return;

    this.running = true;
    try {
      await this.sweep();
    } catch (error) {
      this.logger.error(`Recovery sweep failed: ${toErrorMessage(error)}`);
    } finally {
      this.running = false;
    }
  }

  /**
   * Jobs still waiting in the queue look stale too; the queue service skips
   * those that already have a pending delivery.
   *
   * @returns ids that were re-enqueued
   */
  async sweep(): Promise<string[]> {
    const staleIds = await this.ledger.findStale(Date.now() - this.staleMs, RECOVERY_BATCH);

    const requeued: string[] = [];
    for (const jobId of staleIds) {
      if ((await this.queueService.enqueueJobReady(jobId, 'recovery')) !== null) {
        requeued.push(jobId);
      }
    }
    if (requeued.length > 0) {
      this.logger.warn(`Re-enqueued ${requeued.length} stale jobs`);
    }
    return requeued;
  }
}
