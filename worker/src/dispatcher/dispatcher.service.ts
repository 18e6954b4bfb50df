import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  JobNotFoundError,
  LeaseConflictError,
  LeaseLostError,
  toErrorMessage,
  type TerminalJobStatus,
} from '@media-pipeline/shared';
import { randomUUID } from 'crypto';
import { JOB_LEDGER, type JobLedger } from '../ledger/job-ledger';
import { PipelineEngineService } from '../pipeline/pipeline-engine.service';

/**
 * How a delivery ended. Skipped and dropped deliveries are acked; `error`
 * says why no run took place or why it stopped.
 */
export type DispatchOutcome =
  | { kind: 'completed'; jobId: string; status: TerminalJobStatus }
  | { kind: 'skipped'; jobId: string; reason: 'lease_conflict'; error: LeaseConflictError }
  | {
      kind: 'dropped';
      jobId: string;
      reason: 'not_found' | 'lease_lost';
      error: JobNotFoundError | LeaseLostError;
    };

/**
 * Turns one job-ready delivery into at most one engine run.
 *
 * Each delivery claims the job under its own holder id, so duplicate
 * deliveries (on this worker or another) lose the claim and are acked
 * without side effects. Ledger failures propagate so the queue redelivers.
 */
@Injectable()
export class DispatcherService {
  private readonly logger = new Logger(DispatcherService.name);
  private readonly workerId: string;
  private readonly leaseTtlMs: number;

  constructor(
    @Inject(JOB_LEDGER) private readonly ledger: JobLedger,
    private readonly engine: PipelineEngineService,
    configService: ConfigService
  ) {
    this.workerId = configService.get<string>('worker.id', 'worker');
    this.leaseTtlMs = configService.get<number>('worker.leaseTtlMs', 60000);
  }

  async dispatch(jobId: string): Promise<DispatchOutcome> {
    const holder = `${this.workerId}/${randomUUID()}`;

    const claim = await this.ledger.acquireLease(jobId, holder, this.leaseTtlMs);
    if (claim === 'not_found') {
      this.logger.warn(`[${jobId}] Job not found, dropping message`);
      return { kind: 'dropped', jobId, reason: 'not_found', error: new JobNotFoundError(jobId) };
    }
    if (claim === 'conflict') {
      const error = new LeaseConflictError(jobId);
      this.logger.debug(`[${jobId}] ${error.message}, skipping`);
      return { kind: 'skipped', jobId, reason: 'lease_conflict', error };
    }

    const controller = new AbortController();
    const renewal = setInterval(() => {
      this.renew(jobId, holder, controller).catch((error: unknown) => {
        this.logger.warn(`[${jobId}] Lease renewal failed: ${toErrorMessage(error)}`);
      });
    }, Math.max(1, Math.floor(this.leaseTtlMs / 3)));

    try {
      const status = await this.engine.execute(jobId, holder, controller.signal);
      return { kind: 'completed', jobId, status };
    } catch (error) {
      if (error instanceof LeaseLostError) {
        this.logger.warn(`[${jobId}] Lease lost, abandoning run`);
        return { kind: 'dropped', jobId, reason: 'lease_lost', error };
      }
      if (error instanceof JobNotFoundError) {
        this.logger.warn(`[${jobId}] Job disappeared during dispatch`);
        return { kind: 'dropped', jobId, reason: 'not_found', error };
      }
      throw error;
    } finally {
      clearInterval(renewal);
      await this.release(jobId, holder);
    }
  }

  private async renew(
    jobId: string,
    holder: string,
    controller: AbortController
  ): Promise<void> {
    if (controller.signal.aborted) return;

    const renewed = await this.ledger.renewLease(jobId, holder, this.leaseTtlMs);
    if (!renewed) {
      controller.abort(new LeaseLostError(jobId, holder));
    }
  }

  private async release(jobId: string, holder: string): Promise<void> {
    try {
      await this.ledger.releaseLease(jobId, holder);
    } catch (error) {
      // The lease still expires on its own
      this.logger.warn(`[${jobId}] Failed to release lease: ${toErrorMessage(error)}`);
    }
  }
}
