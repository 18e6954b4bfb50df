import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  JobNotFoundError,
  JobStatus,
  LeaseLostError,
  OutputRole,
  isTerminalStatus,
  toErrorMessage,
  truncateErrorMessage,
  type Job,
  type Output,
  type StepName,
  type TerminalJobStatus,
} from '@media-pipeline/shared';
import { ExecutorRegistry } from '../executors/executor-registry';
import type { StepArtifacts } from '../executors/interfaces';
import { JOB_LEDGER, type JobLedger } from '../ledger/job-ledger';
import { progressAfterStep } from './progress';
import { resolveStepInput } from './step-chain';
import { StepRetryPolicy } from './step-retry-policy';

const DEFAULT_STEP_TIMEOUT_MS = 15 * 60 * 1000;

interface CompletedStep {
  name: StepName;
  artifacts: StepArtifacts;
}

/**
 * Drives one job through its pipeline.
 *
 * The number of primary outputs already recorded is the index of the next
 * step, so a job interrupted at any point resumes where it stopped. Every
 * ledger write is fenced by `holder`.
 */
@Injectable()
export class PipelineEngineService {
  private readonly logger = new Logger(PipelineEngineService.name);

  constructor(
    @Inject(JOB_LEDGER) private readonly ledger: JobLedger,
    private readonly registry: ExecutorRegistry,
    private readonly retryPolicy: StepRetryPolicy,
    private readonly configService: ConfigService
  ) {}

  /**
   * Run the remaining steps of a job.
   *
   * @param signal - aborted by the caller when the lease is lost
   * @returns the job's terminal status
   * @throws JobNotFoundError when the id is unknown
   * @throws LeaseLostError when another worker took the job over
   */
  async execute(
    jobId: string,
    holder: string,
    signal?: AbortSignal
  ): Promise<TerminalJobStatus> {
    let job = await this.ledger.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }

    if (isTerminalStatus(job.status)) {
      this.logger.log(`[${jobId}] Already ${job.status}, nothing to do`);
      return job.status;
    }

    if (job.status === JobStatus.PENDING) {
      job = await this.ledger.commit(jobId, holder, { status: JobStatus.STARTED });
    }

    const total = job.pipeline.length;
    const resumeIndex = job.outputs.filter(
      (output) => output.role === OutputRole.PRIMARY
    ).length;
    if (resumeIndex > 0) {
      this.logger.log(`[${jobId}] Resuming at step ${resumeIndex + 1}/${total}`);
    }

    for (let index = resumeIndex; index < total; index++) {
      const name = job.pipeline[index];

      let completed: CompletedStep;
      try {
        completed = await this.runStep(job, index, signal);
      } catch (error) {
        if (error instanceof LeaseLostError) {
          throw error;
        }
        return this.fail(job, holder, name, error);
      }

      job = await this.ledger.commit(jobId, holder, {
        appendOutputs: this.toOutputs(completed, index),
        progress: progressAfterStep(index, total),
        ...(index === total - 1 ? { status: JobStatus.SUCCESS } : {}),
      });
      this.logger.log(
        `[${jobId}] Step ${index + 1}/${total} (${name}) done, progress ${job.progress}%`
      );
    }

    if (!isTerminalStatus(job.status)) {
      // Every step was recorded before the final commit landed
      job = await this.ledger.commit(jobId, holder, {
        status: JobStatus.SUCCESS,
        progress: 100,
      });
    }

    this.logger.log(`[${jobId}] Pipeline finished with ${job.status}`);
    return JobStatus.SUCCESS;
  }

  private async runStep(
    job: Job,
    index: number,
    signal?: AbortSignal
  ): Promise<CompletedStep> {
    const executor = this.registry.get(job.pipeline[index]);
    const name = executor.name;
    const inputKey = resolveStepInput(job, index);
    const timeoutMs = this.configService.get<number>(
      `steps.timeoutMs.${name}`,
      DEFAULT_STEP_TIMEOUT_MS
    );

    this.logger.log(`[${job.id}] Running ${name} on ${inputKey}`);
    const artifacts = await this.retryPolicy.run(
      `${name} (job ${job.id})`,
      timeoutMs,
      (attemptSignal) =>
        executor.execute(
          { name, index, inputKey, params: executor.params },
          { jobId: job.id, signal: attemptSignal }
        ),
      signal
    );
    return { name, artifacts };
  }

  private toOutputs({ name, artifacts }: CompletedStep, index: number): Output[] {
    return [
      { type: name, s3_key: artifacts.primary, step: index, role: OutputRole.PRIMARY },
      ...artifacts.auxiliary.map((key) => ({
        type: name,
        s3_key: key,
        step: index,
        role: OutputRole.AUXILIARY,
      })),
    ];
  }

  private async fail(
    job: Job,
    holder: string,
    name: string,
    error: unknown
  ): Promise<TerminalJobStatus> {
    const message = truncateErrorMessage(toErrorMessage(error) || `${name} failed`);
    this.logger.error(`[${job.id}] Step ${name} failed: ${message}`);

    await this.ledger.commit(job.id, holder, {
      status: JobStatus.FAILURE,
      error: message,
    });
    return JobStatus.FAILURE;
  }
}
