import { Logger } from '@nestjs/common';
import {
  MediaKind,
  PermanentStepError,
  detectMediaKind,
  outputKeyPrefix,
  type StepName,
  type StepParams,
} from '@media-pipeline/shared';
import * as fs from 'fs';
import * as path from 'path';
import { StorageService } from '../../shared/services/storage.service';
import type {
  IStepExecutor,
  PipelineStep,
  StepArtifacts,
  StepContext,
} from '../interfaces';

/**
 * Object a step writes, addressed relative to its work directory
 */
export interface PlannedObject {
  key: string;
  localName: string;
  contentType: string;
}

export interface OutputPlan {
  primary: PlannedObject;
  auxiliary: PlannedObject[];
}

export interface RenderInput {
  inputPath: string;
  /** Holds only rendered outputs; the input lives elsewhere */
  workDir: string;
  kind: MediaKind;
  plan: OutputPlan;
  signal: AbortSignal;
}

/**
 * Shared flow for ffmpeg-backed steps: check the input kind, skip when the
 * primary output already exists, otherwise download, render and upload.
 * The primary object is uploaded last so its presence marks a finished step.
 */
export abstract class BaseFFmpegExecutor implements IStepExecutor {
  protected readonly logger: Logger;

  abstract readonly name: StepName;
  abstract readonly params: StepParams;
  protected abstract readonly inputKinds: readonly MediaKind[];

  constructor(protected readonly storage: StorageService) {
    this.logger = new Logger(new.target.name);
  }

  /**
   * Keys this step writes for the given input
   */
  protected abstract planOutputs(prefix: string, kind: MediaKind): OutputPlan;

  protected abstract render(input: RenderInput): Promise<void>;

  /**
   * Upload everything except the primary object. Steps that emit sidecar
   * files (segments) override this.
   */
  protected async uploadAuxiliary(
    plan: OutputPlan,
    workDir: string,
    signal: AbortSignal
  ): Promise<void> {
    for (const object of plan.auxiliary) {
      await this.storage.uploadFromPath(
        path.join(workDir, object.localName),
        object.key,
        object.contentType,
        signal
      );
    }
  }

  async execute(step: PipelineStep, context: StepContext): Promise<StepArtifacts> {
    const kind = detectMediaKind(step.inputKey);
    if (!this.inputKinds.includes(kind)) {
      throw new PermanentStepError(
        `${this.name} does not accept ${kind} input: ${step.inputKey}`
      );
    }

    const prefix = outputKeyPrefix(step.inputKey, this.name, step.params);
    const plan = this.planOutputs(prefix, kind);
    const artifacts: StepArtifacts = {
      primary: plan.primary.key,
      auxiliary: plan.auxiliary.map((object) => object.key),
    };

    const { signal } = context;
    if (await this.storage.exists(plan.primary.key, signal)) {
      this.logger.log(
        `[${context.jobId}] ${this.name} output already exists, skipping: ${plan.primary.key}`
      );
      return artifacts;
    }

    const tempDir = await this.storage.createTempDir(`${context.jobId}-${step.index}`);
    const workDir = path.join(tempDir, 'out');
    try {
      await fs.promises.mkdir(workDir);
      const inputPath = await this.storage.downloadToTemp(step.inputKey, tempDir, signal);
      await this.render({ inputPath, workDir, kind, plan, signal });

      await this.uploadAuxiliary(plan, workDir, signal);
      await this.storage.uploadFromPath(
        path.join(workDir, plan.primary.localName),
        plan.primary.key,
        plan.primary.contentType,
        signal
      );
    } finally {
      await this.storage.cleanupTemp(tempDir);
    }

    this.logger.log(`[${context.jobId}] ${this.name} wrote ${plan.primary.key}`);
    return artifacts;
  }
}
