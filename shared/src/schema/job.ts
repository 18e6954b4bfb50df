import { z } from 'zod';
import { JobStatus, OutputRole, StepName } from '../enums';

export const StepNameSchema = z.nativeEnum(StepName);

export const OutputSchema = z.object({
  type: StepNameSchema,
  s3_key: z.string().min(1),
  /** Pipeline index of the producing step */
  step: z.number().int().min(0),
  role: z.nativeEnum(OutputRole),
});

export const LeaseSchema = z.object({
  holder: z.string().min(1),
  /** Epoch milliseconds */
  expiresAt: z.number().int(),
});

export const JobSchema = z.object({
  id: z.string().uuid(),
  status: z.nativeEnum(JobStatus),
  /**
   * Validated against the allowed steps at creation. Stored as plain names
   * so a record holding an unknown step still loads and fails at execution.
   */
  pipeline: z.array(z.string().min(1)).min(1),
  input_key: z.string().min(1),
  progress: z.number().int().min(0).max(100),
  outputs: z.array(OutputSchema),
  error: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
  lease: LeaseSchema.nullable(),
});

export type Output = z.infer<typeof OutputSchema>;
export type Lease = z.infer<typeof LeaseSchema>;
export type Job = z.infer<typeof JobSchema>;

/**
 * Output as returned to callers, with a freshly signed download URL
 */
export interface OutputView {
  type: StepName;
  s3_key: string;
  url: string;
}

/**
 * Job as returned to callers. Field names are the external contract.
 */
export interface JobView {
  id: string;
  status: JobStatus;
  progress: number;
  outputs: OutputView[];
  error: string;
  pipeline: string[];
  created_at: string;
  updated_at: string;
  input_url: string;
}
