// Shared enums for the project

export enum JobStatus {
  PENDING = 'PENDING',
  STARTED = 'STARTED',
  SUCCESS = 'SUCCESS',
  FAILURE = 'FAILURE',
}

export const TERMINAL_STATUSES: readonly JobStatus[] = [
  JobStatus.SUCCESS,
  JobStatus.FAILURE,
];

export type TerminalJobStatus = JobStatus.SUCCESS | JobStatus.FAILURE;

export function isTerminalStatus(
  status: JobStatus
): status is TerminalJobStatus {
  return status === JobStatus.SUCCESS || status === JobStatus.FAILURE;
}

export enum StepName {
  THUMBNAIL = 'thumbnail',
  WATERMARK = 'watermark',
  TRANSCODE_720P = 'transcode_720p',
  HLS_720P = 'hls_720p',
}

/**
 * Role of an output within the pipeline.
 * Each step records exactly one PRIMARY output; resumption counts them.
 */
export enum OutputRole {
  PRIMARY = 'primary',
  AUXILIARY = 'auxiliary',
}

export enum MediaKind {
  IMAGE = 'image',
  VIDEO = 'video',
  OTHER = 'other',
}

export enum LedgerDriver {
  REDIS = 'redis',
  MEMORY = 'memory',
}
