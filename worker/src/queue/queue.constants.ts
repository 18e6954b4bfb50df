export const QUEUE_NAMES = {
  JOB_READY: 'job-ready',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

/** BullMQ job name for a job-ready message */
export const JOB_READY = 'job-ready';
