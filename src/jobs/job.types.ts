export type OfferDecision = 'won' | 'rejected';

export type JobPayloads = {
  match_carriers: { transportRequestId: string };
  send_carrier_invitations: { transportRequestId: string };
  send_offer_decision: { carrierRequestId: string; decision: OfferDecision };
};

export type JobType = keyof JobPayloads;

export type JobStatus = 'pending' | 'running' | 'retrying' | 'completed' | 'failed';

export type QueuedJob<K extends JobType = JobType> = {
  id: string;
  type: K;
  payload: JobPayloads[K];
  status: JobStatus;
  attempts: number;
  maxAttempts: number;
  result?: unknown;
  lastError?: string;
  createdAt: Date;
  startedAt?: Date;
  completedAt?: Date;
};

export type JobHandler<K extends JobType> = (
  payload: JobPayloads[K],
  job: QueuedJob<K>,
) => Promise<unknown>;

export type JobQueueOptions = {
  maxAttempts: number;
  /** Linear backoff: the n-th retry waits n times this long. */
  retryDelayMs: number;
  /** Completed and failed jobs kept for getJob; the oldest are dropped first. */
  maxFinishedJobs: number;
};

export const JOB_QUEUE_OPTIONS = Symbol('JOB_QUEUE_OPTIONS');

export function isJobOf<K extends JobType>(job: QueuedJob, type: K): job is QueuedJob<K> {
  return job.type === type;
}
