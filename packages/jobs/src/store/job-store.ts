import type { JobRecord, SettleResult, TaskOutcome } from '../job.types';

/**
 * Result backend: terminal state and outcome per job id.
 *
 * Reads need no lock. An id the store has never seen reads as PENDING.
 * Failures to reach the backend reject with StoreUnavailableError.
 */
export interface JobStore {
  /** Records a PENDING entry unless one (of any state) already exists. */
  markPending(jobId: string): Promise<void>;

  /** First writer wins; later settlements return the stored record. */
  settle(jobId: string, outcome: TaskOutcome): Promise<SettleResult>;

  get(jobId: string): Promise<JobRecord>;
}
