import type { JobSpec } from '../job.types';

export type DeliveryHandler = (job: JobSpec) => Promise<void>;

/**
 * Durable, at-least-once hand-off between submitters and workers.
 */
export interface BrokerChannel {
  /**
   * Records the job durably and returns its id. Does not wait for execution.
   * Rejects with BrokerUnavailableError when the job could not be recorded.
   */
  enqueue(job: JobSpec): Promise<string>;

  /**
   * Delivers at most one job to `handler`. The delivery is acknowledged only
   * once the handler resolves; a rejected handler (or a crashed process)
   * leaves the job to be delivered again.
   * Resolves false when no job was available.
   */
  consume(handler: DeliveryHandler): Promise<boolean>;
}
