import type { JobRecord, JobValue } from './job.types';
import { isValidJobId } from './job.types';
import { InvalidJobIdError, NotReadyError } from './errors';
import type { JobStore } from './store/job-store';

/**
 * Client-side view of one job. Holds nothing but the id, so a handle rebuilt
 * from a bare id after a restart behaves exactly like the one returned by
 * submit.
 */
export class JobHandle {
  constructor(
    readonly id: string,
    private readonly store: JobStore,
  ) {
    if (!isValidJobId(id)) {
      throw new InvalidJobIdError(id);
    }
  }

  /** `result` is null while the job is PENDING. */
  status(): Promise<JobRecord> {
    return this.store.get(this.id);
  }

  async isSuccessful(): Promise<boolean> {
    const record = await this.status();
    return record.state === 'SUCCESS';
  }

  /**
   * Statistics for a successful job, the failure message for a failed one.
   * Rejects with NotReadyError while the job is PENDING.
   */
  async result(): Promise<JobValue | string> {
    const record = await this.status();
    if (record.state === 'PENDING') {
      throw new NotReadyError(this.id);
    }
    return record.result;
  }

  toString(): string {
    return `<JobHandle ${this.id}>`;
  }
}
