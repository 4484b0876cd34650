import { randomUUID } from 'crypto';
import { logger } from '@pkg/shared';
import { encode } from './codec/payload-codec';
import { JobHandle } from './job-handle';
import { FILE_STATS_TASK } from './task-names';
import type { BrokerChannel } from './broker/broker-channel';
import type { JobStore } from './store/job-store';

export type TaskQueueOptions = {
  /** Defaults to random UUIDs. */
  idFactory?: () => string;
};

/**
 * Submitter side of the job lifecycle.
 */
export class TaskQueue {
  private readonly idFactory: () => string;

  constructor(
    private readonly broker: BrokerChannel,
    private readonly store: JobStore,
    options: TaskQueueOptions = {},
  ) {
    this.idFactory = options.idFactory ?? randomUUID;
  }

  /**
   * Enqueues `content` for `taskName` and returns immediately.
   *
   * The job is enqueued before its PENDING record is written: a broker
   * failure then leaves nothing behind, and unknown ids read as PENDING
   * anyway. markPending never overwrites a settlement that got there first.
   * Once the job is enqueued it will run, so a failed PENDING write is only
   * logged and the handle is still returned.
   */
  async submit(
    content: Uint8Array | string,
    taskName: string = FILE_STATS_TASK,
  ): Promise<JobHandle> {
    const bytes =
      typeof content === 'string' ? Buffer.from(content, 'utf8') : content;
    const jobId = this.idFactory();
    const handle = new JobHandle(jobId, this.store);

    await this.broker.enqueue({
      jobId,
      taskName,
      payload: encode(bytes),
    });
    try {
      await this.store.markPending(jobId);
    } catch (error) {
      logger.warn(
        { service: 'api', job_id: jobId, error },
        'pending record not written',
      );
    }

    logger.info(
      { service: 'api', job_id: jobId, task: taskName, bytes: bytes.length },
      'job submitted',
    );
    return handle;
  }

  handle(jobId: string): JobHandle {
    return new JobHandle(jobId, this.store);
  }
}
