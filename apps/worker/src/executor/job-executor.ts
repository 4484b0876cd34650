import { Inject, Injectable } from '@nestjs/common';
import { logger, sleep } from '@pkg/shared';
import { DecodeError, decode, failure } from '@pkg/jobs';
import type {
  JobSpec,
  JobStore,
  SettleResult,
  TaskOutcome,
} from '@pkg/jobs';
import { TaskRegistry } from '../tasks';
import { UnknownTaskError } from '../errors';
import type { DelayStrategy } from '../delay/delay-strategy';
import { DELAY_STRATEGY, JOB_STORE } from '../tokens';

/**
 * Runs one delivered job and settles it.
 *
 * Decode failures, unknown tasks and errors thrown by a task all become a
 * FAILURE outcome. Only store errors escape, which leaves the delivery
 * unacknowledged so the broker hands it out again.
 */
@Injectable()
export class JobExecutor {
  constructor(
    @Inject(JOB_STORE) private readonly store: JobStore,
    private readonly tasks: TaskRegistry,
    @Inject(DELAY_STRATEGY) private readonly delay: DelayStrategy,
  ) {}

  async execute(job: JobSpec): Promise<SettleResult> {
    const existing = await this.store.get(job.jobId);
    if (existing.state !== 'PENDING') {
      logger.info(
        { service: 'worker', job_id: job.jobId, state: existing.state },
        'duplicate delivery',
      );
      return { applied: false, record: existing };
    }

    const outcome = await this.run(job);

    const delayMs = this.delay.nextDelayMs();
    await sleep(delayMs);

    const settled = await this.store.settle(job.jobId, outcome);
    logger.info(
      {
        service: 'worker',
        job_id: job.jobId,
        task: job.taskName,
        state: settled.record.state,
        delay_ms: delayMs,
      },
      settled.applied ? 'job settled' : 'duplicate settlement',
    );
    return settled;
  }

  private async run(job: JobSpec): Promise<TaskOutcome> {
    try {
      const input = decode(job.payload);
      const task = this.tasks.get(job.taskName);
      return await task(input);
    } catch (error) {
      if (error instanceof DecodeError || error instanceof UnknownTaskError) {
        logger.warn(
          { service: 'worker', job_id: job.jobId, reason: error.message },
          'job rejected',
        );
        return failure(error.message);
      }

      logger.error(
        { service: 'worker', job_id: job.jobId, task: job.taskName, error },
        'task threw',
      );
      return failure(
        error instanceof Error && error.message !== ''
          ? error.message
          : `task ${job.taskName} failed`,
      );
    }
  }
}
