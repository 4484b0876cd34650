import {
  BadRequestException,
  ConflictException,
  Injectable,
  ServiceUnavailableException,
} from '@nestjs/common';
import {
  BrokerUnavailableError,
  InvalidJobIdError,
  NotReadyError,
  StoreUnavailableError,
  TaskQueue,
} from '@pkg/jobs';
import type { JobRecord } from '@pkg/jobs';
import { logger } from '@pkg/shared';

export type SubmittedJob = {
  id: string;
  state: 'PENDING';
  status_url: string;
  result_url: string;
};

@Injectable()
export class JobsService {
  constructor(private readonly queue: TaskQueue) {}

  async submit(bytes: Buffer, task: string): Promise<SubmittedJob> {
    try {
      const handle = await this.queue.submit(bytes, task);
      return {
        id: handle.id,
        state: 'PENDING',
        status_url: `/jobs/${handle.id}`,
        result_url: `/jobs/${handle.id}/result`,
      };
    } catch (error) {
      throw this.toHttpError(error);
    }
  }

  async getStatus(jobId: string): Promise<JobRecord> {
    try {
      return await this.queue.handle(jobId).status();
    } catch (error) {
      throw this.toHttpError(error);
    }
  }

  /**
   * Same shape as getStatus, but refuses to answer until the job is terminal.
   */
  async getResult(jobId: string): Promise<JobRecord> {
    try {
      const handle = this.queue.handle(jobId);
      const result = await handle.result();
      return typeof result === 'string'
        ? { id: handle.id, state: 'FAILURE', result }
        : { id: handle.id, state: 'SUCCESS', result };
    } catch (error) {
      throw this.toHttpError(error);
    }
  }

  private toHttpError(error: unknown): unknown {
    if (error instanceof NotReadyError) {
      return new ConflictException(`${error.message}. Poll again later.`);
    }
    if (error instanceof InvalidJobIdError) {
      return new BadRequestException(error.message);
    }
    if (
      error instanceof BrokerUnavailableError ||
      error instanceof StoreUnavailableError
    ) {
      logger.error({ service: 'api', error }, 'backend unavailable');
      return new ServiceUnavailableException(error.message);
    }
    return error;
  }
}
