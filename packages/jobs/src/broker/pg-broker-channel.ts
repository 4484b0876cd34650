import type { Pool, PoolClient } from 'pg';
import { logger } from '@pkg/shared';
import type { JobSpec } from '../job.types';
import { BrokerUnavailableError } from '../errors';
import type { BrokerChannel, DeliveryHandler } from './broker-channel';

type QueueRow = {
  id: string;
  job_id: string;
  task_name: string;
  payload: string;
};

/**
 * PostgreSQL-backed queue. A delivery is claimed with FOR UPDATE SKIP LOCKED
 * and the claiming transaction stays open while the handler runs, so the row
 * lock is what keeps competing workers apart. If the worker dies the
 * connection drops, the transaction rolls back and the row becomes visible
 * again.
 */
export class PgBrokerChannel implements BrokerChannel {
  constructor(private readonly db: Pool) {}

  async ensureSchema(): Promise<void> {
    try {
      await this.db.query(`
        CREATE TABLE IF NOT EXISTS job_queue (
          id BIGSERIAL PRIMARY KEY,
          job_id TEXT NOT NULL UNIQUE,
          task_name TEXT NOT NULL,
          payload TEXT NOT NULL,
          enqueued_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )
      `);
    } catch (error) {
      throw new BrokerUnavailableError('schema', error);
    }
  }

  async enqueue(job: JobSpec): Promise<string> {
    let client: PoolClient;
    try {
      client = await this.db.connect();
    } catch (error) {
      throw new BrokerUnavailableError('enqueue', error);
    }

    try {
      await client.query(
        `
        INSERT INTO job_queue (job_id, task_name, payload)
        VALUES ($1, $2, $3)
        `,
        [job.jobId, job.taskName, job.payload],
      );
    } catch (error) {
      throw new BrokerUnavailableError('enqueue', error);
    } finally {
      client.release();
    }

    logger.info(
      { service: 'broker', job_id: job.jobId, task: job.taskName },
      'job enqueued',
    );
    return job.jobId;
  }

  async consume(handler: DeliveryHandler): Promise<boolean> {
    let client: PoolClient;
    try {
      client = await this.db.connect();
    } catch (error) {
      throw new BrokerUnavailableError('consume', error);
    }

    try {
      await this.run(client, 'BEGIN');

      const result = await this.run<QueueRow>(
        client,
        `
        SELECT id, job_id, task_name, payload
        FROM job_queue
        ORDER BY id ASC
        FOR UPDATE SKIP LOCKED
        LIMIT 1
        `,
      );

      if (result.length === 0) {
        await this.run(client, 'COMMIT');
        return false;
      }

      const row = result[0];
      logger.info(
        { service: 'broker', job_id: row.job_id, task: row.task_name },
        'job delivered',
      );

      await handler({
        jobId: row.job_id,
        taskName: row.task_name,
        payload: row.payload,
      });

      // Acknowledge
      await this.run(client, 'DELETE FROM job_queue WHERE id = $1', [row.id]);
      await this.run(client, 'COMMIT');
      return true;
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        logger.warn(
          { service: 'broker', error: rollbackError },
          'rollback failed',
        );
      });
      throw error;
    } finally {
      client.release();
    }
  }

  private async run<T extends Record<string, unknown>>(
    client: PoolClient,
    sql: string,
    params: unknown[] = [],
  ): Promise<T[]> {
    try {
      const result = await client.query<T>(sql, params);
      return result.rows;
    } catch (error) {
      throw new BrokerUnavailableError('consume', error);
    }
  }
}
