import type { Pool, PoolClient } from 'pg';
import { z } from 'zod';
import type {
  JobRecord,
  SettleResult,
  TaskOutcome,
  TerminalRecord,
} from '../job.types';
import { pendingRecord } from '../job.types';
import { StoreUnavailableError } from '../errors';
import type { JobStore } from './job-store';

type JobResultRow = {
  job_id: string;
  state: string;
  result: unknown;
};

const storedRecordSchema = z.discriminatedUnion('state', [
  z.object({ job_id: z.string(), state: z.literal('PENDING') }),
  z.object({
    job_id: z.string(),
    state: z.literal('SUCCESS'),
    result: z.record(z.number()),
  }),
  z.object({
    job_id: z.string(),
    state: z.literal('FAILURE'),
    result: z.string(),
  }),
]);

export class CorruptJobRecordError extends Error {
  constructor(public readonly jobId: string) {
    super(`Stored record for job ${jobId} is not a valid job record`);
    this.name = 'CorruptJobRecordError';
  }
}

export class PgJobStore implements JobStore {
  constructor(private readonly db: Pool) {}

  async ensureSchema(): Promise<void> {
    await this.withClient('schema', (client) =>
      client.query(`
        CREATE TABLE IF NOT EXISTS job_results (
          job_id TEXT PRIMARY KEY,
          state TEXT NOT NULL CHECK (state IN ('PENDING', 'SUCCESS', 'FAILURE')),
          result JSONB,
          created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
          settled_at TIMESTAMPTZ
        )
      `),
    );
  }

  async markPending(jobId: string): Promise<void> {
    await this.withClient('write', (client) =>
      client.query(
        `
        INSERT INTO job_results (job_id, state)
        VALUES ($1, 'PENDING')
        ON CONFLICT (job_id) DO NOTHING
        `,
        [jobId],
      ),
    );
  }

  /**
   * Single conditional upsert: the WHERE clause on the conflict branch is
   * what makes the first terminal write the only one.
   */
  async settle(jobId: string, outcome: TaskOutcome): Promise<SettleResult> {
    const state = outcome.kind === 'success' ? 'SUCCESS' : 'FAILURE';
    const result =
      outcome.kind === 'success' ? outcome.value : outcome.message;

    const written = await this.withClient('write', async (client) => {
      const res = await client.query<JobResultRow>(
        `
        INSERT INTO job_results (job_id, state, result, settled_at)
        VALUES ($1, $2, $3::jsonb, NOW())
        ON CONFLICT (job_id) DO UPDATE
        SET state = EXCLUDED.state,
            result = EXCLUDED.result,
            settled_at = EXCLUDED.settled_at
        WHERE job_results.state = 'PENDING'
        RETURNING job_id, state, result
        `,
        [jobId, state, JSON.stringify(result)],
      );
      return res.rows;
    });

    if (written.length > 0) {
      return { applied: true, record: toTerminal(written[0]) };
    }

    const existing = await this.select(jobId);
    if (!existing) {
      // The conflicting row cannot disappear between the two statements
      // unless something outside this store deletes it.
      throw new StoreUnavailableError(
        'write',
        new Error(`job ${jobId} vanished during settlement`),
      );
    }
    return { applied: false, record: toTerminal(existing) };
  }

  async get(jobId: string): Promise<JobRecord> {
    const row = await this.select(jobId);
    return row ? toRecord(row) : pendingRecord(jobId);
  }

  private async select(jobId: string): Promise<JobResultRow | undefined> {
    const rows = await this.withClient('read', async (client) => {
      const res = await client.query<JobResultRow>(
        'SELECT job_id, state, result FROM job_results WHERE job_id = $1',
        [jobId],
      );
      return res.rows;
    });
    return rows[0];
  }

  private async withClient<T>(
    operation: StoreUnavailableError['operation'],
    fn: (client: PoolClient) => Promise<T>,
  ): Promise<T> {
    let client: PoolClient;
    try {
      client = await this.db.connect();
    } catch (error) {
      throw new StoreUnavailableError(operation, error);
    }

    try {
      return await fn(client);
    } catch (error) {
      throw new StoreUnavailableError(operation, error);
    } finally {
      client.release();
    }
  }
}

function toRecord(row: JobResultRow): JobRecord {
  const parsed = storedRecordSchema.safeParse(row);
  if (!parsed.success) {
    throw new CorruptJobRecordError(row.job_id);
  }

  const stored = parsed.data;
  switch (stored.state) {
    case 'PENDING':
      return pendingRecord(stored.job_id);
    case 'SUCCESS':
      return { id: stored.job_id, state: 'SUCCESS', result: stored.result };
    case 'FAILURE':
      return { id: stored.job_id, state: 'FAILURE', result: stored.result };
  }
}

function toTerminal(row: JobResultRow): TerminalRecord {
  const record = toRecord(row);
  if (record.state === 'PENDING') {
    throw new CorruptJobRecordError(row.job_id);
  }
  return record;
}
