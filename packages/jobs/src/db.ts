import { Pool } from 'pg';
import { logger } from '@pkg/shared';

export type PoolName = 'broker' | 'store';

/**
 * One pool per backend. The broker and the result store may point at the same
 * database; they still get separate pools so a slow store cannot starve the
 * broker of connections.
 *
 * An idle client that loses its connection is discarded by pg and reported
 * here; the next checkout opens a fresh one.
 */
export function createPool(
  name: PoolName,
  connectionString: string,
  max: number,
): Pool {
  const pool = new Pool({ connectionString, max });
  pool.on('error', (error) => {
    logger.error({ service: 'db', pool: name, error }, 'idle client error');
  });
  return pool;
}
