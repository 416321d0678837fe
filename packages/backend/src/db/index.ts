import pg from 'pg';
import { logger } from '../lib/logger.js';

const { Pool } = pg;

export interface Queryable {
  query<T extends pg.QueryResultRow>(text: string, params?: unknown[]): Promise<pg.QueryResult<T>>;
}

export interface TransactionClient extends Queryable {
  release(): void;
}

/** The subset of `pg.Pool` the application relies on. */
export interface PoolLike extends Queryable {
  connect(): Promise<TransactionClient>;
  end(): Promise<void>;
}

export interface Database extends Queryable {
  /**
   * Runs `fn` inside BEGIN/COMMIT on a dedicated client. Any error rolls the
   * whole unit back and is rethrown.
   */
  transaction<T>(fn: (client: Queryable) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export function create_pool(connection_string: string): pg.Pool {
  const pool = new Pool({ connectionString: connection_string });

  pool.on('error', (err) => {
    logger.error('database pool error', { error: err.message });
  });

  return pool;
}

export function create_database(pool: PoolLike): Database {
  async function query<T extends pg.QueryResultRow>(
    text: string,
    params?: unknown[]
  ): Promise<pg.QueryResult<T>> {
    const start = Date.now();
    const result = await pool.query<T>(text, params);
    const duration_ms = Date.now() - start;

    logger.debug('query executed', {
      query: text.substring(0, 100),
      rows: result.rowCount,
      duration_ms,
    });

    return result;
  }

  async function transaction<T>(fn: (client: Queryable) => Promise<T>): Promise<T> {
    const client = await pool.connect();

    try {
      await client.query('BEGIN');
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollback_error) {
        logger.error('transaction rollback failed', {
          error: rollback_error instanceof Error ? rollback_error.message : String(rollback_error),
        });
      }
      throw error;
    } finally {
      client.release();
    }
  }

  return {
    query,
    transaction,
    close: () => pool.end(),
  };
}
