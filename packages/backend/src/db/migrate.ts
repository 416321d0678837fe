import { readdir, readFile } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { PoolLike } from './index.js';
import { logger } from '../lib/logger.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
// src/db and dist/db both sit two levels below the package root
export const MIGRATIONS_DIR = join(__dirname, '..', '..', 'migrations');

async function ensure_migrations_table(pool: PoolLike): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      filename TEXT NOT NULL UNIQUE,
      applied_at TIMESTAMPTZ DEFAULT NOW()
    )
  `);
}

async function get_applied_migrations(pool: PoolLike): Promise<Set<string>> {
  const result = await pool.query<{ filename: string }>(
    'SELECT filename FROM schema_migrations ORDER BY id'
  );
  return new Set(result.rows.map((row) => row.filename));
}

export async function get_pending_migrations(
  applied: Set<string>,
  migrations_dir: string = MIGRATIONS_DIR
): Promise<string[]> {
  const files = await readdir(migrations_dir);
  return files
    .filter((f) => f.endsWith('.sql') && !applied.has(f))
    .sort();
}

async function run_migration(pool: PoolLike, migrations_dir: string, filename: string): Promise<void> {
  const sql = await readFile(join(migrations_dir, filename), 'utf-8');

  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    await client.query(sql);
    await client.query(
      'INSERT INTO schema_migrations (filename) VALUES ($1)',
      [filename]
    );
    await client.query('COMMIT');
    logger.info('migration applied', { filename });
  } catch (err) {
    await client.query('ROLLBACK');
    throw err;
  } finally {
    client.release();
  }
}

export async function run_migrations(
  pool: PoolLike,
  migrations_dir: string = MIGRATIONS_DIR
): Promise<string[]> {
  logger.info('starting migrations');

  await ensure_migrations_table(pool);
  const applied = await get_applied_migrations(pool);
  const pending = await get_pending_migrations(applied, migrations_dir);

  if (pending.length === 0) {
    logger.info('no pending migrations');
    return [];
  }

  logger.info('pending migrations', { count: pending.length, files: pending });

  for (const filename of pending) {
    await run_migration(pool, migrations_dir, filename);
  }

  logger.info('migrations complete', { applied: pending.length });
  return pending;
}

// Run directly if this is the main module
const is_main = process.argv[1]?.endsWith('migrate.ts') || process.argv[1]?.endsWith('migrate.js');
if (is_main) {
  const { config } = await import('../config.js');
  const { create_pool } = await import('./index.js');
  const pool = create_pool(config.database_url);

  try {
    await run_migrations(pool);
  } catch (err) {
    logger.error('migration failed', {
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}
