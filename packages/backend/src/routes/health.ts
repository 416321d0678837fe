import { Router } from 'express';
import type { HealthResponse } from '@notebox/shared';
import type { Queryable } from '../db/index.js';
import type { ObjectStore } from '../services/storage.js';
import { logger } from '../lib/logger.js';

async function probe(name: string, check: () => Promise<unknown>): Promise<boolean> {
  try {
    await check();
    return true;
  } catch (err) {
    logger.warn('health probe failed', { probe: name, error: err instanceof Error ? err.message : String(err) });
    return false;
  }
}

export function create_health_router(database: Queryable, object_store: ObjectStore): Router {
  const router = Router();

  router.get('/health', async (_req, res) => {
    const [db_ok, storage_ok] = await Promise.all([
      probe('database', () => database.query('SELECT 1')),
      probe('storage', () => object_store.ping()),
    ]);

    const body: HealthResponse = {
      status: db_ok && storage_ok ? 'ok' : 'error',
      database: db_ok ? 'connected' : 'disconnected',
      storage: storage_ok ? 'connected' : 'disconnected',
    };
    res.status(body.status === 'ok' ? 200 : 503).json(body);
  });

  return router;
}
