import { Router } from 'express';
import { z } from 'zod';
import { logger } from '../lib/logger.js';
import { ObjectNotFoundError } from '../lib/errors.js';
import type { LocalObjectStore } from '../services/storage.js';

const signed_query_schema = z.object({
  expires: z.coerce.number().int().positive(),
  signature: z.string().regex(/^[0-9a-f]{64}$/),
});

/** Serves objects of the local store through the links it signs. */
export function create_files_router(store: LocalObjectStore): Router {
  const router = Router();

  router.get('/files/:key', async (req, res) => {
    const key = req.params.key;

    try {
      const query_result = signed_query_schema.safeParse(req.query);
      if (!query_result.success || !store.verify(key, query_result.data)) {
        logger.warn('files/get invalid or expired link', { request_id: req.request_id, key });
        res.status(403).json({ error: 'Invalid or expired link', request_id: req.request_id });
        return;
      }

      const data = await store.get(key);
      res.setHeader('Content-Type', 'application/octet-stream');
      res.setHeader('Content-Disposition', `attachment; filename="${encodeURIComponent(key)}"`);
      res.send(data);
    } catch (err) {
      if (err instanceof ObjectNotFoundError) {
        res.status(404).json({ error: 'File not found', request_id: req.request_id });
        return;
      }
      logger.error('files/get unexpected error', {
        request_id: req.request_id,
        error: String(err),
        stack: err instanceof Error ? err.stack : undefined,
      });
      res.status(500).json({ error: 'Internal server error', request_id: req.request_id });
    }
  });

  return router;
}
