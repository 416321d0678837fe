import { Request, Response, NextFunction, RequestHandler } from 'express';
import { verify_init_data } from '../lib/auth.js';
import { logger } from '../lib/logger.js';
import type { Actor } from '../services/access.js';

declare global {
  namespace Express {
    interface Request {
      auth_user_id?: number;
    }
  }
}

export interface AuthOptions {
  /** When false the middleware lets every request through untouched. */
  required: boolean;
  bot_token: string;
  max_age_seconds: number;
}

const SCHEME = 'tma ';

export function read_init_data(req: Request): string | null {
  const header = req.headers.authorization;
  if (!header || !header.toLowerCase().startsWith(SCHEME)) {
    return null;
  }
  return header.slice(SCHEME.length).trim() || null;
}

export function actor_of(req: Request): Actor {
  return req.auth_user_id ?? null;
}

export function create_auth_middleware(options: AuthOptions): RequestHandler {
  return function require_auth(req: Request, res: Response, next: NextFunction): void {
    if (!options.required) {
      next();
      return;
    }

    const init_data = read_init_data(req);
    if (!init_data) {
      logger.warn('auth: missing init data', { request_id: req.request_id, path: req.path });
      res.status(401).json({ error: 'Unauthorized', request_id: req.request_id });
      return;
    }

    const result = verify_init_data(init_data, options.bot_token, options.max_age_seconds);
    if (!result.valid) {
      logger.warn('auth: invalid init data', {
        request_id: req.request_id,
        path: req.path,
        reason: result.reason,
      });
      res.status(401).json({ error: 'Invalid init data', request_id: req.request_id });
      return;
    }

    if (result.user_id === null) {
      logger.warn('auth: init data carries no user', { request_id: req.request_id, path: req.path });
      res.status(401).json({ error: 'Init data carries no user', request_id: req.request_id });
      return;
    }

    req.auth_user_id = result.user_id;
    next();
  };
}
