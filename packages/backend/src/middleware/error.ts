import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import type { ErrorResponse } from '@notebox/shared';
import { AppError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

export interface ApiError extends Error {
  status_code?: number;
  status?: number; // body-parser uses 'status'
}

function resolve_status(err: ApiError): number {
  if (err instanceof AppError) {
    return err.status_code;
  }
  if (err instanceof multer.MulterError) {
    return err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
  }
  return err.status_code || err.status || 500;
}

export function not_found_middleware(req: Request, res: Response): void {
  res.status(404).json({ error: 'Not found', request_id: req.request_id });
}

export function error_middleware(
  err: ApiError,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const status_code = resolve_status(err);
  const message = err.message || 'Internal server error';

  const log_context: Record<string, unknown> = {
    request_id: req.request_id,
    method: req.method,
    path: req.originalUrl || req.path,
    error: message,
    error_type: err.name,
    status_code,
  };

  // For payload errors, include size info
  if (err.name === 'PayloadTooLargeError' || status_code === 413) {
    log_context.content_length = req.headers['content-length'];
    log_context.content_type = req.headers['content-type'];
  }

  if (status_code >= 500) {
    log_context.stack = err.stack;
    logger.error('request error', log_context);
  } else {
    logger.warn('request error', log_context);
  }

  if (res.headersSent) {
    return;
  }

  res.status(status_code).json({
    error: message,
    request_id: req.request_id,
  } satisfies ErrorResponse);
}
