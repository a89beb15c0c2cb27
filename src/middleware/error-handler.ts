import type { Request, Response, NextFunction } from 'express';
import { createLogger } from '../services/logger/index.js';
import { AppError, logError } from '../utils/errors.js';

const log = createLogger('http');

function clientErrorStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null || !('status' in error)) return null;
  const { status } = error;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ error: `Route ${req.method} ${req.path} not found` });
}

/**
 * Last middleware in the chain. AppErrors keep their status code;
 * anything else is a 500 with a generic message.
 */
export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction): void {
  logError(log, 'request_failed', error, { method: req.method, url: req.url });

  if (error instanceof AppError) {
    res.status(error.statusCode).json({ error: error.message, code: error.code });
    return;
  }

  // body-parser rejects malformed JSON with a 4xx `status`
  const status = clientErrorStatus(error);
  if (status !== null) {
    res.status(status).json({ error: 'Malformed request body' });
    return;
  }

  res.status(500).json({ error: 'Internal server error' });
}
