/**
 * Last-resort handlers: unknown routes get 404, anything thrown past a route
 * (body parser failures, multer limits, programming errors) is turned into JSON
 * instead of crashing the request.
 */
import { ErrorRequestHandler, Request, Response } from 'express';
import { MulterError } from 'multer';
import { logger } from '../../config/logger';
import { isRecord } from '../../ai/prompts/outputSchema';

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: 'not found' });
}

function clientErrorStatus(err: unknown): number | null {
  if (err instanceof MulterError) return 400;
  // body-parser errors carry an http status (400 malformed JSON, 413 too large, ...)
  if (isRecord(err) && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return null;
}

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }
  const message = err instanceof Error ? err.message : String(err);
  const status = clientErrorStatus(err);
  if (status !== null) {
    res.status(status).json({ error: message });
    return;
  }
  logger.error('Unhandled request error', { path: req.originalUrl, error: message });
  res.status(500).json({ error: message });
};
