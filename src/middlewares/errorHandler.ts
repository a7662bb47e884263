import type { NextFunction, Request, Response } from 'express';
import { error } from '../config/logger';

function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

export function notFound(req: Request, res: Response) {
  res.status(404).json({ success: false, error: `Not found: ${req.method} ${req.path}` });
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) return next(err);
  const status = statusOf(err);
  if (status >= 400 && status < 500) {
    // body-parser marks malformed JSON and oversized payloads as client errors
    return res.status(status).json({ success: false, error: err instanceof Error ? err.message : 'Bad request' });
  }
  error(`[http] ${req.method} ${req.originalUrl} failed`, err);
  res.status(500).json({ success: false, error: 'Internal server error' });
}
