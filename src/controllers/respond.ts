import type { Response } from 'express';
import type { CatalogError, CatalogErrorKind } from '../lib/result';

const STATUS: Record<CatalogErrorKind, number> = {
  ValidationError: 422,
  StoreUnavailable: 503,
  StoreOperationFailed: 500,
  DataIntegrityError: 500,
};

export function sendError(res: Response, err: CatalogError) {
  const status = STATUS[err.kind];
  if (err.kind === 'ValidationError') {
    return res.status(status).json({ success: false, error: err.message, details: err.issues });
  }
  return res.status(status).json({ success: false, error: err.message });
}
