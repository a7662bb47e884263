export type CatalogError =
  | { kind: 'StoreUnavailable'; message: string }
  | { kind: 'StoreOperationFailed'; message: string }
  | { kind: 'DataIntegrityError'; message: string; documentId?: string }
  | { kind: 'ValidationError'; message: string; issues: string[] };

export type CatalogErrorKind = CatalogError['kind'];

export type Result<T> = { ok: true; value: T } | { ok: false; error: CatalogError };

export const MAX_ERROR_MESSAGE = 50;

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });
export const fail = <T = never>(error: CatalogError): Result<T> => ({ ok: false, error });

export function truncate(message: string, max = MAX_ERROR_MESSAGE): string {
  return message.length > max ? message.slice(0, max) : message;
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message || e.name;
  return String(e);
}

export const storeUnavailable = (): CatalogError => ({
  kind: 'StoreUnavailable',
  message: 'Database not available',
});

/** Wraps a driver failure without carrying the underlying error past the first characters. */
export const storeOperationFailed = (e: unknown): CatalogError => ({
  kind: 'StoreOperationFailed',
  message: truncate(describeError(e)),
});
