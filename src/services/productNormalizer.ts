import { Decimal128 } from 'mongodb';
import { fail, ok, type Result } from '../lib/result';
import type { Product, ProductDocument } from '../schemas/product';

type Coerced<T> = { ok: true; value: T } | { ok: false; reason: string };

function coercePrice(raw: unknown): Coerced<number> {
  if (raw === undefined || raw === null) return { ok: true, value: 0 };
  let n: number;
  if (typeof raw === 'number') n = raw;
  else if (typeof raw === 'boolean') n = raw ? 1 : 0;
  else if (typeof raw === 'string' && raw.trim() !== '') {
    n = Number(raw.trim());
    if (Number.isNaN(n)) return { ok: false, reason: 'price is not numeric (string)' };
  } else if (raw instanceof Decimal128) n = Number(raw.toString());
  else return { ok: false, reason: `price is not numeric (${typeof raw})` };
  return Number.isFinite(n) ? { ok: true, value: n } : { ok: false, reason: `price is not finite (${String(raw)})` };
}

function optionalText(field: string, raw: unknown): Coerced<string | null> {
  if (raw === undefined || raw === null) return { ok: true, value: null };
  if (typeof raw === 'string') return { ok: true, value: raw };
  return { ok: false, reason: `${field} is not a string` };
}

/**
 * Maps a stored document to the public product shape.
 *
 * Missing optional fields fall back to defaults (`price` 0, `in_stock` true,
 * no `description`). A value that is present but cannot be read as the
 * expected type is a data integrity failure, not a default.
 */
export function normalizeProduct(doc: ProductDocument): Result<Product> {
  const id = doc._id === undefined || doc._id === null ? '' : String(doc._id);
  if (!id) return fail({ kind: 'DataIntegrityError', message: 'document has no identifier' });

  const integrity = (reason: string) =>
    fail<Product>({ kind: 'DataIntegrityError', message: `product ${id}: ${reason}`, documentId: id });

  const title = optionalText('title', doc.title);
  if (!title.ok) return integrity(title.reason);
  const category = optionalText('category', doc.category);
  if (!category.ok) return integrity(category.reason);
  const price = coercePrice(doc.price);
  if (!price.ok) return integrity(price.reason);

  const product: Product = {
    id,
    title: title.value,
    price: price.value,
    category: category.value,
    in_stock: doc.in_stock === undefined ? true : Boolean(doc.in_stock),
  };
  if (typeof doc.description === 'string') product.description = doc.description;
  return ok(product);
}
