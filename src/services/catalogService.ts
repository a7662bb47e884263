import type { Document } from 'mongodb';
import { logger as defaultLogger, type Logger } from '../config/logger';
import { KeyedLock } from '../lib/keyedLock';
import {
  describeError,
  fail,
  ok,
  storeOperationFailed,
  storeUnavailable,
  truncate,
  type Result,
} from '../lib/result';
import type { Store, StoreHandle } from '../repositories/documentStore';
import {
  productInputSchema,
  type Product,
  type ProductInput,
  type ProductQuery,
} from '../schemas/product';
import { buildProductFilter } from './productFilter';
import { normalizeProduct } from './productNormalizer';
import { SAMPLE_PRODUCTS } from './sampleProducts';

export type SeedOutcome = { seeded: true; count: number } | { seeded: false; existing: number };

export interface StoreDiagnostics {
  backend: string;
  database: string;
  database_url: string | null;
  database_name: string | null;
  connection_status: 'Connected' | 'Not Connected';
  collections: string[];
}

export interface CatalogServiceOptions {
  store: Store;
  collection?: string;
  logger?: Logger;
  /** Whether a connection string was supplied, reported by diagnostics. */
  connectionConfigured?: boolean;
  now?: () => Date;
}

export type CatalogService = ReturnType<typeof createCatalogService>;

function toDocument(input: ProductInput, at: Date): Document {
  return { ...input, created_at: at, updated_at: at };
}

function byCodePoint(a: string, b: string): number {
  const x = Array.from(a, (c) => c.codePointAt(0) ?? 0);
  const y = Array.from(b, (c) => c.codePointAt(0) ?? 0);
  for (let i = 0; i < Math.min(x.length, y.length); i++) {
    if (x[i] !== y[i]) return x[i] - y[i];
  }
  return x.length - y.length;
}

// Only one seed per collection runs at a time in this process
const seedLock = new KeyedLock();

export function createCatalogService(opts: CatalogServiceOptions) {
  const { store } = opts;
  const collection = opts.collection ?? 'product';
  const logger = opts.logger ?? defaultLogger;
  const now = opts.now ?? (() => new Date());

  async function attempt<T>(op: string, run: (handle: StoreHandle) => Promise<T>): Promise<Result<T>> {
    if (store.status !== 'ready') return fail(storeUnavailable());
    try {
      return ok(await run(store.handle));
    } catch (e) {
      logger.error(`[catalog] ${op} failed on ${collection}`, e);
      return fail(storeOperationFailed(e));
    }
  }

  return {
    async listProducts(query: ProductQuery = {}): Promise<Result<Product[]>> {
      if (store.status !== 'ready') return ok([]);
      const found = await attempt('find', (h) => h.find(collection, buildProductFilter(query)));
      if (!found.ok) return found;
      const products: Product[] = [];
      for (const doc of found.value) {
        const normalized = normalizeProduct(doc);
        if (!normalized.ok) {
          logger.warn(`[catalog] ${normalized.error.message}`);
          return normalized;
        }
        products.push(normalized.value);
      }
      return ok(products);
    },

    async listCategories(): Promise<Result<string[]>> {
      if (store.status !== 'ready') return ok([]);
      const values = await attempt('distinct', (h) => h.distinct(collection, 'category'));
      if (!values.ok) return values;
      const unique = new Set(values.value.filter((v): v is string => typeof v === 'string'));
      return ok([...unique].sort(byCodePoint));
    },

    async createProduct(input: unknown): Promise<Result<{ id: string }>> {
      const parsed = productInputSchema.safeParse(input);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`);
        return fail({ kind: 'ValidationError', message: 'Invalid product', issues });
      }
      const created = await attempt('insertOne', (h) => h.insertOne(collection, toDocument(parsed.data, now())));
      if (!created.ok) return created;
      logger.log(`[catalog] created product ${created.value} in ${collection}`);
      return ok({ id: created.value });
    },

    /**
     * Inserts the sample products when the collection is empty. Concurrent
     * calls in this process queue behind each other, so only the first one
     * inserts. Separate processes seeding the same empty collection can
     * still both insert.
     */
    seedSamples(): Promise<Result<SeedOutcome>> {
      return seedLock.run(collection, async (): Promise<Result<SeedOutcome>> => {
        const existing = await attempt('count', (h) => h.count(collection, {}));
        if (!existing.ok) return existing;
        if (existing.value > 0) return ok<SeedOutcome>({ seeded: false, existing: existing.value });
        const at = now();
        const docs = SAMPLE_PRODUCTS.map((p) => toDocument(p, at));
        const inserted = await attempt('insertMany', (h) => h.insertMany(collection, docs));
        if (!inserted.ok) return inserted;
        logger.log(`[catalog] seeded ${inserted.value.length} sample products into ${collection}`);
        return ok<SeedOutcome>({ seeded: true, count: inserted.value.length });
      });
    },

    async describeStore(): Promise<StoreDiagnostics> {
      const report: StoreDiagnostics = {
        backend: 'Running',
        database: 'Not Available',
        database_url: opts.connectionConfigured === undefined ? null : opts.connectionConfigured ? 'Set' : 'Not Set',
        database_name: null,
        connection_status: 'Not Connected',
        collections: [],
      };
      if (store.status !== 'ready') {
        report.database = `Not Available (${store.reason})`;
        return report;
      }
      report.database = 'Available';
      report.database_name = store.handle.databaseName;
      report.connection_status = 'Connected';
      try {
        report.collections = (await store.handle.listCollections()).slice(0, 10);
        report.database = 'Connected & Working';
      } catch (e) {
        report.database = `Connected but Error: ${truncate(describeError(e))}`;
      }
      return report;
    },
  };
}
