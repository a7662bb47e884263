import { MongoClient } from 'mongodb';
import type { Env } from './env';
import { log, warn, error } from './logger';
import { MongoStore, readyStore, unavailableStore, type Store } from '../repositories/documentStore';

export interface MongoConnection {
  store: Store;
  close(): Promise<void>;
}

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export async function connectMongo(cfg: Env, maxRetries = 5): Promise<MongoConnection> {
  if (!cfg.mongoUri) {
    warn('MongoDB URI not configured. Set MONGO_URI or DATABASE_URL');
    return { store: unavailableStore('not configured'), close: async () => undefined };
  }

  let attempt = 0;
  while (attempt < maxRetries) {
    const client = new MongoClient(cfg.mongoUri, { serverSelectionTimeoutMS: cfg.mongoTimeoutMs });
    try {
      await client.connect();
      const db = client.db(cfg.mongoDbName);
      log(`MongoDB connected (db=${cfg.mongoDbName})`);
      return {
        store: readyStore(new MongoStore(db, cfg.mongoTimeoutMs)),
        close: () => client.close(),
      };
    } catch (err) {
      attempt++;
      error(`MongoDB connection failed (attempt ${attempt}/${maxRetries})`, err);
      await client.close().catch((closeErr: unknown) => warn('MongoDB client close failed', closeErr));
      if (attempt < maxRetries) await sleep(1000 * Math.min(10, attempt * 2));
    }
  }
  // Reads keep working (empty) and writes answer 503 instead of the process exiting
  return { store: unavailableStore('connection failed'), close: async () => undefined };
}
