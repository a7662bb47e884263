import 'dotenv/config';

type EnvSource = Record<string, string | undefined>;

function int(value: string | undefined, fallback: number): number {
  const n = parseInt(value ?? '', 10);
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

export function loadEnv(source: EnvSource = process.env) {
  return {
    nodeEnv: source.NODE_ENV ?? 'development',
    port: int(source.PORT, 8000),
    // Optional: without a URI the API runs with an unavailable store
    mongoUri: source.MONGO_URI || source.DATABASE_URL || null,
    mongoDbName: source.MONGO_DB_NAME || source.DATABASE_NAME || 'catalog',
    mongoTimeoutMs: int(source.MONGO_TIMEOUT_MS, 5000),
    productCollection: source.PRODUCT_COLLECTION || 'product',
    corsOrigins: (source.CORS_ORIGINS ?? '').split(',').map((o) => o.trim()).filter(Boolean),
  };
}

export type Env = ReturnType<typeof loadEnv>;

export const env: Env = loadEnv();
