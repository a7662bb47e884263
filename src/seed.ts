import { env } from './config/env';
import { log, error } from './config/logger';
import { connectMongo } from './config/mongo';
import { createCatalogService } from './services/catalogService';

async function run() {
  const connection = await connectMongo(env, 1);
  try {
    const catalog = createCatalogService({ store: connection.store, collection: env.productCollection });
    const result = await catalog.seedSamples();
    if (!result.ok) throw new Error(`[seed] ${result.error.kind}: ${result.error.message}`);
    if (result.value.seeded) log(`[seed] Inserted ${result.value.count} sample products`);
    else log(`[seed] Skipped, ${result.value.existing} products already present`);
  } finally {
    await connection.close();
  }
}

run().catch((e: unknown) => {
  error('Seed failed', e);
  process.exit(1);
});
