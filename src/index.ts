import { createApp } from './app';
import { env } from './config/env';
import { log, error } from './config/logger';
import { connectMongo } from './config/mongo';
import { createCatalogService } from './services/catalogService';

async function bootstrap() {
  const connection = await connectMongo(env);
  const catalog = createCatalogService({
    store: connection.store,
    collection: env.productCollection,
    connectionConfigured: Boolean(env.mongoUri),
  });
  const app = createApp(catalog, {
    corsOrigins: env.corsOrigins,
    requestLogging: env.nodeEnv !== 'test',
  });

  const server = app.listen(env.port, () => {
    log(`Server listening on http://localhost:${env.port}`);
  });

  const shutdown = (signal: string) => {
    log(`${signal} received, shutting down`);
    server.close(() => {
      connection.close().then(
        () => process.exit(0),
        (e: unknown) => {
          error('MongoDB close failed', e);
          process.exit(1);
        },
      );
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

bootstrap().catch((e: unknown) => {
  error('Bootstrap failed', e);
  process.exit(1);
});
