import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import { buildCors } from './config/cors';
import { asyncHandler } from './middlewares/asyncHandler';
import { errorHandler, notFound } from './middlewares/errorHandler';
import { buildRouter } from './routes';
import type { CatalogService } from './services/catalogService';

export interface AppOptions {
  corsOrigins?: string[];
  requestLogging?: boolean;
}

export function createApp(catalog: CatalogService, opts: AppOptions = {}) {
  const app = express();
  app.use(helmet());
  app.use(buildCors(opts.corsOrigins ?? []));
  app.use(express.json());
  if (opts.requestLogging ?? true) app.use(morgan('dev'));

  app.get('/', (_req, res) => res.json({ message: 'Catalog backend running' }));
  app.get('/health', (_req, res) => res.json({ ok: true }));
  app.get('/test', asyncHandler(async (_req, res) => res.json(await catalog.describeStore())));

  app.use('/api', buildRouter(catalog));
  app.use(notFound);
  app.use(errorHandler);
  return app;
}
