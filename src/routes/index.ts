import { Router } from 'express';
import { createSeedController } from '../controllers/seedController';
import { asyncHandler } from '../middlewares/asyncHandler';
import type { CatalogService } from '../services/catalogService';
import { categoryRoutes } from './categories';
import { productRoutes } from './products';

export function buildRouter(catalog: CatalogService): Router {
  const router = Router();
  router.use('/products', productRoutes(catalog));
  router.use('/categories', categoryRoutes(catalog));
  router.post('/seed', asyncHandler(createSeedController(catalog).seed));
  return router;
}
