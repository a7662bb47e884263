import { Router } from 'express';
import { createProductController } from '../controllers/productController';
import { asyncHandler } from '../middlewares/asyncHandler';
import type { CatalogService } from '../services/catalogService';

export function productRoutes(catalog: CatalogService): Router {
  const router = Router();
  const controller = createProductController(catalog);
  router.get('/', asyncHandler(controller.list));
  router.post('/', asyncHandler(controller.create));
  return router;
}
