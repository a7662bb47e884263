import { Router } from 'express';
import { createCategoryController } from '../controllers/categoryController';
import { asyncHandler } from '../middlewares/asyncHandler';
import type { CatalogService } from '../services/catalogService';

export function categoryRoutes(catalog: CatalogService): Router {
  const router = Router();
  router.get('/', asyncHandler(createCategoryController(catalog).list));
  return router;
}
