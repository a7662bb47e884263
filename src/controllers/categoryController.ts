import { Request, Response } from 'express';
import type { CatalogService } from '../services/catalogService';
import { sendError } from './respond';

export function createCategoryController(catalog: CatalogService) {
  return {
    list: async (_req: Request, res: Response) => {
      const result = await catalog.listCategories();
      if (!result.ok) return sendError(res, result.error);
      res.json(result.value);
    },
  };
}
