import { Request, Response } from 'express';
import { productQuerySchema } from '../schemas/product';
import type { CatalogService } from '../services/catalogService';
import { sendError } from './respond';

export function createProductController(catalog: CatalogService) {
  return {
    list: async (req: Request, res: Response) => {
      const query = productQuerySchema.safeParse(req.query);
      if (!query.success) {
        return sendError(res, {
          kind: 'ValidationError',
          message: 'Invalid query',
          issues: query.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
        });
      }
      const result = await catalog.listProducts(query.data);
      if (!result.ok) return sendError(res, result.error);
      res.json(result.value);
    },
    create: async (req: Request, res: Response) => {
      const result = await catalog.createProduct(req.body);
      if (!result.ok) return sendError(res, result.error);
      res.status(201).json(result.value);
    },
  };
}
