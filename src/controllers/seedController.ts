import { Request, Response } from 'express';
import type { CatalogService } from '../services/catalogService';
import { sendError } from './respond';

export function createSeedController(catalog: CatalogService) {
  return {
    seed: async (_req: Request, res: Response) => {
      const result = await catalog.seedSamples();
      if (!result.ok) return sendError(res, result.error);
      res.json({ status: 'ok', ...result.value });
    },
  };
}
