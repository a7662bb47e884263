import { z } from 'zod';

export const productInputSchema = z.object({
  title: z.string().min(1),
  description: z.string().optional(),
  price: z.number().finite().min(0),
  category: z.string().min(1),
  in_stock: z.boolean().default(true),
});

export type ProductInput = z.infer<typeof productInputSchema>;

/** Public representation returned to the storefront. */
export interface Product {
  id: string;
  title: string | null;
  description?: string;
  price: number;
  category: string | null;
  in_stock: boolean;
}

/** A product as it may sit in the collection: nothing is guaranteed. */
export interface ProductDocument {
  _id?: unknown;
  title?: unknown;
  description?: unknown;
  price?: unknown;
  category?: unknown;
  in_stock?: unknown;
  [field: string]: unknown;
}

export interface ProductQuery {
  category?: string;
  q?: string;
}

export const productQuerySchema = z.object({
  category: z.string().optional(),
  q: z.string().optional(),
});
