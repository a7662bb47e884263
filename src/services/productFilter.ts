import type { ProductQuery } from '../schemas/product';

type Contains = { $regex: string; $options: 'i' };

export type ProductFilter = {
  category?: string;
  $or?: [{ title: Contains }, { description: Contains }];
};

export function escapeRegex(input: string): string {
  // MongoDB rejects patterns holding a raw NUL byte
  return input.replace(/[.*+?^${}()|[\]\\]/g, '\\$&').replace(/\u0000/g, '\\x00');
}

// Both keys on one filter object are ANDed by the store
export function buildProductFilter({ category, q }: ProductQuery): ProductFilter {
  const filter: ProductFilter = {};
  if (category) filter.category = category;
  if (q) {
    const contains: Contains = { $regex: escapeRegex(q), $options: 'i' };
    filter.$or = [{ title: contains }, { description: contains }];
  }
  return filter;
}
