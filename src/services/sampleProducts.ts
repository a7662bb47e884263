import type { ProductInput } from '../schemas/product';

export const SAMPLE_PRODUCTS: readonly ProductInput[] = [
  {
    title: 'Classic White T-Shirt',
    description: 'Soft cotton tee for everyday wear.',
    price: 14.99,
    category: 'Clothes',
    in_stock: true,
  },
  {
    title: 'Organic Granola',
    description: 'Crunchy, honey-sweetened breakfast granola.',
    price: 7.49,
    category: 'Food',
    in_stock: true,
  },
  {
    title: 'Bluetooth Headphones',
    description: 'Noise-isolating on-ear headphones with 20h battery.',
    price: 59.99,
    category: 'Electronics',
    in_stock: true,
  },
  {
    title: 'Stainless Water Bottle',
    description: 'Keeps drinks cold for 24h and hot for 12h.',
    price: 19.99,
    category: 'Home',
    in_stock: true,
  },
  {
    title: 'Gourmet Dark Chocolate',
    description: '70% cacao premium chocolate bar.',
    price: 3.99,
    category: 'Food',
    in_stock: true,
  },
];
