import request from 'supertest';
import { createApp } from '../../src/app';
import { silentLogger } from '../../src/config/logger';
import { readyStore, unavailableStore } from '../../src/repositories/documentStore';
import { createCatalogService } from '../../src/services/catalogService';
import { InMemoryStore } from '../support/in-memory-store';

function buildApp(store = new InMemoryStore()) {
  const catalog = createCatalogService({
    store: readyStore(store),
    logger: silentLogger,
    connectionConfigured: true,
  });
  return { store, app: createApp(catalog, { requestLogging: false }) };
}

function buildUnavailableApp() {
  const catalog = createCatalogService({
    store: unavailableStore('not configured'),
    logger: silentLogger,
    connectionConfigured: false,
  });
  return createApp(catalog, { requestLogging: false });
}

describe('catalog HTTP API', () => {
  it('answers the root banner and health check', async () => {
    const { app } = buildApp();
    await request(app).get('/').expect(200, { message: 'Catalog backend running' });
    await request(app).get('/health').expect(200, { ok: true });
  });

  it('seeds the sample products once', async () => {
    const { app } = buildApp();
    await request(app).post('/api/seed').expect(200, { status: 'ok', seeded: true, count: 5 });
    await request(app).post('/api/seed').expect(200, { status: 'ok', seeded: false, existing: 5 });
  });

  it('lists, filters and facets the seeded catalog', async () => {
    const { app } = buildApp();
    await request(app).post('/api/seed').expect(200);

    const all = await request(app).get('/api/products').expect(200);
    expect(all.body).toHaveLength(5);

    const chocolate = await request(app).get('/api/products').query({ category: 'Food', q: 'cacao' }).expect(200);
    expect(chocolate.body).toEqual([
      {
        id: expect.any(String),
        title: 'Gourmet Dark Chocolate',
        description: '70% cacao premium chocolate bar.',
        price: 3.99,
        category: 'Food',
        in_stock: true,
      },
    ]);

    const food = await request(app).get('/api/products?category=Food').expect(200);
    expect(food.body.map((p: { title: string }) => p.title)).toEqual(['Organic Granola', 'Gourmet Dark Chocolate']);

    await request(app).get('/api/products?q=%28%28').expect(200, []);
    await request(app).get('/api/categories').expect(200, ['Clothes', 'Electronics', 'Food', 'Home']);
  });

  it('creates a product that then appears in the listing', async () => {
    const { app } = buildApp();
    const created = await request(app)
      .post('/api/products')
      .send({ title: 'X', price: 9.99, category: 'Y' })
      .expect(201);
    expect(created.body).toEqual({ id: expect.any(String) });

    const listed = await request(app).get('/api/products').expect(200);
    expect(listed.body).toEqual([{ id: created.body.id, title: 'X', price: 9.99, category: 'Y', in_stock: true }]);
  });

  it('rejects an invalid product with 422', async () => {
    const { app, store } = buildApp();
    const res = await request(app).post('/api/products').send({ price: 9.99, category: 'Y' }).expect(422);
    expect(res.body).toEqual({ success: false, error: 'Invalid product', details: ['title: Required'] });
    expect(store.docs('product')).toHaveLength(0);
  });

  it('rejects a repeated query parameter with 422', async () => {
    const { app } = buildApp();
    const res = await request(app).get('/api/products?category=Food&category=Home').expect(422);
    expect(res.body.error).toBe('Invalid query');
  });

  it('rejects malformed JSON with 400', async () => {
    const { app } = buildApp();
    const res = await request(app)
      .post('/api/products')
      .set('Content-Type', 'application/json')
      .send('{"title": ')
      .expect(400);
    expect(res.body.success).toBe(false);
  });

  it('maps store failures to 500 without leaking the full message', async () => {
    const store = new InMemoryStore().failOn(
      'distinct',
      new Error('connection 4 to 10.0.0.12:27017 closed while reading the server reply'),
    );
    const { app } = buildApp(store);
    await request(app)
      .get('/api/categories')
      .expect(500, { success: false, error: 'connection 4 to 10.0.0.12:27017 closed while readi' });
  });

  it('maps unreadable stored documents to 500', async () => {
    const { app, store } = buildApp();
    await store.insertOne('product', { title: 'Broken', category: 'Toys', price: { amount: 1 } });
    const res = await request(app).get('/api/products').expect(500);
    expect(res.body.success).toBe(false);
    expect(res.body.error).toMatch(/price is not numeric \(object\)$/);
  });

  it('degrades reads and refuses writes without a database', async () => {
    const app = buildUnavailableApp();
    await request(app).get('/api/products').expect(200, []);
    await request(app).get('/api/categories').expect(200, []);
    await request(app)
      .post('/api/products')
      .send({ title: 'X', price: 9.99, category: 'Y' })
      .expect(503, { success: false, error: 'Database not available' });
    await request(app).post('/api/seed').expect(503, { success: false, error: 'Database not available' });
  });

  it('reports database diagnostics', async () => {
    await request(buildUnavailableApp())
      .get('/test')
      .expect(200, {
        backend: 'Running',
        database: 'Not Available (not configured)',
        database_url: 'Not Set',
        database_name: null,
        connection_status: 'Not Connected',
        collections: [],
      });
  });

  it('hides unexpected exceptions behind a generic 500', async () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    try {
      const catalog = createCatalogService({ store: readyStore(new InMemoryStore()), logger: silentLogger });
      const broken = {
        ...catalog,
        listCategories: async () => {
          throw new Error('cursor 7781 killed on shard rs0/10.0.0.12:27017');
        },
      };
      const app = createApp(broken, { requestLogging: false });
      await request(app).get('/api/categories').expect(500, { success: false, error: 'Internal server error' });
      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy.mock.calls[0]?.[0]).toMatch(/\[error\] \[http\] GET \/api\/categories failed$/);
    } finally {
      errorSpy.mockRestore();
    }
  });

  it('answers unknown routes with 404', async () => {
    const { app } = buildApp();
    await request(app).get('/api/orders').expect(404, { success: false, error: 'Not found: GET /api/orders' });
  });
});
