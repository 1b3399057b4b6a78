import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';
import { TEST_API_KEY, createTestApp, type TestContext } from '../helpers/test-app';

describe('sync API', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestApp();
    ctx.catalog.addProduct('Tea', '30.00');
    ctx.catalog.addProduct('Coffee', '50.00', true);
    ctx.catalog.addProduct('Bagel', '25.75', true);
  });

  it('requires an API key', async () => {
    const res = await request(ctx.app).get('/api/v1/products').expect(401);
    expect(res.body).toMatchObject({ status: 'error', code: 'UNAUTHORIZED', message: 'A valid API key is required' });

    await request(ctx.app).get('/api/v1/products').set('X-API-KEY', 'wrong-key').expect(401);
  });

  it('lists products with priority ones first', async () => {
    const res = await request(ctx.app).get('/api/v1/products').set('X-API-KEY', TEST_API_KEY).expect(200);
    expect(res.body.data).toEqual([
      { id: 3, name: 'Bagel', price: '25.75', isPriority: true },
      { id: 2, name: 'Coffee', price: '50.00', isPriority: true },
      { id: 1, name: 'Tea', price: '30.00', isPriority: false },
    ]);
  });

  it('accepts the key as a query parameter', async () => {
    const res = await request(ctx.app).get(`/api/v1/products/Coffee?api_key=${TEST_API_KEY}`).expect(200);
    expect(res.body.data).toEqual({ id: 2, name: 'Coffee', price: '50.00', isPriority: true });

    const missing = await request(ctx.app).get(`/api/v1/products/Latte?api_key=${TEST_API_KEY}`).expect(404);
    expect(missing.body.message).toBe('Product not found');
  });

  it('records an external sale', async () => {
    const res = await request(ctx.app)
      .post('/api/v1/sales')
      .set('X-API-KEY', TEST_API_KEY)
      .send({
        customer_name: 'Juan',
        items: [
          { name: 'Coffee', quantity: 2, price_at_sale: '50.00' },
          { name: 'Tea', quantity: 1, price_at_sale: 30 },
        ],
      })
      .expect(201);

    expect(res.body).toMatchObject({ message: 'Sale synchronized successfully', data: { saleId: 1, total: '130.00' } });
    expect(ctx.ledger.sales[0]).toMatchObject({ customerName: 'Juan', total: 13000 });
    expect(ctx.ledger.items.map((item) => [item.productName, item.quantity, item.subtotal])).toEqual([
      ['Coffee', 2, 10000],
      ['Tea', 1, 3000],
    ]);
  });

  it('writes nothing when any line is invalid', async () => {
    const badQuantity = await request(ctx.app)
      .post('/api/v1/sales')
      .set('X-API-KEY', TEST_API_KEY)
      .send({ items: [{ name: 'Coffee', quantity: 1, price_at_sale: '50.00' }, { name: 'Tea', quantity: 0, price_at_sale: '30.00' }] })
      .expect(422);
    expect(badQuantity.body.code).toBe('INVALID_QUANTITY');

    const badPrice = await request(ctx.app)
      .post('/api/v1/sales')
      .set('X-API-KEY', TEST_API_KEY)
      .send({ items: [{ name: 'Tea', quantity: 1, price_at_sale: '-1' }] })
      .expect(422);
    expect(badPrice.body.code).toBe('INVALID_PRICE');

    const noItems = await request(ctx.app).post('/api/v1/sales').set('X-API-KEY', TEST_API_KEY).send({ items: [] }).expect(422);
    expect(noItems.body.code).toBe('VALIDATION_ERROR');

    expect(ctx.ledger.sales).toEqual([]);
    expect(ctx.ledger.writeCount).toBe(0);
  });

  it('reports a failed sync as retryable', async () => {
    ctx.ledger.failOn('insertSale');
    const res = await request(ctx.app)
      .post('/api/v1/sales')
      .set('X-API-KEY', TEST_API_KEY)
      .send({ items: [{ name: 'Tea', quantity: 1, price_at_sale: '30.00' }] })
      .expect(503);
    expect(res.body).toMatchObject({ code: 'TRANSACTION_FAILED', details: { operation: 'sync', retryable: true } });
  });

  it('rejects values a sale row cannot store without writing anything', async () => {
    const longCustomer = await request(ctx.app)
      .post('/api/v1/sales')
      .set('X-API-KEY', TEST_API_KEY)
      .send({ customer_name: 'c'.repeat(256), items: [{ name: 'Tea', quantity: 1, price_at_sale: '30.00' }] })
      .expect(422);
    expect(longCustomer.body.code).toBe('VALIDATION_ERROR');
    expect(longCustomer.body.details[0].field).toBe('customer_name');

    const bigPrice = await request(ctx.app)
      .post('/api/v1/sales')
      .set('X-API-KEY', TEST_API_KEY)
      .send({ items: [{ name: 'Tea', quantity: 1, price_at_sale: '100000000' }] })
      .expect(422);
    expect(bigPrice.body).toMatchObject({ code: 'INVALID_PRICE', details: { price: '100000000' } });

    const bigQuantity = await request(ctx.app)
      .post('/api/v1/sales')
      .set('X-API-KEY', TEST_API_KEY)
      .send({ items: [{ name: 'Tea', quantity: 3000000000, price_at_sale: '0.01' }] })
      .expect(422);
    expect(bigQuantity.body.code).toBe('INVALID_QUANTITY');

    expect(ctx.ledger.writeCount).toBe(0);
  });
});
