import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';
import { createTestApp, type TestContext } from '../helpers/test-app';

describe('catalog API', () => {
  let ctx: TestContext;

  beforeEach(async () => {
    ctx = await createTestApp();
  });

  describe('products', () => {
    it('creates, updates and deletes a product', async () => {
      const created = await request(ctx.app).post('/api/products').send({ name: 'Latte', price: '120.5' }).expect(201);
      expect(created.body.data).toEqual({ id: 1, name: 'Latte', price: '120.50', isPriority: false });

      const updated = await request(ctx.app).put('/api/products/1').send({ price: '99.99', isPriority: true }).expect(200);
      expect(updated.body.data).toEqual({ id: 1, name: 'Latte', price: '99.99', isPriority: true });

      const fetched = await request(ctx.app).get('/api/products/1').expect(200);
      expect(fetched.body.data.price).toBe('99.99');

      await request(ctx.app).delete('/api/products/1').expect(200);
      await request(ctx.app).delete('/api/products/1').expect(404);
    });

    it('rejects duplicate names with a conflict', async () => {
      await request(ctx.app).post('/api/products').send({ name: 'Latte', price: '120.00' }).expect(201);
      const res = await request(ctx.app).post('/api/products').send({ name: 'Latte', price: '90.00' }).expect(409);
      expect(res.body).toMatchObject({ code: 'CONFLICT', message: "Product 'Latte' already exists" });
    });

    it('validates price and update payloads', async () => {
      const res = await request(ctx.app).post('/api/products').send({ name: 'Latte', price: '-3' }).expect(422);
      expect(res.body.details[0].field).toBe('price');

      const tooDear = await request(ctx.app).post('/api/products').send({ name: 'Latte', price: '100000000.00' }).expect(422);
      expect(tooDear.body.details).toEqual([{ field: 'price', message: 'must not exceed 99999999.99', code: 'custom' }]);

      ctx.catalog.addProduct('Tea', '30.00');
      const empty = await request(ctx.app).put('/api/products/1').send({}).expect(422);
      expect(empty.body.message).toBe('At least one field must be provided');

      await request(ctx.app).put('/api/products/42').send({ price: '1.00' }).expect(404);
    });

    it('lists priority products first', async () => {
      ctx.catalog.addProduct('Tea', '30.00');
      ctx.catalog.addProduct('Coffee', '50.00', true);
      const res = await request(ctx.app).get('/api/products').expect(200);
      expect(res.body.data.map((product: { name: string }) => product.name)).toEqual(['Coffee', 'Tea']);
    });
  });

  describe('customers', () => {
    it('reserves the walk-in name', async () => {
      const res = await request(ctx.app).post('/api/customers').send({ name: 'n/a' }).expect(422);
      expect(res.body.details[0]).toMatchObject({ field: 'name', message: '"N/A" is reserved for walk-in sales' });
    });

    it('keeps names unique regardless of case', async () => {
      const created = await request(ctx.app).post('/api/customers').send({ name: 'Maria', contact: '0917-000-0000' }).expect(201);
      expect(created.body.data).toMatchObject({ id: 1, name: 'Maria', contact: '0917-000-0000', address: null });

      const dup = await request(ctx.app).post('/api/customers').send({ name: 'MARIA' }).expect(409);
      expect(dup.body.code).toBe('CONFLICT');
    });

    it('pages customers by name', async () => {
      for (const name of ['Maria', 'Ben', 'Cara', 'Ana']) {
        await request(ctx.app).post('/api/customers').send({ name }).expect(201);
      }
      const res = await request(ctx.app).get('/api/customers?per_page=2&page=2').expect(200);
      expect(res.body.data.customers.map((customer: { name: string }) => customer.name)).toEqual(['Cara', 'Maria']);
      expect(res.body.data.pagination).toEqual({ page: 2, perPage: 2, total: 4, totalPages: 2 });
    });

    it('updates and deletes a customer', async () => {
      await request(ctx.app).post('/api/customers').send({ name: 'Maria' }).expect(201);
      const updated = await request(ctx.app).put('/api/customers/1').send({ address: 'Cebu City' }).expect(200);
      expect(updated.body.data).toMatchObject({ name: 'Maria', address: 'Cebu City' });

      await request(ctx.app).delete('/api/customers/1').expect(200);
      await request(ctx.app).get('/api/customers/1').expect(404);
    });
  });
});
