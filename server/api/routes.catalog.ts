import type { Express, Request, Response } from 'express';
import type { Env } from '@shared/env';
import { insertCustomerSchema, insertProductSchema } from '@shared/schema';
import { parseMoney } from '@shared/lib/money';
import { NotFoundError, ValidationError, handleAsyncError, sendSuccessResponse } from '../lib/errors';
import { logger } from '../lib/logger';
import { idParam, pageQuery, parseBody, parseParams, parseQuery } from '../middleware/validation';
import type { Services } from '../services';
import { customerView, productView } from './views';

const ProductBody = insertProductSchema.transform((input) => ({
  name: input.name,
  price: parseMoney(input.price),
  isPriority: input.isPriority ?? false,
}));

const ProductPatch = insertProductSchema.partial().transform((input) => ({
  ...(input.name !== undefined ? { name: input.name } : {}),
  ...(input.price !== undefined ? { price: parseMoney(input.price) } : {}),
  ...(input.isPriority !== undefined ? { isPriority: input.isPriority } : {}),
}));

const CustomerBody = insertCustomerSchema.transform((input) => ({
  name: input.name,
  contact: input.contact || null,
  address: input.address || null,
}));

const CustomerPatch = insertCustomerSchema.partial().transform((input) => ({
  ...(input.name !== undefined ? { name: input.name } : {}),
  ...(input.contact !== undefined ? { contact: input.contact || null } : {}),
  ...(input.address !== undefined ? { address: input.address || null } : {}),
}));

function requireChanges(patch: object): void {
  if (Object.keys(patch).length === 0) {
    throw new ValidationError('At least one field must be provided');
  }
}

export async function registerProductRoutes(app: Express, services: Services) {
  const { catalog } = services;

  app.get('/api/products', handleAsyncError(async (_req: Request, res: Response) => {
    const products = await catalog.listProducts();
    sendSuccessResponse(res, products.map(productView));
  }));

  app.get('/api/products/:id', handleAsyncError(async (req: Request, res: Response) => {
    const { id } = parseParams(idParam, req);
    const product = await catalog.getProduct(id);
    if (!product) throw new NotFoundError('Product');
    sendSuccessResponse(res, productView(product));
  }));

  app.post('/api/products', handleAsyncError(async (req: Request, res: Response) => {
    const input = parseBody(ProductBody, req);
    const product = await catalog.createProduct(input);
    logger.info('Product created', { productId: product.id, productName: product.name });
    sendSuccessResponse(res, productView(product), 'Product created.', 201);
  }));

  app.put('/api/products/:id', handleAsyncError(async (req: Request, res: Response) => {
    const { id } = parseParams(idParam, req);
    const patch = parseBody(ProductPatch, req);
    requireChanges(patch);
    const product = await catalog.updateProduct(id, patch);
    if (!product) throw new NotFoundError('Product');
    sendSuccessResponse(res, productView(product), 'Product updated.');
  }));

  app.delete('/api/products/:id', handleAsyncError(async (req: Request, res: Response) => {
    const { id } = parseParams(idParam, req);
    if (!(await catalog.deleteProduct(id))) throw new NotFoundError('Product');
    logger.info('Product deleted', { productId: id });
    sendSuccessResponse(res, { id }, 'Product deleted.');
  }));
}

export async function registerCustomerRoutes(app: Express, services: Services, env: Env) {
  const { catalog } = services;
  const CustomerPage = pageQuery(env.ITEMS_PER_PAGE);

  // GET /api/customers - ordered by name, paginated
  app.get('/api/customers', handleAsyncError(async (req: Request, res: Response) => {
    const { page, per_page } = parseQuery(CustomerPage, req);
    const [rows, total] = await Promise.all([
      catalog.listCustomers({ limit: per_page, offset: (page - 1) * per_page }),
      catalog.countCustomers(),
    ]);
    sendSuccessResponse(res, {
      customers: rows.map(customerView),
      pagination: { page, perPage: per_page, total, totalPages: Math.ceil(total / per_page) },
    });
  }));

  app.get('/api/customers/:id', handleAsyncError(async (req: Request, res: Response) => {
    const { id } = parseParams(idParam, req);
    const customer = await catalog.getCustomer(id);
    if (!customer) throw new NotFoundError('Customer');
    sendSuccessResponse(res, customerView(customer));
  }));

  app.post('/api/customers', handleAsyncError(async (req: Request, res: Response) => {
    const input = parseBody(CustomerBody, req);
    const customer = await catalog.createCustomer(input);
    logger.info('Customer created', { customerId: customer.id, customerName: customer.name });
    sendSuccessResponse(res, customerView(customer), 'Customer created.', 201);
  }));

  app.put('/api/customers/:id', handleAsyncError(async (req: Request, res: Response) => {
    const { id } = parseParams(idParam, req);
    const patch = parseBody(CustomerPatch, req);
    requireChanges(patch);
    const customer = await catalog.updateCustomer(id, patch);
    if (!customer) throw new NotFoundError('Customer');
    sendSuccessResponse(res, customerView(customer), 'Customer updated.');
  }));

  app.delete('/api/customers/:id', handleAsyncError(async (req: Request, res: Response) => {
    const { id } = parseParams(idParam, req);
    if (!(await catalog.deleteCustomer(id))) throw new NotFoundError('Customer');
    sendSuccessResponse(res, { id }, 'Customer deleted.');
  }));
}
