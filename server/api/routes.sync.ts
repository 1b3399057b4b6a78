import type { Express, Request, Response } from 'express';
import { z } from 'zod';
import type { Env } from '@shared/env';
import { MAX_NAME_LENGTH } from '@shared/schema';
import { MAX_UNIT_PRICE, isValidMoney, isValidUnitPrice, parseMoney, toDecimalString } from '@shared/lib/money';
import { InvalidPriceError, NotFoundError, handleAsyncError, sendSuccessResponse } from '../lib/errors';
import { requireApiKey } from '../middleware/authz';
import { syncRateLimit } from '../middleware/security';
import { parseBody, parseParams } from '../middleware/validation';
import type { ExternalSaleLine } from '../pos/finalizer';
import type { Services } from '../services';
import { productView } from './views';

// Field names follow what existing sync clients already send
const SyncSaleSchema = z.object({
  customer_name: z.string().trim().max(MAX_NAME_LENGTH).nullish(),
  items: z.array(z.object({
    name: z.string().trim().min(1).max(MAX_NAME_LENGTH),
    quantity: z.number(),
    price_at_sale: z.union([z.string(), z.number()]),
  })).min(1, 'items must be a non-empty list'),
});

const ProductNameParams = z.object({
  name: z.string().min(1),
});

function toSaleLine(item: z.infer<typeof SyncSaleSchema>['items'][number]): ExternalSaleLine {
  if (!isValidMoney(item.price_at_sale)) {
    throw new InvalidPriceError(item.price_at_sale);
  }
  if (!isValidUnitPrice(item.price_at_sale)) {
    throw new InvalidPriceError(item.price_at_sale, `Price cannot exceed ${toDecimalString(MAX_UNIT_PRICE)}.`);
  }
  return { name: item.name, quantity: item.quantity, priceAtSale: parseMoney(item.price_at_sale) };
}

export async function registerSyncRoutes(app: Express, services: Services, env: Env) {
  const { catalog, finalizer } = services;
  const guard = [syncRateLimit, requireApiKey(env.SYNC_API_KEYS)];

  app.get('/api/v1/products', guard, handleAsyncError(async (_req: Request, res: Response) => {
    const products = await catalog.listProducts();
    sendSuccessResponse(res, products.map(productView));
  }));

  app.get('/api/v1/products/:name', guard, handleAsyncError(async (req: Request, res: Response) => {
    const { name } = parseParams(ProductNameParams, req);
    const product = await catalog.getProductByName(name);
    if (!product) throw new NotFoundError('Product');
    sendSuccessResponse(res, productView(product));
  }));

  // POST /api/v1/sales - records a sale made elsewhere; every line is checked before anything is written
  app.post('/api/v1/sales', guard, handleAsyncError(async (req: Request, res: Response) => {
    const body = parseBody(SyncSaleSchema, req);
    const sale = await finalizer.recordExternalSale({
      customerName: body.customer_name,
      items: body.items.map(toSaleLine),
    });
    sendSuccessResponse(res, { saleId: sale.id, total: toDecimalString(sale.total) }, 'Sale synchronized successfully', 201);
  }));
}
