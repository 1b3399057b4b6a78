import type { Express, Request, Response } from 'express';
import { z } from 'zod';
import type { Env } from '@shared/env';
import { MAX_UNIT_PRICE, isValidMoney, isValidUnitPrice, parseMoney, toDecimalString, type Cents } from '@shared/lib/money';
import { InvalidPriceError, NotFoundError, handleAsyncError, sendSuccessResponse } from '../lib/errors';
import { extractLogContext, logger } from '../lib/logger';
import { moneyField, parseBody } from '../middleware/validation';
import {
  addItem,
  clearCart,
  customItemName,
  decreaseQuantity,
  describeResult,
  increaseQuantity,
  normalizeCustomerName,
  removeItem,
  setCustomer,
  type CartMutation,
  type CartResult,
} from '../pos/cart';
import { readCart, writeCart } from '../pos/cart-session';
import type { Services } from '../services';
import { cartView } from './views';

// Quantity and price rules belong to the cart engine; the schemas only check shape
const AddProductSchema = z.object({
  productName: z.string().trim().min(1),
  quantity: z.number().optional(),
});

const AddCustomItemSchema = z.object({
  name: z.string().nullish(),
  price: z.union([z.string(), z.number()]),
  quantity: z.number().optional(),
});

const LineSchema = z.object({
  name: z.string().min(1),
  unitPrice: moneyField,
});

const CustomerSchema = z.object({
  customerName: z.string().nullish(),
});

type CartEvent = Parameters<typeof logger.logCartEvent>[0];

const CART_EVENTS: Record<CartResult['status'], CartEvent> = {
  added: 'item_added',
  adjusted: 'quantity_adjusted',
  removed: 'item_removed',
  line_not_found: 'line_not_found',
  customer_set: 'customer_set',
  cleared: 'cleared',
};

function customPrice(raw: string | number): Cents {
  if (!isValidMoney(raw)) {
    throw new InvalidPriceError(raw);
  }
  if (!isValidUnitPrice(raw)) {
    throw new InvalidPriceError(raw, `Price cannot exceed ${toDecimalString(MAX_UNIT_PRICE)}.`);
  }
  return parseMoney(raw);
}

function resultView(result: CartResult) {
  switch (result.status) {
    case 'added':
    case 'adjusted':
      return {
        status: result.status,
        line: { name: result.line.name, unitPrice: toDecimalString(result.line.unitPrice), quantity: result.line.quantity },
      };
    case 'removed':
    case 'line_not_found':
      return { status: result.status, name: result.name, unitPrice: toDecimalString(result.unitPrice) };
    case 'customer_set':
      return { status: result.status, customerName: result.customer };
    case 'cleared':
      return { status: result.status };
  }
}

// The view is built before the session is written so a cart that cannot be rendered is never stored
function respond(req: Request, res: Response, { cart, result }: CartMutation): void {
  const body = { cart: cartView(cart), result: resultView(result) };
  writeCart(req.session, cart);
  logger.logCartEvent(CART_EVENTS[result.status], extractLogContext(req, { lines: cart.lines.length }));
  sendSuccessResponse(res, body, describeResult(result));
}

export async function registerPosRoutes(app: Express, services: Services, env: Env) {
  const { catalog, finalizer } = services;

  app.get('/api/pos/cart', (req: Request, res: Response) => {
    sendSuccessResponse(res, { cart: cartView(readCart(req.session)), currency: env.CURRENCY });
  });

  app.post('/api/pos/cart/items', handleAsyncError(async (req: Request, res: Response) => {
    const body = parseBody(AddProductSchema, req);
    const product = await catalog.getProductByName(body.productName);
    if (!product) {
      throw new NotFoundError(`Product '${body.productName}'`);
    }
    respond(req, res, addItem(readCart(req.session), product.name, product.price, body.quantity ?? 1));
  }));

  app.post('/api/pos/cart/custom-items', (req: Request, res: Response) => {
    const body = parseBody(AddCustomItemSchema, req);
    const mutation = addItem(readCart(req.session), customItemName(body.name), customPrice(body.price), body.quantity ?? 1);
    respond(req, res, mutation);
  });

  app.post('/api/pos/cart/lines/increase', (req: Request, res: Response) => {
    const { name, unitPrice } = parseBody(LineSchema, req);
    respond(req, res, increaseQuantity(readCart(req.session), name, unitPrice));
  });

  app.post('/api/pos/cart/lines/decrease', (req: Request, res: Response) => {
    const { name, unitPrice } = parseBody(LineSchema, req);
    respond(req, res, decreaseQuantity(readCart(req.session), name, unitPrice));
  });

  app.post('/api/pos/cart/lines/remove', (req: Request, res: Response) => {
    const { name, unitPrice } = parseBody(LineSchema, req);
    respond(req, res, removeItem(readCart(req.session), name, unitPrice));
  });

  // A known customer keeps its stored spelling; any other name is taken as typed
  app.put('/api/pos/cart/customer', handleAsyncError(async (req: Request, res: Response) => {
    const { customerName } = parseBody(CustomerSchema, req);
    const requested = normalizeCustomerName(customerName);
    const known = requested ? await catalog.getCustomerByName(requested) : undefined;
    respond(req, res, setCustomer(readCart(req.session), known?.name ?? requested));
  }));

  app.delete('/api/pos/cart', (req: Request, res: Response) => {
    respond(req, res, clearCart());
  });

  app.post('/api/pos/cart/finalize', handleAsyncError(async (req: Request, res: Response) => {
    const { sale, cart } = await finalizer.finalize(readCart(req.session));
    const body = {
      saleId: sale.id,
      total: toDecimalString(sale.total),
      itemCount: sale.itemCount,
      cart: cartView(cart),
    };
    writeCart(req.session, cart);
    sendSuccessResponse(res, body, 'Sale finalized.', 201);
  }));
}
