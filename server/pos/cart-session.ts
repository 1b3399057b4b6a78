import type { Session, SessionData } from 'express-session';
import { z } from 'zod';
import { MAX_AMOUNT, MAX_UNIT_PRICE } from '@shared/lib/money';
import { MAX_NAME_LENGTH, MAX_QUANTITY } from '@shared/schema';
import { logger } from '../lib/logger';
import { cartTotal, emptyCart, type Cart } from './cart';

type CartSession = Session & Partial<SessionData>;

const storedCartSchema = z.object({
  lines: z.array(z.object({
    name: z.string().max(MAX_NAME_LENGTH),
    unitPrice: z.number().int().nonnegative().max(MAX_UNIT_PRICE),
    quantity: z.number().int().positive().max(MAX_QUANTITY),
  })),
  customer: z.string().max(MAX_NAME_LENGTH).nullable(),
}).refine((cart) => cartTotal(cart) <= MAX_AMOUNT);

/**
 * The cart of the session bound to this request. A missing or unreadable cart (an older
 * shape left in the store, for example) starts over empty.
 */
export function readCart(session: CartSession): Cart {
  if (session.cart === undefined) {
    return emptyCart();
  }
  const parsed = storedCartSchema.safeParse(session.cart);
  if (!parsed.success) {
    logger.warn('Discarding unreadable cart from session', { sessionId: session.id });
    return emptyCart();
  }
  return parsed.data;
}

export function writeCart(session: CartSession, cart: Cart): void {
  session.cart = cart;
}
