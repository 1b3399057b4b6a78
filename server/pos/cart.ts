import { MAX_NAME_LENGTH, MAX_QUANTITY, WALK_IN_CUSTOMER } from '@shared/schema';
import { MAX_AMOUNT, MAX_UNIT_PRICE, multiplyCents, sumCents, toDecimalString, type Cents } from '@shared/lib/money';
import { InvalidNameError, InvalidPriceError, InvalidQuantityError, SaleLimitError } from '../lib/errors';

export const CUSTOM_ITEM_NAME = 'Custom Item';

/** A cart line is identified by name and unit price together. */
export interface CartLine {
  name: string;
  unitPrice: Cents;
  quantity: number;
}

export interface Cart {
  lines: CartLine[];
  /** null is a walk-in sale, displayed as "N/A" */
  customer: string | null;
}

export type CartResult =
  | { status: 'added'; line: CartLine }
  | { status: 'adjusted'; line: CartLine }
  | { status: 'removed'; name: string; unitPrice: Cents }
  | { status: 'line_not_found'; name: string; unitPrice: Cents }
  | { status: 'customer_set'; customer: string | null }
  | { status: 'cleared' };

export interface CartMutation {
  cart: Cart;
  result: CartResult;
}

export function emptyCart(): Cart {
  return { lines: [], customer: null };
}

const QUANTITY_LIMIT_MESSAGE = `Quantity cannot exceed ${MAX_QUANTITY}.`;

function assertQuantity(quantity: number): void {
  if (!Number.isSafeInteger(quantity) || quantity <= 0) {
    throw new InvalidQuantityError(quantity);
  }
  if (quantity > MAX_QUANTITY) {
    throw new InvalidQuantityError(quantity, QUANTITY_LIMIT_MESSAGE);
  }
}

function assertUnitPrice(unitPrice: Cents): void {
  if (!Number.isSafeInteger(unitPrice) || unitPrice < 0) {
    throw new InvalidPriceError(unitPrice);
  }
  if (unitPrice > MAX_UNIT_PRICE) {
    throw new InvalidPriceError(toDecimalString(unitPrice), `Price cannot exceed ${toDecimalString(MAX_UNIT_PRICE)}.`);
  }
}

function assertNameLength(field: string, name: string): void {
  if (name.length > MAX_NAME_LENGTH) {
    throw new InvalidNameError(field, MAX_NAME_LENGTH);
  }
}

// Checked on the cart a mutation produces; the caller's cart stays as it was
function assertRecordable(cart: Cart, line: CartLine): void {
  if (line.quantity > MAX_QUANTITY) {
    throw new InvalidQuantityError(line.quantity, QUANTITY_LIMIT_MESSAGE);
  }
  if (lineSubtotal(line) > MAX_AMOUNT || cartTotal(cart) > MAX_AMOUNT) {
    throw new SaleLimitError(toDecimalString(MAX_AMOUNT));
  }
}

function findLine(cart: Cart, name: string, unitPrice: Cents): number {
  return cart.lines.findIndex((line) => line.name === name && line.unitPrice === unitPrice);
}

function replaceLine(cart: Cart, index: number, line: CartLine | null): Cart {
  const lines = line
    ? cart.lines.map((existing, i) => (i === index ? line : existing))
    : cart.lines.filter((_, i) => i !== index);
  return { ...cart, lines };
}

export function addItem(cart: Cart, name: string, unitPrice: Cents, quantity: number = 1): CartMutation {
  assertNameLength('Item name', name);
  assertQuantity(quantity);
  assertUnitPrice(unitPrice);

  const index = findLine(cart, name, unitPrice);
  const line: CartLine = index === -1
    ? { name, unitPrice, quantity }
    : { ...cart.lines[index], quantity: cart.lines[index].quantity + quantity };
  const next = index === -1 ? { ...cart, lines: [...cart.lines, line] } : replaceLine(cart, index, line);
  assertRecordable(next, line);
  return { cart: next, result: { status: 'added', line } };
}

function adjustQuantity(cart: Cart, name: string, unitPrice: Cents, delta: 1 | -1): CartMutation {
  const index = findLine(cart, name, unitPrice);
  if (index === -1) {
    return { cart, result: { status: 'line_not_found', name, unitPrice } };
  }

  const quantity = cart.lines[index].quantity + delta;
  if (quantity < 1) {
    return { cart: replaceLine(cart, index, null), result: { status: 'removed', name, unitPrice } };
  }

  const line: CartLine = { ...cart.lines[index], quantity };
  const next = replaceLine(cart, index, line);
  assertRecordable(next, line);
  return { cart: next, result: { status: 'adjusted', line } };
}

export function increaseQuantity(cart: Cart, name: string, unitPrice: Cents): CartMutation {
  return adjustQuantity(cart, name, unitPrice, 1);
}

export function decreaseQuantity(cart: Cart, name: string, unitPrice: Cents): CartMutation {
  return adjustQuantity(cart, name, unitPrice, -1);
}

export function removeItem(cart: Cart, name: string, unitPrice: Cents): CartMutation {
  const index = findLine(cart, name, unitPrice);
  if (index === -1) {
    return { cart, result: { status: 'line_not_found', name, unitPrice } };
  }
  return { cart: replaceLine(cart, index, null), result: { status: 'removed', name, unitPrice } };
}

/** Blank names and the walk-in sentinel both mean "no customer". */
export function normalizeCustomerName(name: string | null | undefined): string | null {
  const trimmed = (name ?? '').trim();
  if (!trimmed || trimmed.toUpperCase() === WALK_IN_CUSTOMER) {
    return null;
  }
  return trimmed;
}

export function setCustomer(cart: Cart, name: string | null | undefined): CartMutation {
  const customer = normalizeCustomerName(name);
  if (customer !== null) {
    assertNameLength('Customer name', customer);
  }
  return { cart: { ...cart, customer }, result: { status: 'customer_set', customer } };
}

export function clearCart(): CartMutation {
  return { cart: emptyCart(), result: { status: 'cleared' } };
}

export function lineSubtotal(line: CartLine): Cents {
  return multiplyCents(line.unitPrice, line.quantity);
}

export function cartTotal(cart: Cart): Cents {
  return sumCents(cart.lines.map(lineSubtotal));
}

export function displayCustomer(customer: string | null): string {
  return customer ?? WALK_IN_CUSTOMER;
}

export function customItemName(name: string | null | undefined): string {
  const trimmed = (name ?? '').trim();
  return trimmed || CUSTOM_ITEM_NAME;
}

export function describeResult(result: CartResult): string {
  switch (result.status) {
    case 'added':
      return `Added ${result.line.name} (now ${result.line.quantity}).`;
    case 'adjusted':
      return `Adjusted quantity for ${result.line.name}.`;
    case 'removed':
      return `Removed ${result.name} from sale.`;
    case 'line_not_found':
      return `Could not find '${result.name}' in the current sale.`;
    case 'customer_set':
      return `Customer set to '${displayCustomer(result.customer)}'.`;
    case 'cleared':
      return 'Sale cleared.';
  }
}
