import { beforeEach, describe, it, expect } from 'vitest';
import { EmptyCartError, InvalidQuantityError, TransactionFailureError } from '@server/lib/errors';
import { addItem, emptyCart, setCustomer } from '@server/pos/cart';
import { SaleFinalizer } from '@server/pos/finalizer';
import { MemorySalesLedger } from '../helpers/memory-ledger';

const NOW = new Date('2024-06-01T09:15:00Z');

describe('SaleFinalizer', () => {
  let ledger: MemorySalesLedger;
  let finalizer: SaleFinalizer;

  beforeEach(() => {
    ledger = new MemorySalesLedger();
    finalizer = new SaleFinalizer(ledger, () => NOW);
  });

  it('writes one sale and its items, then hands back an empty cart', async () => {
    let cart = addItem(emptyCart(), 'Coffee', 5000, 2).cart;
    cart = addItem(cart, 'Coffee', 5000, 1).cart;

    const { sale, cart: next } = await finalizer.finalize(cart);

    expect(sale).toEqual({ id: 1, total: 15000, occurredAt: NOW, customerName: null, itemCount: 1 });
    expect(next).toEqual({ lines: [], customer: null });
    expect(ledger.sales).toEqual([{ id: 1, occurredAt: NOW, customerName: null, total: 15000 }]);
    expect(ledger.items).toEqual([
      { id: 1, saleId: 1, productName: 'Coffee', quantity: 3, priceAtSale: 5000, subtotal: 15000 },
    ]);
  });

  it('stores the sale total as the sum of item subtotals', async () => {
    let cart = setCustomer(emptyCart(), 'Maria').cart;
    cart = addItem(cart, 'Bagel', 2575, 2).cart;
    cart = addItem(cart, 'Juice', 4000).cart;

    const { sale } = await finalizer.finalize(cart);

    const subtotals = ledger.items.filter((item) => item.saleId === sale.id).map((item) => item.subtotal);
    expect(subtotals).toEqual([5150, 4000]);
    expect(sale.total).toBe(9150);
    expect(sale.customerName).toBe('Maria');
  });

  it('refuses an empty cart without touching the ledger', async () => {
    await expect(finalizer.finalize(emptyCart())).rejects.toBeInstanceOf(EmptyCartError);
    expect(ledger.writeCount).toBe(0);
    expect(ledger.transactionCount).toBe(0);
  });

  it('rolls back the sale header when writing items fails', async () => {
    ledger.failOn('insertSaleItems');
    const cart = addItem(emptyCart(), 'Coffee', 5000).cart;

    const error = await finalizer.finalize(cart).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransactionFailureError);
    expect(error).toMatchObject({ statusCode: 503, code: 'TRANSACTION_FAILED', details: { operation: 'finalize', retryable: true } });
    expect(ledger.sales).toEqual([]);
    expect(ledger.items).toEqual([]);
  });

  it('can retry the same cart after a failed attempt', async () => {
    ledger.failOn('insertSale');
    const cart = addItem(emptyCart(), 'Coffee', 5000).cart;
    await expect(finalizer.finalize(cart)).rejects.toBeInstanceOf(TransactionFailureError);

    ledger.clearFailures();
    const { sale } = await finalizer.finalize(cart);
    expect(sale.total).toBe(5000);
    expect(ledger.sales).toHaveLength(1);
  });

  it('deletes a sale together with its items', async () => {
    const kept = ledger.seed({ occurredAt: NOW, items: [{ productName: 'Tea', quantity: 1, price: '30.00' }] });
    const doomed = ledger.seed({ occurredAt: NOW, items: [{ productName: 'Coffee', quantity: 2, price: '50.00' }] });

    await expect(finalizer.deleteSale(doomed.id)).resolves.toBe(true);

    expect(ledger.sales.map((sale) => sale.id)).toEqual([kept.id]);
    expect(ledger.items.every((item) => item.saleId === kept.id)).toBe(true);
    await expect(finalizer.deleteSale(doomed.id)).resolves.toBe(false);
  });

  it('leaves items in place when the delete fails', async () => {
    const sale = ledger.seed({ occurredAt: NOW, items: [{ productName: 'Coffee', quantity: 2, price: '50.00' }] });
    ledger.failOn('deleteSale');

    await expect(finalizer.deleteSale(sale.id)).rejects.toMatchObject({ code: 'TRANSACTION_FAILED', details: { operation: 'delete', retryable: true } });
    expect(ledger.sales).toHaveLength(1);
    expect(ledger.items).toHaveLength(1);
  });

  it('records an external sale through the same cart rules', async () => {
    const sale = await finalizer.recordExternalSale({
      customerName: 'N/A',
      items: [
        { name: 'Coffee', quantity: 2, priceAtSale: 5000 },
        { name: 'Coffee', quantity: 1, priceAtSale: 5000 },
      ],
    });

    expect(sale).toMatchObject({ total: 15000, customerName: null, itemCount: 1 });
    await expect(finalizer.recordExternalSale({ items: [{ name: 'Tea', quantity: 0, priceAtSale: 100 }] }))
      .rejects.toBeInstanceOf(InvalidQuantityError);
    expect(ledger.sales).toHaveLength(1);
  });
});
