import { toDecimalString, type Cents } from '@shared/lib/money';
import { EmptyCartError, TransactionFailureError, type LedgerOperation } from '../lib/errors';
import { logger } from '../lib/logger';
import type { NewSaleItem, SalesLedger } from '../ledger/types';
import { addItem, cartTotal, emptyCart, lineSubtotal, setCustomer, type Cart } from './cart';

export interface FinalizedSale {
  id: number;
  total: Cents;
  occurredAt: Date;
  customerName: string | null;
  itemCount: number;
}

export interface FinalizeOutcome {
  sale: FinalizedSale;
  /** The cart to keep in the session once the sale is committed. */
  cart: Cart;
}

export interface ExternalSaleLine {
  name: string;
  quantity: number;
  priceAtSale: Cents;
}

export interface ExternalSale {
  customerName?: string | null;
  items: ExternalSaleLine[];
}

export type Clock = () => Date;

export class SaleFinalizer {
  constructor(
    private readonly ledger: SalesLedger,
    private readonly clock: Clock = () => new Date(),
  ) {}

  async finalize(cart: Cart, operation: LedgerOperation = 'finalize'): Promise<FinalizeOutcome> {
    if (cart.lines.length === 0) {
      throw new EmptyCartError();
    }

    const total = cartTotal(cart);
    const occurredAt = this.clock();
    const items: NewSaleItem[] = cart.lines.map((line) => ({
      productName: line.name,
      quantity: line.quantity,
      priceAtSale: line.unitPrice,
      subtotal: lineSubtotal(line),
    }));

    let saleId: number;
    try {
      saleId = await this.ledger.transaction(async (tx) => {
        const id = await tx.insertSale({ occurredAt, customerName: cart.customer, total });
        await tx.insertSaleItems(id, items);
        return id;
      });
    } catch (error) {
      logger.error('Sale transaction rolled back', { operation, lines: items.length, total: toDecimalString(total) }, error);
      throw new TransactionFailureError(operation, error);
    }

    logger.logSaleEvent(operation === 'sync' ? 'synced' : 'finalized', {
      saleId,
      customerName: cart.customer,
      total: toDecimalString(total),
    });

    return {
      sale: { id: saleId, total, occurredAt, customerName: cart.customer, itemCount: items.length },
      cart: emptyCart(),
    };
  }

  /** All lines are validated before anything is written. */
  async recordExternalSale(input: ExternalSale): Promise<FinalizedSale> {
    let cart = setCustomer(emptyCart(), input.customerName).cart;
    for (const item of input.items) {
      cart = addItem(cart, item.name, item.priceAtSale, item.quantity).cart;
    }
    const { sale } = await this.finalize(cart, 'sync');
    return sale;
  }

  async deleteSale(id: number): Promise<boolean> {
    let deleted: boolean;
    try {
      deleted = await this.ledger.transaction((tx) => tx.deleteSale(id));
    } catch (error) {
      logger.error('Sale deletion rolled back', { saleId: id }, error);
      throw new TransactionFailureError('delete', error);
    }
    if (deleted) {
      logger.logSaleEvent('deleted', { saleId: id });
    }
    return deleted;
  }
}
