import type { CalendarDate, DateRange } from '@shared/lib/dates';
import type { Cents } from '@shared/lib/money';

export interface SaleRecord {
  id: number;
  occurredAt: Date;
  customerName: string | null;
  total: Cents;
}

export interface SaleItemRecord {
  id: number;
  saleId: number;
  productName: string;
  quantity: number;
  priceAtSale: Cents;
  subtotal: Cents;
}

export interface NewSale {
  occurredAt: Date;
  customerName: string | null;
  total: Cents;
}

export interface NewSaleItem {
  productName: string;
  quantity: number;
  priceAtSale: Cents;
  subtotal: Cents;
}

/** Open-ended on either side when a bound is omitted. */
export interface SalesFilter {
  from?: CalendarDate;
  to?: CalendarDate;
}

export interface PageRequest {
  limit: number;
  offset: number;
}

export interface LedgerReader {
  /** Sales whose business-day falls within the range, oldest first. */
  querySales(range: DateRange): Promise<SaleRecord[]>;
  /** Items of the given sales, ordered by sale then insertion. */
  querySaleItems(saleIds: number[]): Promise<SaleItemRecord[]>;
  getSale(id: number): Promise<SaleRecord | undefined>;
  /** Newest first. */
  listSales(filter: SalesFilter, page: PageRequest): Promise<SaleRecord[]>;
  countSales(filter: SalesFilter): Promise<number>;
}

export interface LedgerWriter {
  insertSale(sale: NewSale): Promise<number>;
  insertSaleItems(saleId: number, items: NewSaleItem[]): Promise<void>;
  /** Removes the sale and its items; false when the sale does not exist. */
  deleteSale(id: number): Promise<boolean>;
}

export interface LedgerTransaction extends LedgerReader, LedgerWriter {}

export interface SalesLedger extends LedgerReader {
  /**
   * Runs `work` as one unit: every write inside it commits together, or none does when
   * `work` rejects.
   */
  transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T>;
}
