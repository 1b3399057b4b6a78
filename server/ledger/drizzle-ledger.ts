import { asc, count, desc, eq, inArray, sql, type SQL } from 'drizzle-orm';
import { saleItems, sales } from '@shared/schema';
import type { DateRange } from '@shared/lib/dates';
import { parseMoney, toDecimalString } from '@shared/lib/money';
import type { Database, Executor } from '../db';
import type {
  LedgerTransaction,
  NewSale,
  NewSaleItem,
  PageRequest,
  SaleItemRecord,
  SaleRecord,
  SalesFilter,
  SalesLedger,
} from './types';

type SaleRow = typeof sales.$inferSelect;
type SaleItemRow = typeof saleItems.$inferSelect;

const toSaleRecord = (row: SaleRow): SaleRecord => ({
  id: row.id,
  occurredAt: row.occurredAt,
  customerName: row.customerName,
  total: parseMoney(row.total),
});

const toSaleItemRecord = (row: SaleItemRow): SaleItemRecord => ({
  id: row.id,
  saleId: row.saleId,
  productName: row.productName,
  quantity: row.quantity,
  priceAtSale: parseMoney(row.priceAtSale),
  subtotal: parseMoney(row.subtotal),
});

/**
 * Queries shared by the pooled handle and an open transaction. Dates are compared on
 * the business day of `occurred_at`, so a sale at 23:30 local time lands on that day.
 */
class DrizzleLedgerSession implements LedgerTransaction {
  constructor(protected readonly executor: Executor, protected readonly timeZone: string) {}

  private saleDay(): SQL {
    return sql`(${sales.occurredAt} at time zone ${this.timeZone})::date`;
  }

  private filterConditions(filter: SalesFilter): SQL | undefined {
    const conditions: SQL[] = [];
    if (filter.from) conditions.push(sql`${this.saleDay()} >= ${filter.from}::date`);
    if (filter.to) conditions.push(sql`${this.saleDay()} <= ${filter.to}::date`);
    return conditions.length ? sql.join(conditions, sql` and `) : undefined;
  }

  async querySales(range: DateRange): Promise<SaleRecord[]> {
    const rows = await this.executor
      .select()
      .from(sales)
      .where(this.filterConditions({ from: range.start, to: range.end }))
      .orderBy(asc(sales.occurredAt), asc(sales.id));
    return rows.map(toSaleRecord);
  }

  async querySaleItems(saleIds: number[]): Promise<SaleItemRecord[]> {
    if (saleIds.length === 0) return [];
    const rows = await this.executor
      .select()
      .from(saleItems)
      .where(inArray(saleItems.saleId, saleIds))
      .orderBy(asc(saleItems.saleId), asc(saleItems.id));
    return rows.map(toSaleItemRecord);
  }

  async getSale(id: number): Promise<SaleRecord | undefined> {
    const [row] = await this.executor.select().from(sales).where(eq(sales.id, id)).limit(1);
    return row ? toSaleRecord(row) : undefined;
  }

  async listSales(filter: SalesFilter, page: PageRequest): Promise<SaleRecord[]> {
    const rows = await this.executor
      .select()
      .from(sales)
      .where(this.filterConditions(filter))
      .orderBy(desc(sales.occurredAt), desc(sales.id))
      .limit(page.limit)
      .offset(page.offset);
    return rows.map(toSaleRecord);
  }

  async countSales(filter: SalesFilter): Promise<number> {
    const [row] = await this.executor
      .select({ value: count() })
      .from(sales)
      .where(this.filterConditions(filter));
    return row?.value ?? 0;
  }

  async insertSale(sale: NewSale): Promise<number> {
    const [row] = await this.executor
      .insert(sales)
      .values({
        occurredAt: sale.occurredAt,
        customerName: sale.customerName,
        total: toDecimalString(sale.total),
      })
      .returning({ id: sales.id });
    if (!row) {
      throw new Error('Sale insert returned no id');
    }
    return row.id;
  }

  async insertSaleItems(saleId: number, items: NewSaleItem[]): Promise<void> {
    if (items.length === 0) return;
    await this.executor.insert(saleItems).values(items.map((item) => ({
      saleId,
      productName: item.productName,
      quantity: item.quantity,
      priceAtSale: toDecimalString(item.priceAtSale),
      subtotal: toDecimalString(item.subtotal),
    })));
  }

  async deleteSale(id: number): Promise<boolean> {
    // Items, then the sale; runs inside the caller's transaction
    await this.executor.delete(saleItems).where(eq(saleItems.saleId, id));
    const deleted = await this.executor.delete(sales).where(eq(sales.id, id)).returning({ id: sales.id });
    return deleted.length > 0;
  }
}

export class DrizzleSalesLedger extends DrizzleLedgerSession implements SalesLedger {
  constructor(private readonly db: Database, timeZone: string) {
    super(db, timeZone);
  }

  transaction<T>(work: (tx: LedgerTransaction) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => work(new DrizzleLedgerSession(tx, this.timeZone)));
  }
}
