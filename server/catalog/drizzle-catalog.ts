import { asc, count, desc, eq, sql } from 'drizzle-orm';
import { customers, products, type Customer, type Product } from '@shared/schema';
import { parseMoney, toDecimalString } from '@shared/lib/money';
import type { Database } from '../db';
import { ConflictError } from '../lib/errors';
import type { PageRequest } from '../ledger/types';
import type { CatalogStore, CustomerInput, CustomerRecord, ProductInput, ProductRecord } from './types';

const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  if ('code' in error && error.code === UNIQUE_VIOLATION) return true;
  return 'cause' in error && isUniqueViolation(error.cause);
}

const toProductRecord = (row: Product): ProductRecord => ({
  id: row.id,
  name: row.name,
  price: parseMoney(row.price),
  isPriority: row.isPriority,
});

const toCustomerRecord = (row: Customer): CustomerRecord => ({
  id: row.id,
  name: row.name,
  contact: row.contact,
  address: row.address,
  createdAt: row.createdAt,
});

function productValues(input: Partial<ProductInput>) {
  return {
    ...(input.name !== undefined ? { name: input.name } : {}),
    ...(input.price !== undefined ? { price: toDecimalString(input.price) } : {}),
    ...(input.isPriority !== undefined ? { isPriority: input.isPriority } : {}),
  };
}

export class DrizzleCatalogStore implements CatalogStore {
  constructor(private readonly db: Database) {}

  private async unique<T>(entity: string, name: string | undefined, write: () => Promise<T>): Promise<T> {
    try {
      return await write();
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`${entity} '${name ?? ''}' already exists`);
      }
      throw error;
    }
  }

  async listProducts(): Promise<ProductRecord[]> {
    const rows = await this.db.select().from(products).orderBy(desc(products.isPriority), asc(products.name));
    return rows.map(toProductRecord);
  }

  async getProduct(id: number): Promise<ProductRecord | undefined> {
    const [row] = await this.db.select().from(products).where(eq(products.id, id)).limit(1);
    return row ? toProductRecord(row) : undefined;
  }

  async getProductByName(name: string): Promise<ProductRecord | undefined> {
    const [row] = await this.db.select().from(products).where(eq(products.name, name)).limit(1);
    return row ? toProductRecord(row) : undefined;
  }

  async createProduct(input: ProductInput): Promise<ProductRecord> {
    const [row] = await this.unique('Product', input.name, () =>
      this.db.insert(products).values({
        name: input.name,
        price: toDecimalString(input.price),
        isPriority: input.isPriority,
      }).returning());
    if (!row) {
      throw new Error('Product insert returned no row');
    }
    return toProductRecord(row);
  }

  async updateProduct(id: number, input: Partial<ProductInput>): Promise<ProductRecord | undefined> {
    const [row] = await this.unique('Product', input.name, () =>
      this.db.update(products)
        .set({ ...productValues(input), updatedAt: new Date() })
        .where(eq(products.id, id))
        .returning());
    return row ? toProductRecord(row) : undefined;
  }

  async deleteProduct(id: number): Promise<boolean> {
    const deleted = await this.db.delete(products).where(eq(products.id, id)).returning({ id: products.id });
    return deleted.length > 0;
  }

  async listCustomers(page: PageRequest): Promise<CustomerRecord[]> {
    const rows = await this.db.select().from(customers)
      .orderBy(asc(customers.name), asc(customers.id))
      .limit(page.limit)
      .offset(page.offset);
    return rows.map(toCustomerRecord);
  }

  async countCustomers(): Promise<number> {
    const [row] = await this.db.select({ value: count() }).from(customers);
    return row?.value ?? 0;
  }

  async getCustomer(id: number): Promise<CustomerRecord | undefined> {
    const [row] = await this.db.select().from(customers).where(eq(customers.id, id)).limit(1);
    return row ? toCustomerRecord(row) : undefined;
  }

  async getCustomerByName(name: string): Promise<CustomerRecord | undefined> {
    const [row] = await this.db.select().from(customers)
      .where(sql`lower(${customers.name}) = lower(${name})`)
      .limit(1);
    return row ? toCustomerRecord(row) : undefined;
  }

  async createCustomer(input: CustomerInput): Promise<CustomerRecord> {
    const [row] = await this.unique('Customer', input.name, () =>
      this.db.insert(customers).values(input).returning());
    if (!row) {
      throw new Error('Customer insert returned no row');
    }
    return toCustomerRecord(row);
  }

  async updateCustomer(id: number, input: Partial<CustomerInput>): Promise<CustomerRecord | undefined> {
    if (Object.keys(input).length === 0) return this.getCustomer(id);
    const [row] = await this.unique('Customer', input.name, () =>
      this.db.update(customers).set(input).where(eq(customers.id, id)).returning());
    return row ? toCustomerRecord(row) : undefined;
  }

  async deleteCustomer(id: number): Promise<boolean> {
    const deleted = await this.db.delete(customers).where(eq(customers.id, id)).returning({ id: customers.id });
    return deleted.length > 0;
  }
}
