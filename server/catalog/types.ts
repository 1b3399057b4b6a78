import type { Cents } from '@shared/lib/money';
import type { PageRequest } from '../ledger/types';

export interface ProductRecord {
  id: number;
  name: string;
  price: Cents;
  isPriority: boolean;
}

export interface ProductInput {
  name: string;
  price: Cents;
  isPriority: boolean;
}

export interface CustomerRecord {
  id: number;
  name: string;
  contact: string | null;
  address: string | null;
  createdAt: Date;
}

export interface CustomerInput {
  name: string;
  contact: string | null;
  address: string | null;
}

export interface CatalogStore {
  /** Priority products first, then by name. */
  listProducts(): Promise<ProductRecord[]>;
  getProduct(id: number): Promise<ProductRecord | undefined>;
  /** Exact, case-sensitive match. */
  getProductByName(name: string): Promise<ProductRecord | undefined>;
  createProduct(input: ProductInput): Promise<ProductRecord>;
  updateProduct(id: number, input: Partial<ProductInput>): Promise<ProductRecord | undefined>;
  deleteProduct(id: number): Promise<boolean>;

  /** Ordered by name. */
  listCustomers(page: PageRequest): Promise<CustomerRecord[]>;
  countCustomers(): Promise<number>;
  getCustomer(id: number): Promise<CustomerRecord | undefined>;
  /** Case-insensitive match. */
  getCustomerByName(name: string): Promise<CustomerRecord | undefined>;
  createCustomer(input: CustomerInput): Promise<CustomerRecord>;
  updateCustomer(id: number, input: Partial<CustomerInput>): Promise<CustomerRecord | undefined>;
  deleteCustomer(id: number): Promise<boolean>;
}
