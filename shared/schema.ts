import { relations, sql } from "drizzle-orm";
import {
  pgTable,
  serial,
  text,
  varchar,
  decimal,
  integer,
  timestamp,
  boolean,
  index,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";
import { isValidUnitPrice } from "./lib/money";

export const WALK_IN_CUSTOMER = "N/A";

// Column limits shared with the cart so nothing it accepts is refused at insert time
export const MAX_NAME_LENGTH = 255;
export const MAX_QUANTITY = 2_147_483_647;

const moneyString = z.string()
  .regex(/^\d+(?:\.\d{1,2})?$/, "must be a non-negative amount with at most two decimals")
  .refine(isValidUnitPrice, "must not exceed 99999999.99");

// Products table
export const products = pgTable("products", {
  id: serial("id").primaryKey(),
  name: varchar("name", { length: MAX_NAME_LENGTH }).notNull().unique(),
  price: decimal("price", { precision: 10, scale: 2 }).notNull(),
  isPriority: boolean("is_priority").notNull().default(false),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  priorityIdx: index("products_priority_idx").on(table.isPriority, table.name),
}));

// Customers are unique by name regardless of case
export const customers = pgTable("customers", {
  id: serial("id").primaryKey(),
  name: varchar("name", { length: MAX_NAME_LENGTH }).notNull(),
  contact: varchar("contact", { length: 64 }),
  address: text("address"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
  nameUnique: uniqueIndex("customers_name_lower_unique").on(sql`lower(${table.name})`),
}));

// Finalized sales; a null customer is a walk-in
export const sales = pgTable("sales", {
  id: serial("id").primaryKey(),
  occurredAt: timestamp("occurred_at", { withTimezone: true }).notNull().defaultNow(),
  customerName: varchar("customer_name", { length: MAX_NAME_LENGTH }),
  total: decimal("total", { precision: 12, scale: 2 }).notNull(),
}, (table) => ({
  occurredAtIdx: index("sales_occurred_at_idx").on(table.occurredAt),
}));

// Product names are snapshots: no foreign key to products
export const saleItems = pgTable("sale_items", {
  id: serial("id").primaryKey(),
  saleId: integer("sale_id").notNull().references(() => sales.id, { onDelete: "cascade" }),
  productName: varchar("product_name", { length: MAX_NAME_LENGTH }).notNull(),
  quantity: integer("quantity").notNull(),
  priceAtSale: decimal("price_at_sale", { precision: 10, scale: 2 }).notNull(),
  subtotal: decimal("subtotal", { precision: 12, scale: 2 }).notNull(),
}, (table) => ({
  saleIdIdx: index("sale_items_sale_id_idx").on(table.saleId),
}));

export const salesRelations = relations(sales, ({ many }) => ({
  items: many(saleItems),
}));

export const saleItemsRelations = relations(saleItems, ({ one }) => ({
  sale: one(sales, { fields: [saleItems.saleId], references: [sales.id] }),
}));

export const insertProductSchema = createInsertSchema(products, {
  name: z.string().trim().min(1).max(MAX_NAME_LENGTH),
  price: moneyString,
}).omit({ id: true, createdAt: true, updatedAt: true });

export const insertCustomerSchema = createInsertSchema(customers, {
  name: z.string().trim().min(1).max(MAX_NAME_LENGTH)
    .refine((name) => name.toUpperCase() !== WALK_IN_CUSTOMER, `"${WALK_IN_CUSTOMER}" is reserved for walk-in sales`),
  contact: z.string().trim().max(64).nullish(),
  address: z.string().trim().max(1000).nullish(),
}).omit({ id: true, createdAt: true });

export type Product = typeof products.$inferSelect;
export type InsertProduct = z.infer<typeof insertProductSchema>;
export type Customer = typeof customers.$inferSelect;
export type InsertCustomer = z.infer<typeof insertCustomerSchema>;
export type Sale = typeof sales.$inferSelect;
export type SaleItem = typeof saleItems.$inferSelect;
