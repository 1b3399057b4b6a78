import { calendarDateInZone } from '@shared/lib/dates';
import { toDecimalString } from '@shared/lib/money';
import type { CustomerRecord, ProductRecord } from '../catalog/types';
import type { SaleItemRecord, SaleRecord } from '../ledger/types';
import { cartTotal, displayCustomer, lineSubtotal, type Cart } from '../pos/cart';
import type { ItemQuantityRow, ItemSummaryRow, PeriodReport, SalesSeries } from '../reports/aggregator';

// Amounts leave the API as two-decimal strings ("150.00")

export function cartView(cart: Cart) {
  return {
    lines: cart.lines.map((line) => ({
      name: line.name,
      unitPrice: toDecimalString(line.unitPrice),
      quantity: line.quantity,
      subtotal: toDecimalString(lineSubtotal(line)),
    })),
    customerName: cart.customer,
    customerLabel: displayCustomer(cart.customer),
    itemCount: cart.lines.reduce((sum, line) => sum + line.quantity, 0),
    total: toDecimalString(cartTotal(cart)),
  };
}

export function saleView(sale: SaleRecord, timeZone: string) {
  return {
    id: sale.id,
    occurredAt: sale.occurredAt.toISOString(),
    businessDate: calendarDateInZone(sale.occurredAt, timeZone),
    customerName: sale.customerName,
    customerLabel: displayCustomer(sale.customerName),
    total: toDecimalString(sale.total),
  };
}

export function saleItemView(item: SaleItemRecord) {
  return {
    productName: item.productName,
    quantity: item.quantity,
    priceAtSale: toDecimalString(item.priceAtSale),
    subtotal: toDecimalString(item.subtotal),
  };
}

export function receiptView(sale: SaleRecord, items: SaleItemRecord[], timeZone: string) {
  return {
    ...saleView(sale, timeZone),
    items: items.filter((item) => item.saleId === sale.id).map(saleItemView),
  };
}

export function productView(product: ProductRecord) {
  return {
    id: product.id,
    name: product.name,
    price: toDecimalString(product.price),
    isPriority: product.isPriority,
  };
}

export function customerView(customer: CustomerRecord) {
  return {
    id: customer.id,
    name: customer.name,
    contact: customer.contact,
    address: customer.address,
    createdAt: customer.createdAt.toISOString(),
  };
}

export function seriesView(series: SalesSeries) {
  return {
    buckets: series.buckets.map((bucket) => ({
      date: bucket.date,
      label: bucket.label,
      total: toDecimalString(bucket.total),
    })),
    labels: series.labels,
    values: series.values,
    total: toDecimalString(series.total),
  };
}

export function itemSummaryView(rows: ItemSummaryRow[]) {
  return rows.map((row) => ({
    productName: row.productName,
    quantity: row.quantity,
    total: toDecimalString(row.total),
  }));
}

export function itemQuantityView(rows: ItemQuantityRow[]) {
  return rows.map((row) => ({ productName: row.productName, quantity: row.quantity }));
}

export function periodReportView(report: PeriodReport) {
  return {
    range: report.range,
    series: seriesView(report.series),
    items: itemSummaryView(report.items),
  };
}
