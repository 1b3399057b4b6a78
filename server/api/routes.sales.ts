import type { Express, Request, Response } from 'express';
import { z } from 'zod';
import type { Env } from '@shared/env';
import { compareDates } from '@shared/lib/dates';
import { formatMoney } from '@shared/lib/money';
import { NotFoundError, ValidationError, handleAsyncError, sendSuccessResponse } from '../lib/errors';
import type { SalesFilter } from '../ledger/types';
import { calendarDateField, idParam, pageQuery, parseParams, parseQuery } from '../middleware/validation';
import type { Services } from '../services';
import { receiptView, saleView } from './views';

const DateFilterQuery = z.object({
  start_date: calendarDateField.optional(),
  end_date: calendarDateField.optional(),
});

function toFilter(query: z.infer<typeof DateFilterQuery>): SalesFilter {
  if (query.start_date && query.end_date && compareDates(query.start_date, query.end_date) > 0) {
    throw new ValidationError('Start date cannot be after end date.', { start_date: query.start_date, end_date: query.end_date });
  }
  return { from: query.start_date, to: query.end_date };
}

export async function registerSalesRoutes(app: Express, services: Services, env: Env) {
  const { ledger, finalizer, reports } = services;
  const timeZone = env.BUSINESS_TIMEZONE;
  const HistoryQuery = DateFilterQuery.merge(pageQuery(env.ITEMS_PER_PAGE));

  // GET /api/sales - newest first, optionally bounded by business date
  app.get('/api/sales', handleAsyncError(async (req: Request, res: Response) => {
    const query = parseQuery(HistoryQuery, req);
    const filter = toFilter(query);
    const offset = (query.page - 1) * query.per_page;
    const [rows, total] = await Promise.all([
      ledger.listSales(filter, { limit: query.per_page, offset }),
      ledger.countSales(filter),
    ]);
    sendSuccessResponse(res, {
      sales: rows.map((sale) => saleView(sale, timeZone)),
      pagination: {
        page: query.page,
        perPage: query.per_page,
        total,
        totalPages: Math.ceil(total / query.per_page),
      },
    });
  }));

  // GET /api/sales/receipts - every sale in the range with its items, oldest first
  app.get('/api/sales/receipts', handleAsyncError(async (req: Request, res: Response) => {
    const query = parseQuery(DateFilterQuery, req);
    const today = reports.today();
    const range = { start: query.start_date ?? today, end: query.end_date ?? today };
    toFilter({ start_date: range.start, end_date: range.end });

    const rows = await ledger.querySales(range);
    const items = await ledger.querySaleItems(rows.map((sale) => sale.id));
    sendSuccessResponse(res, {
      range,
      currency: env.CURRENCY,
      receipts: rows.map((sale) => ({
        ...receiptView(sale, items, timeZone),
        totalDisplay: formatMoney(sale.total, env.CURRENCY),
      })),
    });
  }));

  app.get('/api/sales/:id', handleAsyncError(async (req: Request, res: Response) => {
    const { id } = parseParams(idParam, req);
    const sale = await ledger.getSale(id);
    if (!sale) {
      throw new NotFoundError('Sale');
    }
    const items = await ledger.querySaleItems([sale.id]);
    sendSuccessResponse(res, receiptView(sale, items, timeZone));
  }));

  app.delete('/api/sales/:id', handleAsyncError(async (req: Request, res: Response) => {
    const { id } = parseParams(idParam, req);
    const deleted = await finalizer.deleteSale(id);
    if (!deleted) {
      throw new NotFoundError('Sale');
    }
    sendSuccessResponse(res, { id }, 'Sale deleted.');
  }));
}
