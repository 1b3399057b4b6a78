import type { Express, Request, Response } from 'express';
import { z } from 'zod';
import { toDecimalString } from '@shared/lib/money';
import { handleAsyncError, sendSuccessResponse } from '../lib/errors';
import { calendarDateField, parseParams, parseQuery } from '../middleware/validation';
import type { Services } from '../services';
import { itemQuantityView, periodReportView } from './views';

const WeeklyQuery = z.object({
  date: calendarDateField.optional(),
});

const MonthParams = z.object({
  year: z.coerce.number().int().min(1970).max(9999),
  month: z.coerce.number().int().min(1).max(12),
});

const RangeQuery = z.object({
  start_date: calendarDateField,
  end_date: calendarDateField,
});

export async function registerReportRoutes(app: Express, services: Services) {
  const { reports } = services;

  app.get('/api/reports/dashboard', handleAsyncError(async (_req: Request, res: Response) => {
    const summary = await reports.dashboard();
    sendSuccessResponse(res, {
      today: summary.today,
      todayTotal: toDecimalString(summary.todayTotal),
      itemsSoldToday: itemQuantityView(summary.itemsSoldToday),
      week: summary.week,
      weekTotal: toDecimalString(summary.weekTotal),
    });
  }));

  app.get('/api/reports/weekly', handleAsyncError(async (req: Request, res: Response) => {
    const { date } = parseQuery(WeeklyQuery, req);
    const report = await reports.weeklyReport(date);
    sendSuccessResponse(res, { reference: report.reference, ...periodReportView(report) });
  }));

  const sendMonthly = async (res: Response, target?: z.infer<typeof MonthParams>) => {
    const report = await reports.monthlyReport(target);
    sendSuccessResponse(res, {
      year: report.year,
      month: report.month,
      monthName: report.monthName,
      previous: report.previous,
      next: report.next,
      ...periodReportView(report),
    });
  };

  app.get('/api/reports/monthly', handleAsyncError(async (_req: Request, res: Response) => {
    await sendMonthly(res);
  }));

  app.get('/api/reports/monthly/:year/:month', handleAsyncError(async (req: Request, res: Response) => {
    await sendMonthly(res, parseParams(MonthParams, req));
  }));

  app.get('/api/reports/range', handleAsyncError(async (req: Request, res: Response) => {
    const query = parseQuery(RangeQuery, req);
    const report = await reports.rangeReport({ start: query.start_date, end: query.end_date });
    sendSuccessResponse(res, periodReportView(report));
  }));
}
