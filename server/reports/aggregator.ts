import {
  calendarDateInZone,
  compareDates,
  dayOfMonth,
  daysBetween,
  eachDay,
  monthName,
  monthRange,
  shiftMonth,
  weekContaining,
  weekdayLabel,
  yearMonthOf,
  type CalendarDate,
  type DateRange,
  type YearMonth,
} from '@shared/lib/dates';
import { sumCents, toMajorUnits, type Cents } from '@shared/lib/money';
import { ReportUnavailableError, ValidationError } from '../lib/errors';
import { logger } from '../lib/logger';
import type { LedgerReader, SaleItemRecord, SaleRecord } from '../ledger/types';
import type { Clock } from '../pos/finalizer';

export type LabelStyle = 'weekday' | 'day-of-month' | 'date';

export interface DailyBucket {
  date: CalendarDate;
  label: string;
  total: Cents;
}

/** Chart-ready series: one bucket per calendar date, chronological, no gaps. */
export interface SalesSeries {
  buckets: DailyBucket[];
  labels: string[];
  values: number[];
  total: Cents;
}

export interface ItemSummaryRow {
  productName: string;
  quantity: number;
  total: Cents;
}

export interface ItemQuantityRow {
  productName: string;
  quantity: number;
}

export interface PeriodReport {
  range: DateRange;
  series: SalesSeries;
  items: ItemSummaryRow[];
}

export interface WeeklyReport extends PeriodReport {
  reference: CalendarDate;
}

export interface MonthlyReport extends PeriodReport {
  year: number;
  month: number;
  monthName: string;
  previous: YearMonth;
  next: YearMonth;
}

export interface DashboardSummary {
  today: CalendarDate;
  todayTotal: Cents;
  itemsSoldToday: ItemQuantityRow[];
  week: DateRange;
  weekTotal: Cents;
}

export interface ReportAggregatorOptions {
  timeZone: string;
  clock?: Clock;
  maxRangeDays?: number;
}

const byName = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

function labelFor(date: CalendarDate, style: LabelStyle): string {
  switch (style) {
    case 'weekday':
      return weekdayLabel(date);
    case 'day-of-month':
      return String(dayOfMonth(date));
    case 'date':
      return date;
  }
}

/**
 * Builds the full date axis of `range`, then joins the per-day sums of `salesInRange`
 * onto it. Days without sales stay at zero.
 */
export function bucketDailyTotals(
  salesInRange: SaleRecord[],
  range: DateRange,
  timeZone: string,
  style: LabelStyle = 'date',
): SalesSeries {
  const sums = new Map<CalendarDate, Cents>();
  for (const sale of salesInRange) {
    const day = calendarDateInZone(sale.occurredAt, timeZone);
    sums.set(day, (sums.get(day) ?? 0) + sale.total);
  }

  const buckets = eachDay(range).map((date) => ({
    date,
    label: labelFor(date, style),
    total: sums.get(date) ?? 0,
  }));

  return {
    buckets,
    labels: buckets.map((b) => b.label),
    values: buckets.map((b) => toMajorUnits(b.total)),
    total: sumCents(buckets.map((b) => b.total)),
  };
}

/** Best sellers first: total sales descending, then product name ascending. */
export function summarizeItems(items: SaleItemRecord[]): ItemSummaryRow[] {
  const rows = new Map<string, ItemSummaryRow>();
  for (const item of items) {
    const row = rows.get(item.productName) ?? { productName: item.productName, quantity: 0, total: 0 };
    row.quantity += item.quantity;
    row.total += item.subtotal;
    rows.set(item.productName, row);
  }
  return [...rows.values()].sort((a, b) => b.total - a.total || byName(a.productName, b.productName));
}

/** Most sold first: quantity descending, then product name ascending. */
export function summarizeQuantities(items: SaleItemRecord[]): ItemQuantityRow[] {
  return summarizeItems(items)
    .map(({ productName, quantity }) => ({ productName, quantity }))
    .sort((a, b) => b.quantity - a.quantity || byName(a.productName, b.productName));
}

export class ReportAggregator {
  private readonly timeZone: string;
  private readonly clock: Clock;
  private readonly maxRangeDays: number;

  constructor(private readonly ledger: LedgerReader, options: ReportAggregatorOptions) {
    this.timeZone = options.timeZone;
    this.clock = options.clock ?? (() => new Date());
    this.maxRangeDays = options.maxRangeDays ?? 366;
  }

  today(): CalendarDate {
    return calendarDateInZone(this.clock(), this.timeZone);
  }

  private async read<T>(report: string, range: DateRange, query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      logger.error('Report query failed', { report, start: range.start, end: range.end }, error);
      throw new ReportUnavailableError(report, error);
    }
  }

  private async loadPeriod(report: string, range: DateRange): Promise<{ sales: SaleRecord[]; items: SaleItemRecord[] }> {
    return this.read(report, range, async () => {
      const sales = await this.ledger.querySales(range);
      const items = await this.ledger.querySaleItems(sales.map((s) => s.id));
      return { sales, items };
    });
  }

  async dailySeries(range: DateRange, style: LabelStyle = 'date'): Promise<SalesSeries> {
    const sales = await this.read('daily sales', range, () => this.ledger.querySales(range));
    return bucketDailyTotals(sales, range, this.timeZone, style);
  }

  async itemSummary(range: DateRange): Promise<ItemSummaryRow[]> {
    const { items } = await this.loadPeriod('item summary', range);
    return summarizeItems(items);
  }

  private async periodReport(report: string, range: DateRange, style: LabelStyle): Promise<PeriodReport> {
    const { sales, items } = await this.loadPeriod(report, range);
    const result = {
      range,
      series: bucketDailyTotals(sales, range, this.timeZone, style),
      items: summarizeItems(items),
    };
    logger.debug('Report computed', { report, start: range.start, end: range.end, sales: sales.length });
    return result;
  }

  async weeklyReport(reference: CalendarDate = this.today()): Promise<WeeklyReport> {
    const range = weekContaining(reference);
    const report = await this.periodReport('weekly', range, 'weekday');
    return { ...report, reference };
  }

  async monthlyReport(target: YearMonth = yearMonthOf(this.today())): Promise<MonthlyReport> {
    const range = monthRange(target);
    const report = await this.periodReport('monthly', range, 'day-of-month');
    return {
      ...report,
      year: target.year,
      month: target.month,
      monthName: monthName(target.month),
      previous: shiftMonth(target, -1),
      next: shiftMonth(target, 1),
    };
  }

  async rangeReport(range: DateRange): Promise<PeriodReport> {
    if (compareDates(range.start, range.end) > 0) {
      throw new ValidationError('Start date cannot be after end date.', range);
    }
    if (daysBetween(range.start, range.end) + 1 > this.maxRangeDays) {
      throw new ValidationError(`Date range cannot exceed ${this.maxRangeDays} days.`, range);
    }
    return this.periodReport('range', range, 'date');
  }

  async dashboard(): Promise<DashboardSummary> {
    const today = this.today();
    const week = weekContaining(today);
    const todayRange = { start: today, end: today };

    const [todayPeriod, weekSales] = await Promise.all([
      this.loadPeriod('dashboard', todayRange),
      this.read('dashboard', week, () => this.ledger.querySales(week)),
    ]);

    return {
      today,
      todayTotal: sumCents(todayPeriod.sales.map((s) => s.total)),
      itemsSoldToday: summarizeQuantities(todayPeriod.items),
      week,
      weekTotal: sumCents(weekSales.map((s) => s.total)),
    };
  }
}
