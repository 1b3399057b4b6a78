import { beforeEach, describe, it, expect } from 'vitest';
import { ReportUnavailableError, ValidationError } from '@server/lib/errors';
import { ReportAggregator, summarizeItems } from '@server/reports/aggregator';
import { fixedClock } from '../helpers/test-app';
import { MemorySalesLedger } from '../helpers/memory-ledger';

describe('ReportAggregator', () => {
  let ledger: MemorySalesLedger;
  let reports: ReportAggregator;

  beforeEach(() => {
    ledger = new MemorySalesLedger('UTC');
    reports = new ReportAggregator(ledger, { timeZone: 'UTC', clock: fixedClock('2024-06-05T10:00:00Z') });
  });

  describe('dailySeries', () => {
    it('fills days without sales with zero, in date order', async () => {
      ledger.seed({ occurredAt: '2024-06-01T09:00:00Z', items: [{ productName: 'Coffee', quantity: 2, price: '50.00' }] });
      ledger.seed({ occurredAt: '2024-06-01T15:00:00Z', items: [{ productName: 'Coffee', quantity: 1, price: '50.00' }] });

      const series = await reports.dailySeries({ start: '2024-06-01', end: '2024-06-03' });

      expect(series.labels).toEqual(['2024-06-01', '2024-06-02', '2024-06-03']);
      expect(series.values).toEqual([150, 0, 0]);
      expect(series.total).toBe(15000);
    });

    it('returns an all-zero series of the full length when nothing was sold', async () => {
      const series = await reports.dailySeries({ start: '2024-02-01', end: '2024-02-29' }, 'day-of-month');

      expect(series.buckets).toHaveLength(29);
      expect(series.values.every((value) => value === 0)).toBe(true);
      expect(series.labels[0]).toBe('1');
      expect(series.labels[28]).toBe('29');
      expect(series.total).toBe(0);
    });

    it('puts late-evening sales on the business day of the configured zone', async () => {
      const manilaLedger = new MemorySalesLedger('Asia/Manila');
      const manilaReports = new ReportAggregator(manilaLedger, { timeZone: 'Asia/Manila' });
      manilaLedger.seed({ occurredAt: '2024-06-01T16:30:00Z', items: [{ productName: 'Tea', quantity: 1, price: '30.00' }] });

      const series = await manilaReports.dailySeries({ start: '2024-06-01', end: '2024-06-02' });

      expect(series.values).toEqual([0, 30]);
    });

    it('raises ReportUnavailableError when the ledger cannot be read', async () => {
      ledger.failOn('read');
      const error = await reports.dailySeries({ start: '2024-06-01', end: '2024-06-03' }).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ReportUnavailableError);
      expect(error).toMatchObject({ statusCode: 503, code: 'REPORT_UNAVAILABLE' });
    });
  });

  describe('itemSummary', () => {
    it('groups by product and sorts by sales then name', async () => {
      ledger.seed({
        occurredAt: '2024-06-03T10:00:00Z',
        items: [
          { productName: 'Tea', quantity: 5, price: '30.00' },
          { productName: 'Bagel', quantity: 2, price: '25.75' },
          { productName: 'Coffee', quantity: 3, price: '50.00' },
        ],
      });
      ledger.seed({ occurredAt: '2024-06-04T10:00:00Z', items: [{ productName: 'Bagel', quantity: 1, price: '25.75' }] });
      ledger.seed({ occurredAt: '2024-06-20T10:00:00Z', items: [{ productName: 'Bagel', quantity: 9, price: '25.75' }] });

      const rows = await reports.itemSummary({ start: '2024-06-01', end: '2024-06-07' });

      expect(rows).toEqual([
        { productName: 'Coffee', quantity: 3, total: 15000 },
        { productName: 'Tea', quantity: 5, total: 15000 },
        { productName: 'Bagel', quantity: 3, total: 7725 },
      ]);
    });

    it('keeps names that differ in case apart', () => {
      const rows = summarizeItems([
        { id: 1, saleId: 1, productName: 'coffee', quantity: 1, priceAtSale: 100, subtotal: 100 },
        { id: 2, saleId: 1, productName: 'Coffee', quantity: 1, priceAtSale: 100, subtotal: 100 },
      ]);
      expect(rows.map((row) => row.productName)).toEqual(['Coffee', 'coffee']);
    });
  });

  describe('weeklyReport', () => {
    it('covers Monday to Sunday around the reference date', async () => {
      ledger.seed({ occurredAt: '2024-06-04T12:00:00Z', items: [{ productName: 'Juice', quantity: 1, price: '20.00' }] });

      const report = await reports.weeklyReport('2024-06-05');

      expect(report.range).toEqual({ start: '2024-06-03', end: '2024-06-09' });
      expect(report.series.labels).toEqual(['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun']);
      expect(report.series.values).toEqual([0, 20, 0, 0, 0, 0, 0]);
      expect(report.items).toEqual([{ productName: 'Juice', quantity: 1, total: 2000 }]);
    });

    it('defaults to the current week', async () => {
      const report = await reports.weeklyReport();
      expect(report.reference).toBe('2024-06-05');
      expect(report.range.start).toBe('2024-06-03');
    });
  });

  describe('monthlyReport', () => {
    it('spans the whole month with navigation across years', async () => {
      const report = await reports.monthlyReport({ year: 2024, month: 1 });

      expect(report.range).toEqual({ start: '2024-01-01', end: '2024-01-31' });
      expect(report.monthName).toBe('January');
      expect(report.previous).toEqual({ year: 2023, month: 12 });
      expect(report.next).toEqual({ year: 2024, month: 2 });
      expect(report.series.labels).toHaveLength(31);
      expect(report.series.labels[30]).toBe('31');
    });

    it('defaults to the current month', async () => {
      const report = await reports.monthlyReport();
      expect(report).toMatchObject({ year: 2024, month: 6, range: { start: '2024-06-01', end: '2024-06-30' } });
    });
  });

  describe('rangeReport', () => {
    it('accepts up to 366 days', async () => {
      const report = await reports.rangeReport({ start: '2024-01-01', end: '2024-12-31' });
      expect(report.series.buckets).toHaveLength(366);
    });

    it('rejects inverted and oversized ranges', async () => {
      await expect(reports.rangeReport({ start: '2024-06-03', end: '2024-06-01' })).rejects.toBeInstanceOf(ValidationError);
      await expect(reports.rangeReport({ start: '2024-01-01', end: '2025-01-01' })).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('dashboard', () => {
    it("summarizes today's sales and the current week", async () => {
      ledger.seed({
        occurredAt: '2024-06-05T08:00:00Z',
        items: [
          { productName: 'Coffee', quantity: 3, price: '50.00' },
          { productName: 'Tea', quantity: 1, price: '30.00' },
        ],
      });
      ledger.seed({
        occurredAt: '2024-06-05T09:00:00Z',
        items: [
          { productName: 'Tea', quantity: 1, price: '30.00' },
          { productName: 'Bagel', quantity: 2, price: '25.75' },
        ],
      });
      ledger.seed({ occurredAt: '2024-06-03T09:00:00Z', items: [{ productName: 'Juice', quantity: 1, price: '10.00' }] });
      ledger.seed({ occurredAt: '2024-06-02T09:00:00Z', items: [{ productName: 'Juice', quantity: 1, price: '99.00' }] });

      const summary = await reports.dashboard();

      expect(summary).toEqual({
        today: '2024-06-05',
        todayTotal: 26150,
        itemsSoldToday: [
          { productName: 'Coffee', quantity: 3 },
          { productName: 'Bagel', quantity: 2 },
          { productName: 'Tea', quantity: 2 },
        ],
        week: { start: '2024-06-03', end: '2024-06-09' },
        weekTotal: 27150,
      });
    });
  });
});
