import type { CatalogStore } from './catalog/types';
import type { SalesLedger } from './ledger/types';
import { SaleFinalizer, type Clock } from './pos/finalizer';
import { ReportAggregator } from './reports/aggregator';

export interface Services {
  catalog: CatalogStore;
  ledger: SalesLedger;
  finalizer: SaleFinalizer;
  reports: ReportAggregator;
  /** Readiness probe; resolves false when a backing store is unreachable. */
  checkHealth: () => Promise<boolean>;
}

export interface ServiceDependencies {
  catalog: CatalogStore;
  ledger: SalesLedger;
  timeZone: string;
  clock?: Clock;
  checkHealth?: () => Promise<boolean>;
}

export function createServices({ catalog, ledger, timeZone, clock, checkHealth }: ServiceDependencies): Services {
  return {
    catalog,
    ledger,
    finalizer: new SaleFinalizer(ledger, clock),
    reports: new ReportAggregator(ledger, { timeZone, clock }),
    checkHealth: checkHealth ?? (async () => true),
  };
}
