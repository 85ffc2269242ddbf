import type { DailyKpi } from '../../entities/daily-kpi.js';

export interface KpiAggregationPort {
  /** Rejects on any scan, parse or write failure. */
  run(): Promise<void>;
}

export interface KpiObject {
  key: string;
  kpi: DailyKpi;
}
