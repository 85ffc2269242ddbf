import type { DailyKpi, KpiObject, TripRecord } from '@ride-pipeline/domain';
import { InvalidTimestampError } from '../../errors.js';

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// YYYY-MM-DD, optional [T ]HH:MM[:SS[.fff]], optional Z or ±HH[:]MM.
const TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|([+-])(\d{2}):?(\d{2}))?$/i;

/** Numeric fare, or null when the value does not read as a number. */
export function toFare(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  if (!DECIMAL.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

interface PickupTime {
  ts: Date;
  /** Epoch milliseconds plus the sub-millisecond digits, so equal keys mean equal instants. */
  key: string;
}

function readPickupTime(value: unknown): PickupTime {
  if (typeof value !== 'string') throw new InvalidTimestampError(value);
  const match = TIMESTAMP.exec(value.trim());
  if (!match) throw new InvalidTimestampError(value);

  const [, y, mo, d, h = '0', mi = '0', s = '0', frac = '', , sign, oh = '0', om = '0'] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const offsetMinutes = (sign === '-' ? -1 : 1) * (Number(oh) * 60 + Number(om));

  // setUTCFullYear keeps years 0-99 literal; Date.UTC would shift them into the 1900s.
  const lastOfMonth = new Date(0);
  lastOfMonth.setUTCFullYear(year, month, 0);
  if (
    month < 1 || month > 12 ||
    day < 1 || day > lastOfMonth.getUTCDate() ||
    hour > 23 || minute > 59 || second > 59 ||
    Number(oh) > 23 || Number(om) > 59
  ) {
    throw new InvalidTimestampError(value);
  }

  const digits = frac.padEnd(9, '0');
  const ts = new Date(0);
  ts.setUTCFullYear(year, month - 1, day);
  ts.setUTCHours(hour, minute - offsetMinutes, second, Number(digits.slice(0, 3)));
  return { ts, key: `${ts.getTime()}.${digits.slice(3)}` };
}

/**
 * Reads a pickup time. Naive values are taken as UTC. The returned Date holds
 * millisecond precision; grouping keeps the finer digits separately.
 * Throws InvalidTimestampError for anything that is not a real calendar instant.
 */
export function parsePickupTimestamp(value: unknown): Date {
  return readPickupTime(value).ts;
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

/** Output path for a group: one object per calendar date, later groups overwrite earlier ones. */
export function kpiObjectKey(ts: Date): string {
  return `kpis/date=${ts.toISOString().slice(0, 10)}/kpi.json`;
}

/**
 * Groups records by their exact pickup timestamp and summarizes each group's fares.
 * Fares that are not numeric are left out of every statistic, including the count.
 * Records without a pickup time are skipped; a present but unparseable one throws
 * InvalidTimestampError.
 */
export function computeKpis(records: readonly TripRecord[]): Array<{ ts: Date; kpi: DailyKpi }> {
  const groups = new Map<string, { ts: Date; fares: number[] }>();
  let skipped = 0;

  for (const record of records) {
    const raw = record['pickup_datetime'];
    if (isBlank(raw)) {
      skipped += 1;
      continue;
    }
    const { ts, key } = readPickupTime(raw);
    let group = groups.get(key);
    if (!group) {
      group = { ts, fares: [] };
      groups.set(key, group);
    }
    const fare = toFare(record['fare_amount']);
    if (fare !== null) group.fares.push(fare);
  }
  if (skipped) console.warn(`[aggregator] skipped ${skipped} record(s) without pickup_datetime`);

  return [...groups.entries()]
    .sort(([a, x], [b, y]) => x.ts.getTime() - y.ts.getTime() || (a < b ? -1 : a > b ? 1 : 0))
    .map(([, { ts, fares }]) => ({ ts, kpi: summarize(ts, fares) }));
}

function summarize(ts: Date, fares: readonly number[]): DailyKpi {
  let total = 0;
  let max = -Infinity;
  let min = Infinity;
  for (const fare of fares) {
    total += fare;
    if (fare > max) max = fare;
    if (fare < min) min = fare;
  }
  const count = fares.length;
  return {
    pickup_datetime: ts.toISOString(),
    total_fare: total,
    count_trips: count,
    average_fare: count ? total / count : null,
    max_fare: count ? max : null,
    min_fare: count ? min : null,
  };
}

export function planKpiObjects(records: readonly TripRecord[]): KpiObject[] {
  return computeKpis(records).map(({ ts, kpi }) => ({ key: kpiObjectKey(ts), kpi }));
}
