import { ConfigError } from '../shared/errors.js';

export interface PricePoint {
  date: string;        // YYYY-MM-DD, session date
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/** Ascending by date, last element is the most recent session. */
export type OrderedSeries = readonly PricePoint[];

export const PROVIDER_IDS = ['yahoo', 'stooq'] as const;
export type ProviderId = typeof PROVIDER_IDS[number];

export const HISTORY_PERIODS = ['5d', '1mo', '3mo', '6mo', '1y', '2y', '5y', '10y', 'max'] as const;
export type HistoryPeriod = typeof HISTORY_PERIODS[number];

export interface PriceHistoryProvider {
  readonly id: string;
  readonly name: string;
  fetch(symbol: string, period: string): Promise<PricePoint[]>;
}

export function isHistoryPeriod(value: string): value is HistoryPeriod {
  return HISTORY_PERIODS.some(p => p === value);
}

/** First calendar day covered by `period`, counted back from `now` (UTC). */
export function periodStart(period: string, now: Date = new Date()): Date {
  if (!isHistoryPeriod(period)) {
    throw new ConfigError(`unsupported period "${period}" (expected one of ${HISTORY_PERIODS.join(', ')})`);
  }
  const d = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
  switch (period) {
    case '5d': d.setUTCDate(d.getUTCDate() - 5); break;
    case '1mo': d.setUTCMonth(d.getUTCMonth() - 1); break;
    case '3mo': d.setUTCMonth(d.getUTCMonth() - 3); break;
    case '6mo': d.setUTCMonth(d.getUTCMonth() - 6); break;
    case '1y': d.setUTCFullYear(d.getUTCFullYear() - 1); break;
    case '2y': d.setUTCFullYear(d.getUTCFullYear() - 2); break;
    case '5y': d.setUTCFullYear(d.getUTCFullYear() - 5); break;
    case '10y': d.setUTCFullYear(d.getUTCFullYear() - 10); break;
    case 'max': return new Date(0);
  }
  return d;
}

/**
 * Drops rows without a usable close, keeps the last row per date and sorts
 * ascending. Every provider runs its output through this.
 */
export function normalizeSeries(rows: readonly PricePoint[]): PricePoint[] {
  const map = new Map<string, PricePoint>();
  for (const r of rows) {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(r.date)) continue;
    if (!Number.isFinite(r.close) || r.close <= 0) continue;
    map.set(r.date, r);
  }
  return Array.from(map.values()).sort((a, b) => a.date < b.date ? -1 : a.date > b.date ? 1 : 0);
}
