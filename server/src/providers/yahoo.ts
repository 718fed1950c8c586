// Yahoo Finance daily history via yahoo-finance2 `chart`.
// Provides: fetchYahooDaily, parseYahooQuotes

import yahooFinance from 'yahoo-finance2';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { normalizeSeries, periodStart, type PricePoint } from './provider.interface.js';

export interface YahooChartQuote {
  date: Date;
  open?: number | null;
  high?: number | null;
  low?: number | null;
  close?: number | null;
  volume?: number | null;
}

/** The slice of the yahoo-finance2 client this module calls. */
export interface YahooChartClient {
  chart(symbol: string, options: { period1: Date; interval: '1d' }): Promise<{ quotes: YahooChartQuote[] }>;
}

export const yahooChartClient: YahooChartClient = {
  chart: (symbol, options) => yahooFinance.chart(symbol, options),
};

export async function fetchYahooDaily(
  symbol: string,
  period: string,
  client: YahooChartClient = yahooChartClient,
  logger: Logger = defaultLogger,
  now: Date = new Date(),
): Promise<PricePoint[]> {
  const period1 = periodStart(period, now);
  try {
    const result = await client.chart(symbol, { period1, interval: '1d' });
    return parseYahooQuotes(result.quotes);
  } catch (err) {
    logger.error({ err, symbol, period }, 'yahoo_chart_failed');
    throw err;
  }
}

export function parseYahooQuotes(quotes: readonly YahooChartQuote[]): PricePoint[] {
  const rows: PricePoint[] = [];
  for (const q of quotes) {
    if (!(q.date instanceof Date) || Number.isNaN(q.date.getTime())) continue;
    const open = Number(q.open);
    const high = Number(q.high);
    const low = Number(q.low);
    const close = Number(q.close);
    // null OHLC fields mean the session has no print (holiday rows, today's partial bar)
    if ([q.open, q.high, q.low, q.close].some(v => v == null)) continue;
    if (![open, high, low, close].every(n => Number.isFinite(n))) continue;
    const volume = Number(q.volume);
    rows.push({
      date: q.date.toISOString().slice(0, 10),
      open,
      high,
      low,
      close,
      volume: Number.isFinite(volume) ? volume : 0,
    });
  }
  return normalizeSeries(rows);
}
