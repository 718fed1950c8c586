import { fetchWithRetry, type FetchRetryOptions } from '../utils/fetchRetry.js';
import { logger } from '../utils/logger.js';
import { normalizeSeries, type PricePoint } from './provider.interface.js';

export function stooqUrl(symbol: string) {
  // Stooq expects lowercase symbols
  return `https://stooq.com/q/d/l/?s=${encodeURIComponent(symbol.toLowerCase())}&i=d`;
}

export async function fetchStooqCsv(symbol: string, opts: FetchRetryOptions = {}): Promise<string> {
  const url = stooqUrl(symbol);
  const log = opts.logger ?? logger;
  log.info({ symbol }, 'stooq_fetch');
  const res = await fetchWithRetry(url, { headers: { 'Accept': 'text/csv,*/*' } }, { label: 'stooq', timeoutMs: 15000, ...opts });
  if (!res.ok) throw new Error(`Stooq error: ${res.status}`);
  return res.text();
}

/**
 * Parses Stooq's daily CSV (`Date,Open,High,Low,Close,Volume`). Returns an
 * empty list for the plain-text "No data" reply.
 */
export function parseStooqCsv(csv: string): PricePoint[] {
  const lines = csv.trim().split(/\r?\n/);
  if (lines.length < 2) return [];
  const header = lines[0].toLowerCase().split(',').map(h => h.trim());
  const idx = {
    date: header.indexOf('date'),
    open: header.indexOf('open'),
    high: header.indexOf('high'),
    low: header.indexOf('low'),
    close: header.indexOf('close'),
    volume: header.indexOf('volume'),
  };
  if (idx.date < 0 || idx.close < 0) return [];
  const rows: PricePoint[] = [];
  for (let i = 1; i < lines.length; i++) {
    const cols = lines[i].split(',');
    if (cols.length < 5) continue;
    const close = Number(cols[idx.close]);
    const pick = (j: number) => (j >= 0 && cols[j] !== undefined && cols[j] !== '' ? Number(cols[j]) : close);
    const open = pick(idx.open);
    const high = pick(idx.high);
    const low = pick(idx.low);
    const volume = idx.volume >= 0 ? Number(cols[idx.volume] || 0) : 0;
    if (![open, high, low, close].every(n => Number.isFinite(n))) continue;
    rows.push({ date: (cols[idx.date] ?? '').trim(), open, high, low, close, volume: Number.isFinite(volume) ? volume : 0 });
  }
  return normalizeSeries(rows);
}
