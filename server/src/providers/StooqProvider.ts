import { periodStart, type PriceHistoryProvider, type PricePoint } from './provider.interface.js';
import { fetchStooqCsv, parseStooqCsv } from './stooq.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

export interface StooqProviderOptions {
  /** Stooq's code for the instrument when it differs from the Yahoo symbol. */
  symbolOverride?: string;
  fetchCsv?: (symbol: string) => Promise<string>;
  logger?: Logger;
  now?: () => Date;
}

export class StooqProvider implements PriceHistoryProvider {
  readonly id = 'stooq';
  readonly name = 'Stooq Daily Prices';
  private readonly fetchCsv: (symbol: string) => Promise<string>;
  private readonly now: () => Date;

  constructor(private readonly opts: StooqProviderOptions = {}) {
    const logger = opts.logger ?? defaultLogger;
    this.fetchCsv = opts.fetchCsv ?? (symbol => fetchStooqCsv(symbol, { logger }));
    this.now = opts.now ?? (() => new Date());
  }

  async fetch(symbol: string, period: string): Promise<PricePoint[]> {
    const from = periodStart(period, this.now()).toISOString().slice(0, 10);
    const csv = await this.fetchCsv(this.opts.symbolOverride ?? symbol);
    // Stooq always returns full history; trim to the requested period
    return parseStooqCsv(csv).filter(r => r.date >= from);
  }
}
