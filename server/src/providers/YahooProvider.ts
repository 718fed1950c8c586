import type { PriceHistoryProvider, PricePoint } from './provider.interface.js';
import { fetchYahooDaily, yahooChartClient, type YahooChartClient } from './yahoo.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

export class YahooProvider implements PriceHistoryProvider {
  readonly id = 'yahoo';
  readonly name = 'Yahoo Finance Daily Chart';

  constructor(
    private readonly client: YahooChartClient = yahooChartClient,
    private readonly logger: Logger = defaultLogger,
  ) {}

  fetch(symbol: string, period: string): Promise<PricePoint[]> {
    return fetchYahooDaily(symbol, period, this.client, this.logger);
  }
}
