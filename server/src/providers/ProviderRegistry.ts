import type { Settings } from '../config/settings.js';
import { ConfigError, NoDataError } from '../shared/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import type { PriceHistoryProvider, PricePoint, ProviderId } from './provider.interface.js';
import { StooqProvider } from './StooqProvider.js';
import { YahooProvider } from './YahooProvider.js';
import type { YahooChartClient } from './yahoo.js';

/**
 * Tries each provider in order and returns the first non-empty series.
 * Failures are logged and the next provider is tried.
 */
export class FallbackPriceProvider implements PriceHistoryProvider {
  readonly id = 'fallback';
  readonly name: string;

  constructor(
    private readonly providers: readonly PriceHistoryProvider[],
    private readonly logger: Logger = defaultLogger,
  ) {
    this.name = providers.map(p => p.name).join(' -> ');
  }

  list() {
    return this.providers.map(p => ({ id: p.id, name: p.name }));
  }

  async fetch(symbol: string, period: string): Promise<PricePoint[]> {
    let lastErr: unknown;
    for (const p of this.providers) {
      try {
        const rows = await p.fetch(symbol, period);
        if (rows.length) {
          this.logger.info({ provider: p.id, symbol, period, rows: rows.length, last: rows[rows.length - 1].date }, 'price_history_fetched');
          return rows;
        }
        this.logger.warn({ provider: p.id, symbol, period }, 'price_history_empty');
      } catch (err) {
        // a bad period fails the same way everywhere
        if (err instanceof ConfigError) throw err;
        lastErr = err;
        this.logger.warn({ provider: p.id, symbol, err }, 'price_history_provider_failed');
      }
    }
    const tried = this.providers.map(p => p.id).join(',');
    throw new NoDataError(`no price history for ${symbol} (providers: ${tried})`, lastErr === undefined ? undefined : { cause: lastErr });
  }
}

export interface ProviderOverrides {
  yahooClient?: YahooChartClient;
  fetchStooqCsv?: (symbol: string) => Promise<string>;
}

export function buildProvider(id: ProviderId, settings: Settings, logger: Logger, overrides: ProviderOverrides = {}): PriceHistoryProvider {
  switch (id) {
    case 'yahoo': return new YahooProvider(overrides.yahooClient, logger);
    case 'stooq': return new StooqProvider({ symbolOverride: settings.stooqSymbol, fetchCsv: overrides.fetchStooqCsv, logger });
  }
}

export function createPriceProvider(settings: Settings, logger: Logger = defaultLogger, overrides: ProviderOverrides = {}): FallbackPriceProvider {
  const providers = settings.providers.map(id => buildProvider(id, settings, logger, overrides));
  logger.info({ providers: settings.providers }, 'price_providers_configured');
  return new FallbackPriceProvider(providers, logger);
}
