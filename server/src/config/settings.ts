import { z } from 'zod';
import { ConfigError } from '../shared/errors.js';
import { HISTORY_PERIODS, PROVIDER_IDS, type HistoryPeriod, type ProviderId } from '../providers/provider.interface.js';
import { LOG_LEVELS, type LogLevel } from '../utils/logger.js';

export const DEFAULT_CHART_JS_URL = 'https://cdn.jsdelivr.net/npm/chart.js@4.4.1/dist/chart.umd.min.js';

export interface MarketHours {
  timeZone: string;
  /** Short zone name printed after display timestamps. */
  zoneLabel: string;
  openMinutes: number;   // minutes after local midnight
  closeMinutes: number;
}

export interface Settings {
  symbol: string;
  displayName: string;
  period: HistoryPeriod;
  lookback: number;
  providers: ProviderId[];
  stooqSymbol?: string;
  outputDir: string;
  historyLimit: number;
  noiseSeed?: number;
  currencySymbol: string;
  market: MarketHours;
  cron: { schedule: string; timeZone: string; enabled: boolean };
  port: number;
  chartJsUrl: string;
  log: { level: LogLevel; file?: string };
}

// Unset and empty variables both fall back to the default.
function blankAsUndefined(v: unknown) {
  return typeof v === 'string' && v.trim() === '' ? undefined : v;
}

function env<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(blankAsUndefined, schema);
}

function isTimeZone(tz: string) {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

const clock = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:MM (24h)')
  .transform(v => Number(v.slice(0, 2)) * 60 + Number(v.slice(3, 5)));

const flag = z.string().transform(v => v.toLowerCase()).pipe(z.enum(['true', 'false'])).transform(v => v === 'true');

const providerList = z.string()
  .transform(v => v.split(',').map(s => s.trim().toLowerCase()).filter(Boolean))
  .pipe(z.array(z.enum(PROVIDER_IDS)).min(1));

const SettingsSchema = z.object({
  SYMBOL: env(z.string().min(1).default('^NSEI')),
  DISPLAY_NAME: env(z.string().min(1).default('NIFTY 50')),
  PERIOD: env(z.enum(HISTORY_PERIODS).default('1y')),
  LOOKBACK: env(z.coerce.number().int().min(2).max(60).default(5)),
  PROVIDERS: env(providerList.default('yahoo,stooq')),
  STOOQ_SYMBOL: env(z.string().min(1).optional()),
  OUTPUT_DIR: env(z.string().min(1).default('docs')),
  HISTORY_LIMIT: env(z.coerce.number().int().min(1).max(10000).default(100)),
  NOISE_SEED: env(z.coerce.number().int().optional()),
  CURRENCY_SYMBOL: env(z.string().default('₹')),
  MARKET_TZ: env(z.string().refine(isTimeZone, 'unknown time zone').default('Asia/Kolkata')),
  MARKET_TZ_LABEL: env(z.string().default('IST')),
  MARKET_OPEN: env(clock.default('09:15')),
  MARKET_CLOSE: env(clock.default('15:30')),
  CRON_SCHEDULE: env(z.string().min(1).default('0 4 * * 1-5')),
  CRON_TZ: env(z.string().refine(isTimeZone, 'unknown time zone').default('UTC')),
  ENABLE_SCHEDULER: env(flag.default('true')),
  PORT: env(z.coerce.number().int().min(0).max(65535).default(4010)),
  CHART_JS_URL: env(z.string().url().default(DEFAULT_CHART_JS_URL)),
  LOG_LEVEL: env(z.string().transform(v => v.toLowerCase()).pipe(z.enum(LOG_LEVELS)).default('info')),
  LOG_FILE: env(z.string().min(1).optional()),
}).refine(s => s.MARKET_OPEN < s.MARKET_CLOSE, { message: 'MARKET_OPEN must be before MARKET_CLOSE', path: ['MARKET_OPEN'] });

/**
 * Reads and validates settings from an environment map. Called once by each
 * entry point; the result is passed down explicitly.
 */
export function loadSettings(source: NodeJS.ProcessEnv = process.env): Settings {
  const r = SettingsSchema.safeParse(source);
  if (!r.success) {
    const issues = r.error.issues.map(i => `${i.path.join('.') || 'settings'}: ${i.message}`);
    throw new ConfigError(`invalid settings: ${issues.join('; ')}`);
  }
  const e = r.data;
  return {
    symbol: e.SYMBOL,
    displayName: e.DISPLAY_NAME,
    period: e.PERIOD,
    lookback: e.LOOKBACK,
    providers: e.PROVIDERS,
    stooqSymbol: e.STOOQ_SYMBOL,
    outputDir: e.OUTPUT_DIR,
    historyLimit: e.HISTORY_LIMIT,
    noiseSeed: e.NOISE_SEED,
    currencySymbol: e.CURRENCY_SYMBOL,
    market: {
      timeZone: e.MARKET_TZ,
      zoneLabel: e.MARKET_TZ_LABEL,
      openMinutes: e.MARKET_OPEN,
      closeMinutes: e.MARKET_CLOSE,
    },
    cron: { schedule: e.CRON_SCHEDULE, timeZone: e.CRON_TZ, enabled: e.ENABLE_SCHEDULER },
    port: e.PORT,
    chartJsUrl: e.CHART_JS_URL,
    log: { level: e.LOG_LEVEL, file: e.LOG_FILE },
  };
}
