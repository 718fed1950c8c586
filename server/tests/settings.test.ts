import { describe, it } from 'node:test';
import assert from 'node:assert';
import { DEFAULT_CHART_JS_URL, loadSettings } from '../src/config/settings.js';
import { ConfigError } from '../src/shared/errors.js';

function rejects(env: NodeJS.ProcessEnv, pattern: RegExp) {
  assert.throws(() => loadSettings(env), (err: unknown) => err instanceof ConfigError && pattern.test(err.message));
}

describe('loadSettings', () => {
  it('fills every default from an empty environment', () => {
    const s = loadSettings({});
    assert.strictEqual(s.symbol, '^NSEI');
    assert.strictEqual(s.displayName, 'NIFTY 50');
    assert.strictEqual(s.period, '1y');
    assert.strictEqual(s.lookback, 5);
    assert.deepStrictEqual(s.providers, ['yahoo', 'stooq']);
    assert.strictEqual(s.outputDir, 'docs');
    assert.strictEqual(s.historyLimit, 100);
    assert.strictEqual(s.noiseSeed, undefined);
    assert.deepStrictEqual(s.market, { timeZone: 'Asia/Kolkata', zoneLabel: 'IST', openMinutes: 555, closeMinutes: 930 });
    assert.deepStrictEqual(s.cron, { schedule: '0 4 * * 1-5', timeZone: 'UTC', enabled: true });
    assert.strictEqual(s.port, 4010);
    assert.strictEqual(s.chartJsUrl, DEFAULT_CHART_JS_URL);
    assert.deepStrictEqual(s.log, { level: 'info', file: undefined });
  });

  it('coerces and normalises values', () => {
    const s = loadSettings({
      LOOKBACK: '10',
      NOISE_SEED: '42',
      PROVIDERS: 'Stooq, yahoo',
      ENABLE_SCHEDULER: 'FALSE',
      MARKET_OPEN: '10:00',
      LOG_LEVEL: 'DEBUG',
    });
    assert.strictEqual(s.lookback, 10);
    assert.strictEqual(s.noiseSeed, 42);
    assert.deepStrictEqual(s.providers, ['stooq', 'yahoo']);
    assert.strictEqual(s.cron.enabled, false);
    assert.strictEqual(s.market.openMinutes, 600);
    assert.strictEqual(s.log.level, 'debug');
  });

  it('treats blank variables as unset', () => {
    const s = loadSettings({ LOOKBACK: '', SYMBOL: '  ' });
    assert.strictEqual(s.lookback, 5);
    assert.strictEqual(s.symbol, '^NSEI');
  });

  it('rejects out-of-range and unknown values', () => {
    rejects({ LOOKBACK: '1' }, /LOOKBACK/);
    rejects({ PROVIDERS: 'alpha' }, /PROVIDERS/);
    rejects({ PERIOD: '3d' }, /PERIOD/);
    rejects({ MARKET_TZ: 'Mars/Olympus' }, /MARKET_TZ: unknown time zone/);
    rejects({ MARKET_CLOSE: '25:00' }, /MARKET_CLOSE/);
    rejects({ HISTORY_LIMIT: '0' }, /HISTORY_LIMIT/);
    rejects({ CHART_JS_URL: 'not a url' }, /CHART_JS_URL/);
  });

  it('requires the session to open before it closes', () => {
    rejects({ MARKET_OPEN: '16:00' }, /MARKET_OPEN: MARKET_OPEN must be before MARKET_CLOSE/);
  });
});
