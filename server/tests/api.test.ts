import request from 'supertest';
import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createApp } from '../src/app.js';
import { DashboardScheduler } from '../src/jobs/scheduler.js';
import type { PriceHistoryProvider } from '../src/providers/provider.interface.js';
import { FetchMetrics } from '../src/utils/metrics.js';
import { silentLogger } from '../src/utils/logger.js';
import { NoDataError } from '../src/shared/errors.js';
import { GatedProvider, makeRuntime, risingSeries, StaticProvider, tempDir } from './fixtures.js';

async function setup(provider: PriceHistoryProvider = new StaticProvider(risingSeries()), withScheduler = false) {
  const dir = await tempDir();
  const rt = makeRuntime(dir, provider);
  const metrics = new FetchMetrics();
  const scheduler = withScheduler
    ? new DashboardScheduler(rt.runner, { schedule: '0 4 * * 1-5', timeZone: 'UTC' }, silentLogger)
    : undefined;
  const app = createApp({
    logger: silentLogger,
    runner: rt.runner,
    writer: rt.writer,
    history: rt.history,
    metrics,
    scheduler,
    staticDir: dir,
  });
  return { app, metrics, ...rt };
}

describe('dashboard API', () => {
  it('reports health', async () => {
    const { app } = await setup();
    const res = await request(app).get('/health');
    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(res.body, { ok: true, data: { status: 'ok', running: false } });
  });

  it('returns 404 before the first run', async () => {
    const { app } = await setup();
    const res = await request(app).get('/api/dashboard');
    assert.strictEqual(res.status, 404);
    assert.strictEqual(res.body.ok, false);
    assert.strictEqual(res.body.error, 'dashboard not found');
  });

  it('refreshes, then serves the snapshot, history and page', async () => {
    const { app } = await setup();
    const refresh = await request(app).post('/api/refresh');
    assert.strictEqual(refresh.status, 200);
    assert.strictEqual(refresh.body.data.currentPrice, 21450.75);

    const dash = await request(app).get('/api/dashboard');
    assert.strictEqual(dash.status, 200);
    assert.strictEqual(dash.body.data.symbol, '^NSEI');
    assert.strictEqual(dash.body.data.recommendation.action, 'HOLD');

    const hist = await request(app).get('/api/history?limit=5');
    assert.strictEqual(hist.status, 200);
    assert.strictEqual(hist.body.data.length, 1);
    assert.deepStrictEqual(hist.body.meta, { count: 1 });
    assert.strictEqual(hist.body.data[0].currentPrice, 21450.75);

    const page = await request(app).get('/');
    assert.strictEqual(page.status, 200);
    assert.ok(page.text.includes('NIFTY 50 AI Prediction Dashboard'));
  });

  it('validates the history limit', async () => {
    const { app } = await setup();
    for (const limit of ['0', 'abc', '2.5']) {
      const res = await request(app).get(`/api/history?limit=${limit}`);
      assert.strictEqual(res.status, 400, `limit=${limit}`);
      assert.strictEqual(res.body.error, 'Validation failed for limit');
    }
  });

  it('rejects a refresh while a run is in progress', async () => {
    const provider = new GatedProvider(risingSeries());
    const { app, runner } = await setup(provider);
    const pending = runner.run('cron');
    const res = await request(app).post('/api/refresh');
    assert.strictEqual(res.status, 409);
    assert.deepStrictEqual(res.body, { ok: false, error: 'run_in_progress', message: 'a dashboard run is already in progress' });
    provider.open();
    await pending;
  });

  it('hides details of upstream failures', async () => {
    const { app } = await setup(new StaticProvider(new NoDataError('no price history for ^NSEI (providers: static)')));
    const res = await request(app).post('/api/refresh');
    assert.strictEqual(res.status, 502);
    assert.deepStrictEqual(res.body, { ok: false, error: 'Internal server error', message: 'Internal server error' });
    const page = await request(app).get('/index.html');
    assert.ok(page.text.includes('Service Temporarily Unavailable'));
  });

  it('reports job status and fetch metrics', async () => {
    const { app, metrics } = await setup(undefined, true);
    metrics.record('stooq', 'ok', 12);
    const jobs = await request(app).get('/api/jobs/status');
    assert.strictEqual(jobs.status, 200);
    assert.deepStrictEqual(jobs.body.data.runner, { running: false, runs: 0 });
    assert.strictEqual(jobs.body.data.scheduler.schedule, '0 4 * * 1-5');
    assert.strictEqual(jobs.body.data.scheduler.scheduled, false);

    const m = await request(app).get('/api/metrics');
    assert.strictEqual(m.status, 200);
    assert.deepStrictEqual(m.body.data.providers.stooq, { ok: 1, error: 0, retry: 0, count: 1, avgMs: 12, minMs: 12, maxMs: 12 });
  });

  it('answers unknown routes and bad JSON with the envelope', async () => {
    const { app } = await setup();
    const missing = await request(app).get('/api/nope');
    assert.strictEqual(missing.status, 404);
    assert.strictEqual(missing.body.error, 'endpoint not found');

    const bad = await request(app).post('/api/refresh').set('Content-Type', 'application/json').send('{bad');
    assert.strictEqual(bad.status, 400);
    assert.strictEqual(bad.body.ok, false);
    assert.strictEqual(bad.body.error, 'request_failed');
  });
});
