import type { Settings } from '../config/settings.js';
import type { PriceHistoryProvider } from '../providers/provider.interface.js';
import { estimateTrend } from '../analytics/trend.js';
import { predict } from '../analytics/predict.js';
import type { NoiseSource } from '../analytics/noise.js';
import { recommendationEngine, type RecommendationEngine } from '../intelligence/recommendationEngine.js';
import { buildSnapshot, type DashboardSnapshot } from '../dashboard/snapshot.js';
import { renderDashboardHtml, renderErrorPage } from '../dashboard/html.js';
import type { DashboardWriter } from '../dashboard/writer.js';
import type { PredictionHistoryStore } from '../dashboard/history.js';
import { formatMarketTimestamp, getMarketStatus } from './marketStatus.js';
import { errorMessage, RunInProgressError } from '../shared/errors.js';
import type { Logger } from '../utils/logger.js';

export interface RunnerDeps {
  settings: Settings;
  provider: PriceHistoryProvider;
  writer: DashboardWriter;
  history: PredictionHistoryStore;
  /** Called once per run. */
  noise: () => NoiseSource;
  logger: Logger;
  engine?: RecommendationEngine;
  clock?: () => Date;
}

/**
 * One full pass: fetch, trend, forecast, recommend, publish. On failure the
 * error page replaces index.html and the original error is rethrown.
 */
export async function runDailyPrediction(deps: RunnerDeps): Promise<DashboardSnapshot> {
  const { settings, provider, writer, history, logger } = deps;
  const engine = deps.engine ?? recommendationEngine;
  const now = (deps.clock ?? (() => new Date()))();
  const timestamp = formatMarketTimestamp(now, settings.market);
  try {
    const series = await provider.fetch(settings.symbol, settings.period);
    const trend = estimateTrend(series, settings.lookback);
    const currentPrice = series[series.length - 1].close;
    const predictions = predict(currentPrice, trend, deps.noise());
    const recommendation = engine.recommend(predictions, currentPrice);
    const marketStatus = getMarketStatus(now, settings.market);
    const snapshot = buildSnapshot({
      now,
      timestamp,
      symbol: settings.symbol,
      displayName: settings.displayName,
      currencySymbol: settings.currencySymbol,
      series,
      trend,
      lookback: settings.lookback,
      predictions,
      recommendation,
      marketStatus,
    });
    await writer.write(snapshot, renderDashboardHtml(snapshot, { chartJsUrl: settings.chartJsUrl }));
    await history.append({
      timestamp: snapshot.generatedAt,
      currentPrice,
      predictions: { ...predictions },
      volume: snapshot.latest.volume,
    });
    logger.info({
      symbol: settings.symbol,
      currentPrice,
      trend,
      action: recommendation.action,
      changePct: Number(recommendation.changePct.toFixed(4)),
      market: marketStatus.status,
    }, 'prediction_run_completed');
    return snapshot;
  } catch (err) {
    logger.error({ symbol: settings.symbol, err }, 'prediction_run_failed');
    const page = renderErrorPage({ message: errorMessage(err), timestamp, displayName: settings.displayName });
    await writer.writeErrorPage(page).catch((writeErr: unknown) => {
      logger.error({ err: writeErr }, 'error_page_write_failed');
    });
    throw err;
  }
}

export type RunOutcome = 'success' | 'failed';

export interface RunnerStatus {
  running: boolean;
  runs: number;
  lastRunAt?: string;
  lastTrigger?: string;
  lastStatus?: RunOutcome;
  lastError?: string;
  lastDurationMs?: number;
}

/** Serialises runs; a second caller gets RunInProgressError. */
export class PredictionRunner {
  private running = false;
  private state: RunnerStatus = { running: false, runs: 0 };

  constructor(private readonly deps: RunnerDeps) {}

  get isRunning() {
    return this.running;
  }

  async run(trigger = 'manual'): Promise<DashboardSnapshot> {
    if (this.running) throw new RunInProgressError();
    this.running = true;
    const started = Date.now();
    const startedAt = new Date(started).toISOString();
    this.deps.logger.info({ trigger }, 'prediction_run_started');
    try {
      const snapshot = await runDailyPrediction(this.deps);
      this.finish(trigger, startedAt, started, 'success');
      return snapshot;
    } catch (err) {
      this.finish(trigger, startedAt, started, 'failed', errorMessage(err));
      throw err;
    } finally {
      this.running = false;
    }
  }

  status(): RunnerStatus {
    return { ...this.state, running: this.running };
  }

  private finish(trigger: string, startedAt: string, started: number, outcome: RunOutcome, error?: string) {
    this.state = {
      running: false,
      runs: this.state.runs + 1,
      lastRunAt: startedAt,
      lastTrigger: trigger,
      lastStatus: outcome,
      lastError: error,
      lastDurationMs: Date.now() - started,
    };
  }
}
