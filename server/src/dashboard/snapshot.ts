import type { Forecast } from '../analytics/predict.js';
import { MODEL_METRICS, type ModelMetrics } from '../analytics/modelMetrics.js';
import type { Recommendation } from '../intelligence/recommendationEngine.js';
import type { OrderedSeries } from '../providers/provider.interface.js';
import type { MarketStatus } from '../services/marketStatus.js';

/** Document written to data.json and rendered into index.html. */
export interface DashboardSnapshot {
  generatedAt: string;      // ISO-8601
  timestamp: string;        // display form in market time
  symbol: string;
  displayName: string;
  currencySymbol: string;
  currentPrice: number;
  trend: number;
  lookback: number;
  predictions: Forecast;
  recommendation: Recommendation;
  modelPerformance: Readonly<Record<string, ModelMetrics>>;
  marketStatus: MarketStatus;
  latest: { date: string; close: number; volume: number };
  /** Session the predictions are labelled with on the chart. */
  nextDate: string;
  series: { dates: string[]; closes: number[]; volumes: number[] };
}

export interface SnapshotInput {
  now: Date;
  timestamp: string;
  symbol: string;
  displayName: string;
  currencySymbol: string;
  series: OrderedSeries;
  trend: number;
  lookback: number;
  predictions: Forecast;
  recommendation: Recommendation;
  marketStatus: MarketStatus;
}

export function nextCalendarDay(date: string): string {
  const d = new Date(`${date}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + 1);
  return d.toISOString().slice(0, 10);
}

export function buildSnapshot(input: SnapshotInput): DashboardSnapshot {
  if (!input.series.length) throw new Error('cannot build a snapshot from an empty series');
  const last = input.series[input.series.length - 1];
  return {
    generatedAt: input.now.toISOString(),
    timestamp: input.timestamp,
    symbol: input.symbol,
    displayName: input.displayName,
    currencySymbol: input.currencySymbol,
    currentPrice: last.close,
    trend: input.trend,
    lookback: input.lookback,
    predictions: input.predictions,
    recommendation: input.recommendation,
    modelPerformance: MODEL_METRICS,
    marketStatus: input.marketStatus,
    latest: { date: last.date, close: last.close, volume: last.volume },
    nextDate: nextCalendarDay(last.date),
    series: {
      dates: input.series.map(p => p.date),
      closes: input.series.map(p => p.close),
      volumes: input.series.map(p => p.volume),
    },
  };
}
