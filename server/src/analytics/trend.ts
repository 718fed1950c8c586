import { ConfigError, InsufficientDataError, InvalidPriceError } from '../shared/errors.js';
import type { OrderedSeries } from '../providers/provider.interface.js';

export const DEFAULT_LOOKBACK = 5;

// Relative close-to-close change across the last `lookback` sessions
// (the window includes the latest one). No smoothing.
export function estimateTrend(series: OrderedSeries, lookback: number = DEFAULT_LOOKBACK): number {
  if (!Number.isInteger(lookback) || lookback < 2) {
    throw new ConfigError(`lookback must be an integer >= 2, got ${lookback}`);
  }
  if (series.length < lookback) throw new InsufficientDataError(lookback, series.length);
  const start = series[series.length - lookback].close;
  const last = series[series.length - 1].close;
  if (!Number.isFinite(start) || start <= 0) throw new InvalidPriceError(start, 'lookback start close');
  return (last - start) / start;
}
