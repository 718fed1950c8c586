// Synthetic "model" forecasts: a fixed-shape extrapolation of the recent
// trend plus per-model gaussian noise. Placeholders, not trained models.

import { InvalidPriceError } from '../shared/errors.js';
import type { NoiseSource } from './noise.js';

export const MODEL_LABELS = ['RNN', 'LSTM', 'CNN'] as const;
export type ModelLabel = typeof MODEL_LABELS[number];

export type Forecast = Readonly<Record<ModelLabel, number>>;

export interface ModelProfile {
  /** Multiplier applied to the trend. */
  weight: number;
  /** Standard deviation of the fractional noise term. */
  sigma: number;
}

export const MODEL_PROFILES: Readonly<Record<ModelLabel, ModelProfile>> = {
  RNN: { weight: 0.8, sigma: 0.005 },
  LSTM: { weight: 1.2, sigma: 0.003 },
  CNN: { weight: 0.6, sigma: 0.007 },
};

/**
 * price * (1 + trend * weight + sigma * z) per label, with one deviate drawn
 * from `rng` per label in RNN, LSTM, CNN order.
 */
export function predict(currentPrice: number, trend: number, rng: NoiseSource): Forecast {
  if (!Number.isFinite(currentPrice) || currentPrice <= 0) throw new InvalidPriceError(currentPrice);
  const draw = (label: ModelLabel) => {
    const p = MODEL_PROFILES[label];
    return currentPrice * (1 + trend * p.weight + p.sigma * rng.next());
  };
  const RNN = draw('RNN');
  const LSTM = draw('LSTM');
  const CNN = draw('CNN');
  return { RNN, LSTM, CNN };
}

export function averageForecast(forecast: Readonly<Record<string, number>>): number {
  const values = Object.values(forecast);
  if (!values.length) return Number.NaN;
  return values.reduce((a, b) => a + b, 0) / values.length;
}
