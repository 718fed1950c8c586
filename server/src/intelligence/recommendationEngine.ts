// Threshold-ladder recommendation from the averaged model forecasts.

import { InvalidPriceError, NoDataError } from '../shared/errors.js';
import { averageForecast } from '../analytics/predict.js';

export enum RecommendationAction {
  BUY = 'BUY',
  HOLD = 'HOLD',
  CAUTION = 'CAUTION',
  SELL = 'SELL'
}

/** One value per ladder rung. */
export enum RecommendationOutlook {
  STRONG_UP = 'STRONG_UP',
  MODERATE_UP = 'MODERATE_UP',
  STABLE = 'STABLE',
  MODERATE_DOWN = 'MODERATE_DOWN',
  STRONG_DOWN = 'STRONG_DOWN'
}

export type RecommendationConfidence = 'High' | 'Medium';

export interface Recommendation {
  action: RecommendationAction;
  outlook: RecommendationOutlook;
  confidence: RecommendationConfidence;
  reason: string;
  /** Presentation hint (hex colour). */
  color: string;
  changePct: number;
}

export interface LadderRung {
  /** Rung matches when changePct is strictly greater; null closes the ladder. */
  above: number | null;
  action: RecommendationAction;
  outlook: RecommendationOutlook;
  confidence: RecommendationConfidence;
  color: string;
  summary: string;
}

export const DEFAULT_LADDER: readonly LadderRung[] = [
  { above: 2.0, action: RecommendationAction.BUY, outlook: RecommendationOutlook.STRONG_UP, confidence: 'High', color: '#28a745', summary: 'Strong upward trend predicted' },
  { above: 0.5, action: RecommendationAction.HOLD, outlook: RecommendationOutlook.MODERATE_UP, confidence: 'Medium', color: '#ffc107', summary: 'Moderate upward trend predicted' },
  { above: -0.5, action: RecommendationAction.HOLD, outlook: RecommendationOutlook.STABLE, confidence: 'Medium', color: '#6c757d', summary: 'Stable trend predicted' },
  { above: -2.0, action: RecommendationAction.CAUTION, outlook: RecommendationOutlook.MODERATE_DOWN, confidence: 'Medium', color: '#fd7e14', summary: 'Moderate downward trend predicted' },
  { above: null, action: RecommendationAction.SELL, outlook: RecommendationOutlook.STRONG_DOWN, confidence: 'High', color: '#dc3545', summary: 'Strong downward trend predicted' },
];

/** Two decimals, explicit "+" for non-negative values: +0.37%, -1.25% */
export function formatSignedPercent(value: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(2)}%`;
}

export class RecommendationEngine {
  constructor(private readonly ladder: readonly LadderRung[] = DEFAULT_LADDER) {
    if (!ladder.length || ladder[ladder.length - 1].above !== null) {
      throw new Error('recommendation ladder must end with a catch-all rung');
    }
  }

  /** First rung whose threshold changePct strictly exceeds wins. */
  classify(changePct: number): LadderRung {
    for (const rung of this.ladder) {
      if (rung.above === null || changePct > rung.above) return rung;
    }
    return this.ladder[this.ladder.length - 1];
  }

  recommend(forecast: Readonly<Record<string, number>>, currentPrice: number): Recommendation {
    if (!Number.isFinite(currentPrice) || currentPrice <= 0) throw new InvalidPriceError(currentPrice);
    const entries = Object.entries(forecast);
    if (!entries.length) throw new NoDataError('forecast is empty');
    for (const [label, value] of entries) {
      if (!Number.isFinite(value) || value <= 0) throw new InvalidPriceError(value, `${label} forecast`);
    }
    const avg = averageForecast(forecast);
    const changePct = ((avg - currentPrice) / currentPrice) * 100;
    const rung = this.classify(changePct);
    return {
      action: rung.action,
      outlook: rung.outlook,
      confidence: rung.confidence,
      reason: `${rung.summary} (${formatSignedPercent(changePct)})`,
      color: rung.color,
      changePct,
    };
  }
}

export const recommendationEngine = new RecommendationEngine();

export function recommend(forecast: Readonly<Record<string, number>>, currentPrice: number): Recommendation {
  return recommendationEngine.recommend(forecast, currentPrice);
}

export function classifyChange(changePct: number): LadderRung {
  return recommendationEngine.classify(changePct);
}
