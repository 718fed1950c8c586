// Chart.js configurations embedded into the static page.

import type { ChartConfiguration } from 'chart.js';
import { MODEL_LABELS, type ModelLabel } from '../analytics/predict.js';
import type { DashboardSnapshot } from './snapshot.js';

export const MODEL_COLORS: Readonly<Record<ModelLabel, string>> = {
  RNN: '#ff7f0e',
  LSTM: '#2ca02c',
  CNN: '#d62728',
};

const PRICE_COLOR = '#1f77b4';
const VOLUME_COLOR = 'rgba(158,202,225,0.6)';
const METRIC_NAMES = ['RMSE', 'MAE', 'R2'] as const;
// models outside the fixed label set
const PALETTE = ['#3498db', '#9b59b6', '#34495e'];

type LineConfig = ChartConfiguration<'line', (number | null)[], string>;
type BarConfig = ChartConfiguration<'bar', number[], string>;

/**
 * Closing prices plus one dashed segment per model from the last close to its
 * prediction on the next day.
 */
export function priceChartConfig(s: DashboardSnapshot): LineConfig {
  const labels = [...s.series.dates, s.nextDate];
  const lastIndex = s.series.closes.length - 1;
  const history: (number | null)[] = [...s.series.closes, null];
  const segments = MODEL_LABELS.map(label => {
    const data: (number | null)[] = labels.map(() => null);
    data[lastIndex] = s.currentPrice;
    data[lastIndex + 1] = s.predictions[label];
    return {
      label: `${label} Prediction`,
      data,
      borderColor: MODEL_COLORS[label],
      backgroundColor: MODEL_COLORS[label],
      borderWidth: 3,
      borderDash: [6, 4],
      pointRadius: 4,
      spanGaps: false,
    };
  });
  return {
    type: 'line',
    data: {
      labels,
      datasets: [
        { label: 'Historical Price', data: history, borderColor: PRICE_COLOR, backgroundColor: PRICE_COLOR, borderWidth: 2, pointRadius: 0 },
        ...segments,
      ],
    },
    options: {
      responsive: true,
      interaction: { mode: 'index', intersect: false },
      plugins: {
        title: { display: true, text: `${s.displayName} Price Trend` },
        legend: { display: true, position: 'top' },
      },
      scales: {
        x: { title: { display: true, text: 'Date' } },
        y: { title: { display: true, text: `Price (${s.currencySymbol})` } },
      },
    },
  };
}

export function volumeChartConfig(s: DashboardSnapshot, sessions = 30): BarConfig {
  return {
    type: 'bar',
    data: {
      labels: s.series.dates.slice(-sessions),
      datasets: [{ label: 'Volume', data: s.series.volumes.slice(-sessions), backgroundColor: VOLUME_COLOR }],
    },
    options: {
      responsive: true,
      plugins: { legend: { display: false }, title: { display: true, text: 'Volume' } },
    },
  };
}

export function comparisonChartConfig(s: DashboardSnapshot): BarConfig {
  return {
    type: 'bar',
    data: {
      labels: [...MODEL_LABELS],
      datasets: [{
        label: 'Predicted Price',
        data: MODEL_LABELS.map(l => s.predictions[l]),
        backgroundColor: MODEL_LABELS.map(l => MODEL_COLORS[l]),
      }],
    },
    options: {
      responsive: true,
      plugins: { legend: { display: false }, title: { display: true, text: 'Next Day Price Predictions by Model' } },
      scales: { y: { beginAtZero: false, title: { display: true, text: `Predicted Price (${s.currencySymbol})` } } },
    },
  };
}

export function metricsChartConfig(s: DashboardSnapshot): BarConfig {
  const models = Object.keys(s.modelPerformance);
  return {
    type: 'bar',
    data: {
      labels: [...METRIC_NAMES],
      datasets: models.map((model, i) => {
        const m = s.modelPerformance[model];
        const known = MODEL_LABELS.find(l => l === model);
        return {
          label: model,
          data: METRIC_NAMES.map(name => m[name]),
          backgroundColor: known ? MODEL_COLORS[known] : PALETTE[i % PALETTE.length],
        };
      }),
    },
    options: {
      responsive: true,
      plugins: { title: { display: true, text: 'Model Performance Comparison' } },
    },
  };
}

export function dashboardCharts(s: DashboardSnapshot) {
  return {
    'price-chart': priceChartConfig(s),
    'volume-chart': volumeChartConfig(s),
    'comparison-chart': comparisonChartConfig(s),
    'metrics-chart': metricsChartConfig(s),
  };
}
