import type { ModelLabel } from './predict.js';

export interface ModelMetrics {
  RMSE: number;
  MAE: number;
  R2: number;
  MSE: number;
}

// Published figures from "Stock Market Prediction of NIFTY 50 Index Applying
// Machine Learning Techniques". Shown on the dashboard for reference only.
export const MODEL_METRICS: Readonly<Record<ModelLabel, ModelMetrics>> = {
  RNN: { RMSE: 0.059, MAE: 0.042, R2: 0.810, MSE: 0.00347 },
  LSTM: { RMSE: 0.002, MAE: 0.032, R2: 0.537, MSE: 0.002 },
  CNN: { RMSE: 0.134, MAE: 0.016, R2: 0.765, MSE: 0.018 },
};
