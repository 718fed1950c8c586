import { MODEL_LABELS } from '../analytics/predict.js';
import { dashboardCharts } from './charts.js';
import type { DashboardSnapshot } from './snapshot.js';

export interface RenderOptions {
  chartJsUrl: string;
  /** Reload interval while the market is open. */
  refreshMs?: number;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** JSON safe to drop inside a <script> element. */
export function scriptJson(value: unknown): string {
  return JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');
}

export function formatPrice(value: number, currencySymbol: string, decimals = 2): string {
  return `${currencySymbol}${value.toFixed(decimals)}`;
}

const STYLES = `
    * { margin: 0; padding: 0; box-sizing: border-box; }
    body { font-family: 'Segoe UI', Tahoma, Geneva, Verdana, sans-serif; background: linear-gradient(135deg, #667eea 0%, #764ba2 100%); min-height: 100vh; padding: 20px; }
    .container { max-width: 1200px; margin: 0 auto; background: white; border-radius: 15px; box-shadow: 0 20px 40px rgba(0,0,0,0.1); overflow: hidden; }
    .header { background: linear-gradient(135deg, #1e3c72 0%, #2a5298 100%); color: white; padding: 30px; text-align: center; position: relative; }
    .header h1 { font-size: 2.5em; margin-bottom: 10px; font-weight: 300; }
    .header .subtitle { font-size: 1.1em; opacity: 0.9; margin-bottom: 5px; }
    .header .timestamp { font-size: 0.9em; opacity: 0.7; }
    .market-status { position: absolute; top: 20px; right: 20px; color: white; padding: 8px 15px; border-radius: 20px; font-weight: bold; font-size: 0.9em; }
    .dashboard-grid { display: grid; grid-template-columns: 1fr 1fr; gap: 20px; padding: 30px; }
    .card { background: white; border-radius: 10px; padding: 25px; box-shadow: 0 5px 15px rgba(0,0,0,0.08); border: 1px solid #eee; }
    .card h3 { color: #2c3e50; margin-bottom: 20px; font-size: 1.3em; border-bottom: 2px solid #3498db; padding-bottom: 10px; }
    .current-price { text-align: center; padding: 20px; background: linear-gradient(135deg, #f093fb 0%, #f5576c 100%); color: white; border-radius: 10px; margin-bottom: 20px; }
    .current-price .price { font-size: 3em; font-weight: bold; margin-bottom: 5px; }
    .current-price .label { font-size: 1.1em; opacity: 0.9; }
    .predictions-grid { display: grid; grid-template-columns: 1fr 1fr 1fr; gap: 15px; margin-bottom: 20px; }
    .prediction-card { text-align: center; padding: 20px; border-radius: 8px; color: white; transition: transform 0.3s ease; }
    .prediction-card:hover { transform: scale(1.05); }
    .prediction-card.rnn { background: linear-gradient(135deg, #ff7f0e, #ff6b35); }
    .prediction-card.lstm { background: linear-gradient(135deg, #2ca02c, #27ae60); }
    .prediction-card.cnn { background: linear-gradient(135deg, #d62728, #e74c3c); }
    .prediction-card .model-name { font-weight: bold; margin-bottom: 10px; font-size: 1.1em; }
    .prediction-card .price { font-size: 1.8em; font-weight: bold; }
    .recommendation { text-align: center; padding: 25px; border-radius: 10px; margin-bottom: 20px; color: white; }
    .recommendation .action { font-size: 2em; font-weight: bold; margin-bottom: 10px; }
    .recommendation .reason { font-size: 1.1em; opacity: 0.9; }
    .recommendation .confidence { font-size: 0.9em; margin-top: 5px; opacity: 0.8; }
    .chart-container { grid-column: 1 / -1; }
    .metrics-table { width: 100%; border-collapse: collapse; margin-top: 15px; }
    .metrics-table th, .metrics-table td { padding: 12px; text-align: center; border-bottom: 1px solid #eee; }
    .metrics-table th { background: #f8f9fa; font-weight: 600; color: #2c3e50; }
    .metrics-table tr:hover { background: #f8f9fa; }
    .footer { background: #2c3e50; color: white; text-align: center; padding: 20px; font-size: 0.9em; opacity: 0.8; }
    .footer a { color: #3498db; }
    @media (max-width: 768px) {
      .dashboard-grid { grid-template-columns: 1fr; }
      .predictions-grid { grid-template-columns: 1fr; }
      .header h1 { font-size: 2em; }
      .market-status { position: static; margin-top: 15px; display: inline-block; }
    }`;

function predictionCards(s: DashboardSnapshot): string {
  return MODEL_LABELS.map(label => `
          <div class="prediction-card ${label.toLowerCase()}">
            <div class="model-name">${label}</div>
            <div class="price">${escapeHtml(formatPrice(s.predictions[label], s.currencySymbol, 0))}</div>
          </div>`).join('');
}

function metricsRows(s: DashboardSnapshot): string {
  return Object.entries(s.modelPerformance).map(([model, m]) => `
            <tr>
              <td><strong>${escapeHtml(model)}</strong></td>
              <td>${m.RMSE.toFixed(3)}</td>
              <td>${m.MAE.toFixed(3)}</td>
              <td>${m.R2.toFixed(3)}</td>
            </tr>`).join('');
}

export function renderDashboardHtml(s: DashboardSnapshot, opts: RenderOptions): string {
  const name = escapeHtml(s.displayName);
  const rec = s.recommendation;
  const refreshMs = opts.refreshMs ?? 5 * 60 * 1000;
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${name} AI Prediction Dashboard</title>
  <script src="${escapeHtml(opts.chartJsUrl)}"></script>
  <style>${STYLES}
  </style>
</head>
<body>
  <div class="container">
    <div class="header">
      <div class="market-status" style="background: ${escapeHtml(s.marketStatus.color)};">Market ${s.marketStatus.status}</div>
      <h1>${name} AI Prediction Dashboard</h1>
      <div class="subtitle">Machine Learning-Based Stock Market Analysis</div>
      <div class="timestamp">Last Updated: ${escapeHtml(s.timestamp)}</div>
    </div>

    <div class="dashboard-grid">
      <div class="card">
        <div class="current-price">
          <div class="price">${escapeHtml(formatPrice(s.currentPrice, s.currencySymbol))}</div>
          <div class="label">Current ${name} Index</div>
        </div>
        <div class="predictions-grid">${predictionCards(s)}
        </div>
      </div>

      <div class="card">
        <h3>AI Recommendation</h3>
        <div class="recommendation" style="background: ${escapeHtml(rec.color)};">
          <div class="action">${rec.action}</div>
          <div class="reason">${escapeHtml(rec.reason)}</div>
          <div class="confidence">Confidence: ${rec.confidence}</div>
        </div>
        <h4>Model Performance (Research Paper Results)</h4>
        <table class="metrics-table">
          <thead>
            <tr><th>Model</th><th>RMSE</th><th>MAE</th><th>R²</th></tr>
          </thead>
          <tbody>${metricsRows(s)}
          </tbody>
        </table>
      </div>

      <div class="card chart-container">
        <h3>Price Trend &amp; Predictions</h3>
        <canvas id="price-chart"></canvas>
        <canvas id="volume-chart" height="80"></canvas>
      </div>

      <div class="card">
        <h3>Model Comparison</h3>
        <canvas id="comparison-chart"></canvas>
      </div>

      <div class="card">
        <h3>Performance Metrics</h3>
        <canvas id="metrics-chart"></canvas>
      </div>
    </div>

    <div class="footer">
      <p>Based on research: "Stock Market Prediction of NIFTY 50 Index Applying Machine Learning Techniques"</p>
      <p>This is for educational purposes only. Please consult financial advisors before making investment decisions.</p>
      <p>Auto-updates on weekdays | <a href="data.json">Raw Data API</a></p>
    </div>
  </div>

  <script>
    const charts = ${scriptJson(dashboardCharts(s))};
    for (const [id, config] of Object.entries(charts)) {
      const el = document.getElementById(id);
      if (el && window.Chart) new window.Chart(el, config);
    }
    const marketStatus = ${scriptJson(s.marketStatus.status)};
    if (marketStatus === 'OPEN') {
      setTimeout(() => location.reload(), ${refreshMs});
    }
  </script>
</body>
</html>
`;
}

export interface ErrorPageInput {
  message: string;
  timestamp: string;
  displayName: string;
}

export function renderErrorPage(input: ErrorPageInput): string {
  const name = escapeHtml(input.displayName);
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${name} Prediction - Error</title>
  <style>
    body { font-family: Arial, sans-serif; margin: 0; padding: 20px; background: #f8f9fa; }
    .container { max-width: 800px; margin: 0 auto; background: white; padding: 40px; border-radius: 10px; box-shadow: 0 2px 10px rgba(0,0,0,0.1); }
    .error { color: #dc3545; text-align: center; }
    .refresh { margin-top: 20px; text-align: center; }
    .btn { background: #007bff; color: white; padding: 10px 20px; text-decoration: none; border-radius: 5px; }
  </style>
</head>
<body>
  <div class="container">
    <div class="error">
      <h1>Service Temporarily Unavailable</h1>
      <p>The ${name} prediction service is currently experiencing issues:</p>
      <p><em>${escapeHtml(input.message)}</em></p>
      <p>Last updated: ${escapeHtml(input.timestamp)}</p>
    </div>
    <div class="refresh">
      <a href="index.html" class="btn" onclick="location.reload(); return false;">Refresh Page</a>
    </div>
  </div>
</body>
</html>
`;
}
