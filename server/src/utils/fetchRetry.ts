// Reusable fetch with retry/backoff + metrics hook
import fetch, { type RequestInit, type Response } from 'node-fetch';
import { logger as defaultLogger, type Logger } from './logger.js';
import { fetchMetrics, type FetchMetrics } from './metrics.js';
import { errorMessage } from '../shared/errors.js';

export type FetchRetryOptions = {
  retries?: number;          // total attempts including first (default 3)
  backoffMs?: number;        // initial backoff (default 500)
  backoffFactor?: number;    // multiplier (default 2)
  maxBackoffMs?: number;     // cap (default 5000)
  retryOn?: Array<number>;   // status codes to retry (default [429,502,503,504])
  timeoutMs?: number;        // per attempt timeout (optional)
  label?: string;            // provider label for metrics
  metrics?: FetchMetrics;
  logger?: Logger;
  fetchImpl?: typeof fetch;
};

export async function fetchWithRetry(url: string, init: RequestInit = {}, opts: FetchRetryOptions = {}): Promise<Response> {
  const {
    retries = 3,
    backoffMs = 500,
    backoffFactor = 2,
    maxBackoffMs = 5000,
    retryOn = [429, 502, 503, 504],
    timeoutMs,
    label = 'generic',
    metrics = fetchMetrics,
    logger = defaultLogger,
    fetchImpl = fetch,
  } = opts;
  const attempts = Math.max(1, retries);
  let delay = backoffMs;
  let lastErr: unknown = null;
  const started = Date.now();
  for (let attempt = 0; attempt < attempts; attempt++) {
    const aStart = Date.now();
    const controller = timeoutMs ? new AbortController() : null;
    const t = controller && timeoutMs ? setTimeout(() => controller.abort(), timeoutMs) : undefined;
    try {
      const res = await fetchImpl(url, { ...init, signal: controller?.signal });
      const ms = Date.now() - aStart;
      if (retryOn.includes(res.status) && attempt < attempts - 1) {
        logger.warn({ url, status: res.status, attempt }, 'fetch_retry_status');
        metrics.record(label, 'retry', ms);
      } else if (!res.ok) {
        metrics.record(label, 'error', ms);
        return res; // non-ok goes back to the caller
      } else {
        metrics.record(label, 'ok', ms);
        return res;
      }
    } catch (err) {
      lastErr = err;
      const ms = Date.now() - aStart;
      if (attempt >= attempts - 1) {
        metrics.record(label, 'error', ms);
        break;
      }
      metrics.record(label, 'retry', ms);
      logger.warn({ url, err: errorMessage(err), attempt }, 'fetch_retry_err');
    } finally {
      if (t) clearTimeout(t);
    }
    await new Promise(r => setTimeout(r, delay));
    delay = Math.min(maxBackoffMs, delay * backoffFactor);
  }
  const totalMs = Date.now() - started;
  logger.error({ url, attempts, totalMs, err: lastErr ? errorMessage(lastErr) : undefined }, 'fetch_failed_exhausted');
  throw lastErr instanceof Error ? lastErr : new Error(`fetch_failed: ${url}`);
}
