// In-memory metrics for provider fetches.
// Not persistent; reset on process restart.

export type FetchMetricKind = 'ok' | 'error' | 'retry';

interface ProviderStats {
  ok: number;
  error: number;
  retry: number;
  count: number;
  sumMs: number;
  minMs: number;
  maxMs: number;
}

export interface ProviderStatsView {
  ok: number;
  error: number;
  retry: number;
  count: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
}

export class FetchMetrics {
  private readonly providers = new Map<string, ProviderStats>();

  private ensure(p: string): ProviderStats {
    let ps = this.providers.get(p);
    if (!ps) {
      ps = { ok: 0, error: 0, retry: 0, count: 0, sumMs: 0, minMs: Number.POSITIVE_INFINITY, maxMs: 0 };
      this.providers.set(p, ps);
    }
    return ps;
  }

  record(provider: string, kind: FetchMetricKind, ms: number) {
    const ps = this.ensure(provider);
    ps[kind]++;
    ps.count++;
    ps.sumMs += ms;
    if (ms < ps.minMs) ps.minMs = ms;
    if (ms > ps.maxMs) ps.maxMs = ms;
  }

  snapshot(): Record<string, ProviderStatsView> {
    const out: Record<string, ProviderStatsView> = {};
    for (const [k, v] of this.providers) {
      out[k] = {
        ok: v.ok,
        error: v.error,
        retry: v.retry,
        count: v.count,
        avgMs: v.count ? Number((v.sumMs / v.count).toFixed(1)) : 0,
        minMs: Number.isFinite(v.minMs) ? v.minMs : 0,
        maxMs: v.maxMs,
      };
    }
    return out;
  }

  withMeta() {
    return { ts: new Date().toISOString(), uptimeSec: Math.floor(process.uptime()), providers: this.snapshot() };
  }

  reset() {
    this.providers.clear();
  }
}

export const fetchMetrics = new FetchMetrics();
