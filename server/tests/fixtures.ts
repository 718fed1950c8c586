import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { loadSettings, type Settings } from '../src/config/settings.js';
import type { PriceHistoryProvider, PricePoint } from '../src/providers/provider.interface.js';
import { zeroNoise } from '../src/analytics/noise.js';
import { DashboardWriter } from '../src/dashboard/writer.js';
import { PredictionHistoryStore } from '../src/dashboard/history.js';
import { PredictionRunner, type RunnerDeps } from '../src/services/predictionRunner.js';
import { silentLogger, type Logger } from '../src/utils/logger.js';

export const MONDAY_MORNING = new Date('2026-10-19T05:00:00Z'); // 10:30 IST

/** One session per calendar day starting at `start`; volume 1000 + index. */
export function makeSeries(closes: readonly number[], start = '2026-10-01'): PricePoint[] {
  const base = new Date(`${start}T00:00:00Z`);
  return closes.map((close, i) => {
    const d = new Date(base);
    d.setUTCDate(base.getUTCDate() + i);
    return { date: d.toISOString().slice(0, 10), open: close, high: close, low: close, close, volume: 1000 + i };
  });
}

/** 29 flat closes at 21000, then 21450.75. */
export function risingSeries(): PricePoint[] {
  return makeSeries([...Array.from({ length: 29 }, () => 21000), 21450.75]);
}

export async function tempDir(prefix = 'dashboard-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function testSettings(env: NodeJS.ProcessEnv = {}): Settings {
  return loadSettings({ LOG_LEVEL: 'error', ...env });
}

export function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => { resolve = r; });
  return { promise, resolve };
}

export class StaticProvider implements PriceHistoryProvider {
  readonly id = 'static';
  readonly name = 'Static Rows';
  calls = 0;

  constructor(private readonly rows: PricePoint[] | Error) {}

  async fetch(): Promise<PricePoint[]> {
    this.calls++;
    if (this.rows instanceof Error) throw this.rows;
    return this.rows;
  }
}

/** Holds every fetch until `open()` is called. */
export class GatedProvider implements PriceHistoryProvider {
  readonly id = 'gated';
  readonly name = 'Gated Rows';
  calls = 0;
  private readonly gate = deferred();

  constructor(private readonly rows: PricePoint[]) {}

  open() {
    this.gate.resolve();
  }

  async fetch(): Promise<PricePoint[]> {
    this.calls++;
    await this.gate.promise;
    return this.rows;
  }
}

export interface TestRuntime {
  settings: Settings;
  writer: DashboardWriter;
  history: PredictionHistoryStore;
  runner: PredictionRunner;
}

export function makeRuntime(
  dir: string,
  provider: PriceHistoryProvider,
  extra: Partial<Pick<RunnerDeps, 'noise' | 'clock'>> & { logger?: Logger; env?: NodeJS.ProcessEnv } = {},
): TestRuntime {
  const settings = testSettings({ OUTPUT_DIR: dir, ...extra.env });
  const logger = extra.logger ?? silentLogger;
  const writer = new DashboardWriter(settings.outputDir, logger);
  const history = PredictionHistoryStore.inDir(settings.outputDir, settings.historyLimit, logger);
  const runner = new PredictionRunner({
    settings,
    provider,
    writer,
    history,
    noise: extra.noise ?? (() => zeroNoise),
    logger,
    clock: extra.clock ?? (() => MONDAY_MORNING),
  });
  return { settings, writer, history, runner };
}
