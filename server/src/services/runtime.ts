import type { Settings } from '../config/settings.js';
import { createNoise } from '../analytics/noise.js';
import { DashboardWriter } from '../dashboard/writer.js';
import { PredictionHistoryStore } from '../dashboard/history.js';
import { createPriceProvider, type ProviderOverrides } from '../providers/ProviderRegistry.js';
import type { PriceHistoryProvider } from '../providers/provider.interface.js';
import { PredictionRunner, type RunnerDeps } from './predictionRunner.js';
import type { Logger } from '../utils/logger.js';

export interface Runtime {
  settings: Settings;
  provider: PriceHistoryProvider;
  writer: DashboardWriter;
  history: PredictionHistoryStore;
  runner: PredictionRunner;
}

export interface RuntimeOverrides extends ProviderOverrides {
  provider?: PriceHistoryProvider;
  noise?: RunnerDeps['noise'];
  clock?: () => Date;
}

/** Wires the pipeline collaborators from validated settings. */
export function createRuntime(settings: Settings, logger: Logger, overrides: RuntimeOverrides = {}): Runtime {
  const provider = overrides.provider ?? createPriceProvider(settings, logger, overrides);
  const writer = new DashboardWriter(settings.outputDir, logger);
  const history = PredictionHistoryStore.inDir(settings.outputDir, settings.historyLimit, logger);
  const runner = new PredictionRunner({
    settings,
    provider,
    writer,
    history,
    noise: overrides.noise ?? (() => createNoise(settings.noiseSeed)),
    logger,
    clock: overrides.clock,
  });
  return { settings, provider, writer, history, runner };
}
