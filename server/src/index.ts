import 'dotenv/config';
import type { Server } from 'http';
import { createApp } from './app.js';
import { loadSettings } from './config/settings.js';
import { DashboardScheduler } from './jobs/scheduler.js';
import { createRuntime } from './services/runtime.js';
import { fetchMetrics } from './utils/metrics.js';
import { createLogger, logger as bootLogger } from './utils/logger.js';

function listen(app: ReturnType<typeof createApp>, port: number) {
  return new Promise<Server>((resolve, reject) => {
    const srv = app.listen(port, () => resolve(srv));
    srv.on('error', reject);
  });
}

async function main() {
  const settings = loadSettings();
  const logger = createLogger(settings.log);

  process.on('unhandledRejection', (reason) => {
    logger.error({ err: reason }, 'unhandled_rejection');
  });
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'uncaught_exception');
  });

  const runtime = createRuntime(settings, logger);
  const scheduler = new DashboardScheduler(runtime.runner, settings.cron, logger);
  const app = createApp({
    logger,
    runner: runtime.runner,
    writer: runtime.writer,
    history: runtime.history,
    metrics: fetchMetrics,
    scheduler,
    staticDir: settings.outputDir,
  });

  const srv = await listen(app, settings.port);
  logger.info({ port: settings.port, symbol: settings.symbol, outputDir: settings.outputDir }, 'server_listening');

  if (settings.cron.enabled) scheduler.start();
  else logger.warn('scheduler_disabled_env');

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'server_shutdown');
    scheduler.stop();
    srv.close(err => {
      if (err) logger.error({ err }, 'server_close_failed');
      process.exit(err ? 1 : 0);
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch(err => {
  bootLogger.error({ err }, 'server_start_failed');
  process.exit(1);
});
