import 'dotenv/config';
import { loadSettings } from '../src/config/settings.js';
import { createRuntime } from '../src/services/runtime.js';
import { createLogger, logger as bootLogger } from '../src/utils/logger.js';

// One pipeline run. On failure the error page is already in place; --soft-fail
// keeps the exit code at 0 so a publishing workflow still deploys it.
async function main() {
  const softFail = process.argv.slice(2).includes('--soft-fail');
  const settings = loadSettings();
  const logger = createLogger(settings.log);
  const { runner } = createRuntime(settings, logger);
  try {
    const snapshot = await runner.run('cli');
    logger.info({
      outputDir: settings.outputDir,
      currentPrice: snapshot.currentPrice,
      action: snapshot.recommendation.action,
    }, 'dashboard_generated');
  } catch (err) {
    logger.error({ err, softFail }, 'dashboard_generation_failed');
    process.exitCode = softFail ? 0 : 1;
  }
}

main().catch(e => { bootLogger.error({ err: e }, 'dashboard_cli_crashed'); process.exit(1); });
