import express from 'express';
import cors from 'cors';
import { createDashboardRouter, type DashboardRouteDeps } from './routes/dashboard.js';
import { notFoundHandler, createErrorHandler } from './middleware/errorHandler.js';
import { ResponseUtils } from './shared/utils/response.utils.js';
import type { Logger } from './utils/logger.js';

export interface AppDeps extends DashboardRouteDeps {
  logger: Logger;
  /** Directory served at `/` (the published dashboard). */
  staticDir?: string;
}

export function createApp(deps: AppDeps) {
  const { logger } = deps;
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '100kb' }));

  // Lightweight request logger
  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.info({ method: req.method, url: req.originalUrl, status: res.statusCode, ms: Date.now() - start }, 'http_request');
    });
    next();
  });

  app.get('/health', (_req, res) => res.json(ResponseUtils.success({
    status: 'ok',
    running: deps.runner.isRunning,
  })));

  app.use('/api', createDashboardRouter(deps));
  if (deps.staticDir) app.use(express.static(deps.staticDir));

  app.use(notFoundHandler);
  app.use(createErrorHandler(logger));
  return app;
}
