import { Router } from 'express';
import { z } from 'zod';
import { asyncHandler } from '../utils/asyncHandler.js';
import { ResponseUtils } from '../shared/utils/response.utils.js';
import type { DashboardWriter } from '../dashboard/writer.js';
import type { PredictionHistoryStore } from '../dashboard/history.js';
import type { PredictionRunner } from '../services/predictionRunner.js';
import type { DashboardScheduler } from '../jobs/scheduler.js';
import type { FetchMetrics } from '../utils/metrics.js';

export interface DashboardRouteDeps {
  runner: PredictionRunner;
  writer: DashboardWriter;
  history: PredictionHistoryStore;
  metrics: FetchMetrics;
  scheduler?: DashboardScheduler;
}

const HistoryQuery = z.object({
  limit: z.coerce.number().int().min(1).max(10000).optional(),
});

export function createDashboardRouter(deps: DashboardRouteDeps) {
  const router = Router();

  router.get('/dashboard', asyncHandler(async (_req, res) => {
    const snapshot = await deps.writer.readSnapshot();
    if (snapshot === null) return res.status(404).json(ResponseUtils.notFound('dashboard'));
    res.json(ResponseUtils.success(snapshot));
  }));

  router.get('/history', asyncHandler(async (req, res) => {
    const q = HistoryQuery.safeParse(req.query);
    if (!q.success) {
      return res.status(400).json(ResponseUtils.validationError('limit', q.error.issues[0]?.message ?? 'invalid'));
    }
    const entries = await deps.history.list(q.data.limit);
    res.json(ResponseUtils.success(entries, { count: entries.length }));
  }));

  router.post('/refresh', asyncHandler(async (_req, res) => {
    const snapshot = await deps.runner.run('api');
    res.json(ResponseUtils.success(snapshot));
  }));

  router.get('/jobs/status', (_req, res) => {
    res.json(ResponseUtils.success({
      runner: deps.runner.status(),
      scheduler: deps.scheduler ? deps.scheduler.status() : null,
    }));
  });

  router.get('/metrics', (_req, res) => {
    res.json(ResponseUtils.success(deps.metrics.withMeta()));
  });

  return router;
}
