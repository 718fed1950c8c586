import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ResponseUtils } from '../shared/utils/response.utils.js';
import { DashboardError, errorMessage } from '../shared/errors.js';
import type { Logger } from '../utils/logger.js';

/** 404 handler placed after all route mounts */
export function notFoundHandler(_req: Request, res: Response) {
  res.status(404).json(ResponseUtils.notFound('endpoint'));
}

function statusOf(err: unknown): number {
  if (err instanceof DashboardError) return err.status;
  // body-parser and friends tag their errors with a status
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

/** Central error handler; must be registered last with four arguments. */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  return function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
    const status = statusOf(err);
    const code = err instanceof DashboardError ? err.code : undefined;

    // 5xx details stay in the log
    const response = status >= 500
      ? ResponseUtils.internalError()
      : ResponseUtils.error(code ?? 'request_failed', errorMessage(err));

    const fields = { err, status, code, url: req.originalUrl, method: req.method };
    if (status >= 500) logger.error(fields, 'request_error');
    else logger.warn(fields, 'request_rejected');

    res.status(status).json(response);
  };
}
