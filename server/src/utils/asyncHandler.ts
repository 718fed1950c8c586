import type { Request, Response, NextFunction, RequestHandler } from 'express';

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/** Forwards a rejected route promise to the error middleware. */
export function asyncHandler(fn: AsyncRoute): RequestHandler {
  return function wrapped(req, res, next) {
    fn(req, res, next).catch(next);
  };
}
