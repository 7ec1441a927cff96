import type { NextFunction, Request, RequestHandler, Response } from "express";

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

/**
 * Adapts an async route to Express, forwarding a rejection (a thrown `AuthError` included) to the
 * error handler.
 */
export function asyncHandler(route: AsyncRoute): RequestHandler {
  return (req, res, next) => {
    void Promise.resolve(route(req, res, next)).catch(next);
  };
}
