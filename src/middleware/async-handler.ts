/**
 * Async Handler
 * =============
 * Express 4 does not catch rejected promises from async handlers.
 * Wrap async route handlers so errors reach the central error middleware.
 */

import type { NextFunction, Request, Response } from "express";

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

export function asyncHandler(handler: AsyncRoute) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res, next).catch(next);
  };
}
