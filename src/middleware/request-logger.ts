/**
 * Request Logging Middleware
 * ==========================
 * Assigns a request id and logs one line per finished request.
 *
 * Only the matched route pattern is logged (e.g. `/api/v1/auth/verify/:token`),
 * never the raw URL: some paths carry action tokens.
 */

import { randomUUID } from "node:crypto";

import type { NextFunction, Request, Response } from "express";

import { logger } from "../shared/logger.js";

const REQUEST_ID_HEADER = "X-Request-ID";
const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

function resolveRequestId(incoming: string | undefined): string {
  return incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : randomUUID();
}

/** Matched route pattern, never the raw URL. */
export function routePattern(req: Request): string {
  const path: unknown = req.route?.path;
  return typeof path === "string" ? `${req.baseUrl}${path}` : "(unmatched)";
}

export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const requestId = resolveRequestId(req.get(REQUEST_ID_HEADER));
  const startedAt = process.hrtime.bigint();
  res.setHeader(REQUEST_ID_HEADER, requestId);

  res.on("finish", () => {
    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
    logger.debug("Request completed", {
      requestId,
      method: req.method,
      route: routePattern(req),
      status: res.statusCode,
      durationMs: Math.round(durationMs * 10) / 10,
    });
  });

  next();
}
