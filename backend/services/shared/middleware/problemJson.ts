// backend/services/shared/middleware/problemJson.ts

/**
 * RFC 7807 Problem+JSON formatting for every service.
 *
 * Notes:
 * - This middleware is *transport-level* formatting, not business logic.
 * - Error detail stays minimal for 5xx so internals never reach the caller.
 * - 404s are only formatted for known prefixes; everything else gets a bare 404.
 */

import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { extractLogContext, logger } from "../utils/logger";
import { clean, type Problem } from "../contracts/common";

function statusOf(err: unknown): number {
  if (err && typeof err === "object") {
    // body-parser & friends attach status/statusCode
    const candidate =
      ("statusCode" in err ? err.statusCode : undefined) ??
      ("status" in err ? err.status : undefined);
    const n = Number(candidate);
    if (Number.isInteger(n) && n >= 400 && n <= 599) return n;
  }
  return 500;
}

export function sendProblem(
  res: Response,
  problem: Omit<Problem, "type"> & { type?: string }
): Response {
  return res
    .status(problem.status)
    .type("application/problem+json")
    .json(clean({ type: "about:blank", ...problem }));
}

/** Problem+JSON for zod validation failures */
export function sendValidationProblem(
  req: Request,
  res: Response,
  error: ZodError
): Response {
  const errors = error.issues.map((i) => ({
    path: i.path.join("."),
    code: i.code,
    message: i.message,
  }));
  return sendProblem(res, {
    title: "Bad Request",
    status: 400,
    code: "VALIDATION_ERROR",
    detail: "Validation failed",
    instance: req.requestId,
    errors,
  });
}

/**
 * 404 formatter: only emits Problem+JSON for known API/health prefixes.
 */
export function notFoundProblemJson(validPrefixes: string[]) {
  return (req: Request, res: Response) => {
    if (validPrefixes.some((p) => req.path.startsWith(p))) {
      return sendProblem(res, {
        title: "Not Found",
        status: 404,
        code: "NOT_FOUND",
        detail: "Route not found",
        instance: req.requestId,
      });
    }
    return res.status(404).end();
  };
}

/**
 * Error formatter: converts anything passed to next(err) into Problem+JSON.
 */
export function errorProblemJson() {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ZodError) {
      return sendValidationProblem(req, res, err);
    }

    const status = statusOf(err);
    const message = err instanceof Error ? err.message : String(err);

    if (status >= 500) {
      logger.error({ err, ...extractLogContext(req) }, "request error");
    } else {
      logger.debug({ status, message, ...extractLogContext(req) }, "request rejected");
    }

    return sendProblem(res, {
      title: status >= 500 ? "Internal Server Error" : "Request Error",
      status,
      detail: status >= 500 ? "An unexpected error occurred" : message,
      instance: req.requestId,
    });
  };
}
