// backend/services/shared/middleware/requestId.ts

/**
 * Shared Request ID middleware.
 *
 * Every inbound request carries one correlation key so that logs and
 * event-log rows written for it can be tied together.
 *
 * Notes:
 * - Order matters. This runs **before** the http logger.
 * - Never overwrites a caller-supplied ID; a UUID is minted only if the
 *   request lacks all recognized headers.
 * - Headers honored: `x-request-id`, `x-correlation-id`, `x-amzn-trace-id`.
 */

import type { RequestHandler } from "express";
import { randomUUID } from "crypto";

const CORRELATION_HEADERS = [
  "x-request-id",
  "x-correlation-id",
  "x-amzn-trace-id",
] as const;

export function pickRequestId(
  headers: Record<string, string | string[] | undefined>
): string | undefined {
  for (const name of CORRELATION_HEADERS) {
    const hdr = headers[name];
    const v = Array.isArray(hdr) ? hdr[0] : hdr;
    if (v && v.trim()) return v.trim();
  }
  return undefined;
}

export function requestIdMiddleware(): RequestHandler {
  return (req, res, next) => {
    const id = pickRequestId(req.headers) ?? randomUUID();
    req.requestId = id;
    res.setHeader("x-request-id", id);
    next();
  };
}
