// backend/services/location/src/controllers/http.ts
/**
 * Transport glue shared by the location controllers:
 * - RequestInfo assembly for the event log, fitted to its column widths
 *   (overlong x-user-id is a 400; an address too long to be one is dropped)
 * - DomainError → Problem+JSON (the only place statuses are chosen)
 */

import type { Request, Response } from "express";
import { z } from "zod";
import { EVENT_LOG_LIMITS } from "../../../shared/contracts/location.contract";
import { sendProblem } from "../../../shared/middleware/problemJson";
import { getClientIp } from "../../../shared/utils/clientIp";
import { extractLogContext, logger } from "../../../shared/utils/logger";
import { describeDomainError, type DomainError } from "../domain/errors";
import type { RequestInfo } from "../domain/requestInfo";

const STATUS_BY_KIND: Record<DomainError["kind"], number> = {
  DuplicateCode: 409,
  EntityNotFound: 404,
  RestrictedDeletion: 400,
  UnexpectedStorageError: 500,
};

const TITLE_BY_KIND: Record<DomainError["kind"], string> = {
  DuplicateCode: "Conflict",
  EntityNotFound: "Not Found",
  RestrictedDeletion: "Bad Request",
  UnexpectedStorageError: "Internal Server Error",
};

const CODE_BY_KIND: Record<DomainError["kind"], string> = {
  DuplicateCode: "DUPLICATE_CODE",
  EntityNotFound: "NOT_FOUND",
  RestrictedDeletion: "RESTRICTED_DELETION",
  UnexpectedStorageError: "INTERNAL_ERROR",
};

const identityHeaders = z.object({
  "x-user-id": z
    .string()
    .max(
      EVENT_LOG_LIMITS.userId,
      `x-user-id must be at most ${EVENT_LOG_LIMITS.userId} characters`
    )
    .nullable(),
});

function clientAddress(req: Request): string | null {
  const ip = getClientIp(req);
  if (ip && ip.length > EVENT_LOG_LIMITS.ipAddress) {
    logger.debug(
      { requestId: req.requestId },
      "[location.http] client address too long; not recorded"
    );
    return null;
  }
  return ip;
}

function headerValue(req: Request, name: string): string | null {
  const raw = req.headers[name];
  const v = Array.isArray(raw) ? raw[0] : raw;
  return v && v.trim() ? v.trim() : null;
}

/**
 * @param body parsed DTO (PATCH: only the supplied fields); omit for DELETE
 * @throws ZodError when x-user-id exceeds the stored width
 */
export function buildRequestInfo(
  req: Request,
  statusCode: number,
  body?: object
): RequestInfo {
  const headers = identityHeaders.parse({ "x-user-id": headerValue(req, "x-user-id") });
  return {
    method: req.method,
    path: req.originalUrl.split("?")[0].slice(0, EVENT_LOG_LIMITS.requestPath),
    body: body === undefined ? null : JSON.stringify(body),
    ipAddress: clientAddress(req),
    userId: headers["x-user-id"],
    statusCode,
  };
}

export function sendDomainError(
  req: Request,
  res: Response,
  error: DomainError
): Response {
  if (error.kind === "UnexpectedStorageError") {
    logger.warn(
      { incidentId: error.incidentId, ...extractLogContext(req) },
      "[location.http] request failed with incident"
    );
  }
  return sendProblem(res, {
    title: TITLE_BY_KIND[error.kind],
    status: STATUS_BY_KIND[error.kind],
    code: CODE_BY_KIND[error.kind],
    detail: describeDomainError(error),
    instance: req.requestId,
  });
}
