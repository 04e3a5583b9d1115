// backend/services/shared/middleware/core.ts
import express from "express";
import cors from "cors";

export interface CoreMiddlewareOptions {
  /** Browser origins allowed to call the API; none means no CORS headers at all. */
  corsOrigins?: string[];
  /** JSON body limit (body-parser syntax). */
  bodyLimit?: string;
}

export const DEFAULT_BODY_LIMIT = "16kb";

/** CORS + JSON parsing. No cookies or auth headers cross origins. */
export function coreMiddleware(opts: CoreMiddlewareOptions = {}) {
  const origins = opts.corsOrigins ?? [];
  return [
    cors({
      origin: origins.length > 0 ? origins : false,
      methods: ["GET", "POST", "PATCH", "DELETE"],
      credentials: false,
    }),
    express.json({ limit: opts.bodyLimit ?? DEFAULT_BODY_LIMIT }),
  ];
}
