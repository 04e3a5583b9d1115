// backend/services/shared/utils/logger.ts
import type { Request } from "express";
import pino, { type LoggerOptions, type LevelWithSilent } from "pino";

// ─────────────────────────── Env ──────────────────────────────────────────────
const SERVICE_NAME = process.env.SERVICE_NAME?.trim();

const validLevels: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

function isLevel(v: string): v is LevelWithSilent {
  return validLevels.some((l) => l === v);
}

const rawLevel = process.env.LOG_LEVEL?.trim() || "info";
if (!isLevel(rawLevel)) {
  throw new Error(`Invalid LOG_LEVEL: "${rawLevel}"`);
}
const LOG_LEVEL: LevelWithSilent = rawLevel;

// ────────────────────────────── Pino (stdout only) ────────────────────────────
const pinoOptions: LoggerOptions = {
  level: LOG_LEVEL,
  base: SERVICE_NAME ? { service: SERVICE_NAME } : undefined,
  redact: {
    remove: true,
    paths: [
      "req.headers.authorization",
      "req.headers.cookie",
      "req.headers['x-api-key']",
      "res.headers['set-cookie']",
      "res.headers['Set-Cookie']",
    ],
  },
};
export const logger = pino(pinoOptions);
export type Logger = typeof logger;

/** Bind the service name once the entrypoint knows it. */
export function initLogger(serviceName: string): Logger {
  logger.setBindings({ service: serviceName });
  return logger;
}

// ───────────────────────────── Request context helper ─────────────────────────
export interface LogContext {
  requestId: string | null;
  path: string;
  method: string;
  entityId?: string;
  ip?: string;
}

export function extractLogContext(req: Request): LogContext {
  const hdr = req.headers["x-request-id"];
  const hdrId = Array.isArray(hdr) ? hdr[0] : hdr;
  return {
    requestId: req.requestId ?? hdrId ?? null,
    path: req.originalUrl,
    method: req.method,
    entityId: req.params?.id,
    ip: req.ip,
  };
}
