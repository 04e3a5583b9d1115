// backend/services/shared/utils/clientIp.ts
import type { Request } from "express";

/**
 * Best-effort client IP without throwing in tests or behind proxies.
 * Order: X-Forwarded-For[0] → socket.remoteAddress → req.ip → null
 */
export function getClientIp(req: Request): string | null {
  // Standard proxy chain (first is original client)
  const raw = req.headers["x-forwarded-for"];
  const xff = (Array.isArray(raw) ? raw[0] : raw)
    ?.split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  if (xff && xff.length > 0) return xff[0];

  // Raw socket IP (no .address() call; that can be undefined under Supertest)
  const socketRemote = req.socket?.remoteAddress;
  if (socketRemote) return socketRemote;

  if (req.ip) return req.ip;

  return null;
}
