// backend/services/location/src/routes/eventLog.routes.ts
import { Router } from "express";
import type { RequestHandler } from "express";

export function eventLogRouter(h: { list: RequestHandler }): Router {
  const router = Router();
  router.get("/", h.list);
  return router;
}
