// backend/services/location/src/controllers/eventLog.controller.ts
import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { LocationReadService } from "../services/location.read.service";
import { eventLogQuery } from "../validators/location.dto";

// Read-only audit view; rows are only ever written by the write services.
export function eventLogHandlers(deps: { read: LocationReadService }): {
  list: RequestHandler;
} {
  return {
    async list(req: Request, res: Response, next: NextFunction) {
      try {
        const { entityType, entityId, eventType, skip, limit } = eventLogQuery.parse(
          req.query
        );
        res.json(
          await deps.read.listEventLogs(
            { entityType, entityId, eventType },
            { skip, limit }
          )
        );
      } catch (err) {
        next(err);
      }
    },
  };
}
