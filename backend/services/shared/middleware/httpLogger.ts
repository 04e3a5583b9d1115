// backend/services/shared/middleware/httpLogger.ts
import pinoHttp from "pino-http";
import { randomUUID } from "crypto";
import type { IncomingMessage, ServerResponse } from "http";
import { logger } from "../utils/logger";
import { pickRequestId } from "./requestId";

export function makeHttpLogger(serviceName: string) {
  return pinoHttp({
    logger,
    genReqId: (req) => {
      // requestIdMiddleware runs first and has already picked or minted one
      if ("requestId" in req && typeof req.requestId === "string") {
        return req.requestId;
      }
      return pickRequestId(req.headers) ?? randomUUID();
    },
    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },
    customProps: () => ({ service: serviceName }),
    autoLogging: {
      ignore: (req: IncomingMessage) => {
        const url = req.url;
        return (
          url === "/health" ||
          url === "/health/live" ||
          url === "/health/ready" ||
          url === "/favicon.ico"
        );
      },
    },
    serializers: {
      req(req: IncomingMessage & { id?: unknown }) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
    },
  });
}
