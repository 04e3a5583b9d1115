// backend/services/location/src/domain/requestInfo.ts

/**
 * Request metadata supplied by the transport. The core treats it as opaque
 * and persists it verbatim into the event log.
 */
export interface RequestInfo {
  method: string;
  path: string;
  body?: string | null;
  ipAddress?: string | null;
  userId?: string | null;
  statusCode?: number | null;
}
