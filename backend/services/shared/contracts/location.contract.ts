// backend/services/shared/contracts/location.contract.ts
import { z } from "zod";
import { zObjectId } from "./common";

/**
 * Canonical shapes for the country → state → city hierarchy and the event log.
 * Codes are normalized (uppercased) before the format check, so "jp" and "JP"
 * are the same country code everywhere downstream.
 */

export const zEntityName = z.string().trim().min(1).max(100);

/** ISO 3166-1 alpha-2 style: exactly two characters, stored uppercase */
export const zCountryCode = z
  .string()
  .transform((v) => v.toUpperCase())
  .pipe(z.string().length(2, "code must be exactly 2 characters"));

/** ISO 3166-2 style: {2 letters}-{1–3 alphanumerics}, stored uppercase */
export const zStateCode = z
  .string()
  .min(1)
  .max(10)
  .transform((v) => v.toUpperCase())
  .pipe(
    z
      .string()
      .regex(
        /^[A-Z]{2}-[A-Z0-9]{1,3}$/,
        "code must be in ISO 3166-2 format (e.g. 'JP-13', 'US-CA')"
      )
  );

/** Six-digit local government code */
export const zCityCode = z
  .string()
  .regex(/^[0-9]{6}$/, "code must be a 6-digit number (e.g. '131016')");

export const countryContract = z.object({
  id: zObjectId,
  name: zEntityName,
  code: zCountryCode,
});
export type Country = z.infer<typeof countryContract>;

export const stateContract = z.object({
  id: zObjectId,
  countryId: zObjectId,
  name: zEntityName,
  code: zStateCode,
});
export type State = z.infer<typeof stateContract>;

export const cityContract = z.object({
  id: zObjectId,
  stateId: zObjectId,
  name: zEntityName,
  code: zCityCode,
  isActive: z.boolean(),
});
export type City = z.infer<typeof cityContract>;

export const EVENT_TYPES = ["CREATE", "UPDATE", "DELETE"] as const;
export type EventType = (typeof EVENT_TYPES)[number];

export const ENTITY_TYPES = ["country", "state", "city"] as const;
export type EntityType = (typeof ENTITY_TYPES)[number];

export const PROCESSING_STATUSES = ["pending", "completed", "failed"] as const;
export type ProcessingStatus = (typeof PROCESSING_STATUSES)[number];

/** Column widths of the request metadata stored with each event. */
export const EVENT_LOG_LIMITS = {
  requestMethod: 10,
  requestPath: 500,
  userId: 100,
  ipAddress: 45,
} as const;

export const eventLogContract = z.object({
  id: zObjectId,
  eventType: z.enum(EVENT_TYPES),
  entityType: z.enum(ENTITY_TYPES),
  entityId: zObjectId,
  requestMethod: z.string().max(EVENT_LOG_LIMITS.requestMethod),
  requestPath: z.string().max(EVENT_LOG_LIMITS.requestPath),
  requestBody: z.string().nullable(),
  userId: z.string().max(EVENT_LOG_LIMITS.userId).nullable(),
  ipAddress: z.string().max(EVENT_LOG_LIMITS.ipAddress).nullable(),
  createdAt: z.date(),
  statusCode: z.number().int().nullable(),
  processingStatus: z.enum(PROCESSING_STATUSES),
  processedAt: z.date().nullable(),
});
export type EventLog = z.infer<typeof eventLogContract>;

/** Event-log row as assembled by the write path, before the store stamps id/createdAt. */
export type NewEventLog = Omit<EventLog, "id" | "createdAt">;
