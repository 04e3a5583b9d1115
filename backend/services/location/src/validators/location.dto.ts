// backend/services/location/src/validators/location.dto.ts
import { z } from "zod";
import {
  ENTITY_TYPES,
  EVENT_TYPES,
  zCityCode,
  zCountryCode,
  zEntityName,
  zStateCode,
} from "../../../shared/contracts/location.contract";
import { zObjectId, zPagination, zQueryBool } from "../../../shared/contracts/common";

/**
 * Edge DTOs. Bodies are parsed with these before anything reaches a service;
 * unknown keys are stripped (a city body's stateId on PATCH is simply ignored).
 */

export const idParams = z.object({ id: zObjectId });

// ── Country ──────────────────────────────────────────────────────────────────

export const createCountryDto = z.object({
  name: zEntityName,
  code: zCountryCode,
});

export const updateCountryDto = z.object({
  name: zEntityName.optional(),
  code: zCountryCode.optional(),
});

// ── State ────────────────────────────────────────────────────────────────────

export const createStateDto = z.object({
  countryId: zObjectId,
  name: zEntityName,
  code: zStateCode,
});

/** POST /countries/:id/states: the parent comes from the path. */
export const createStateUnderCountryDto = createStateDto.omit({ countryId: true });

export const updateStateDto = z.object({
  countryId: zObjectId.optional(),
  name: zEntityName.optional(),
  code: zStateCode.optional(),
});

// ── City ─────────────────────────────────────────────────────────────────────

export const createCityDto = z.object({
  stateId: zObjectId,
  name: zEntityName,
  code: zCityCode,
  isActive: z.boolean().optional(),
});

export const updateCityDto = z.object({
  name: zEntityName.optional(),
  code: zCityCode.optional(),
  isActive: z.boolean().optional(),
});

// ── Queries ──────────────────────────────────────────────────────────────────

export const paginationQuery = zPagination;

export const listStatesQuery = zPagination.extend({
  countryId: zObjectId.optional(),
});

export const includeInactiveQuery = z.object({
  includeInactive: zQueryBool,
});

export const listCitiesQuery = zPagination.extend({
  stateId: zObjectId.optional(),
  includeInactive: zQueryBool,
});

export const citiesOfStateQuery = zPagination.extend({
  includeInactive: zQueryBool,
});

export const eventLogQuery = zPagination.extend({
  entityType: z.enum(ENTITY_TYPES).optional(),
  entityId: z.string().min(1).optional(),
  eventType: z.enum(EVENT_TYPES).optional(),
});
