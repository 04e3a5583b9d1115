// backend/services/location/src/domain/validators/location.validators.ts
/**
 * Pre-write checks run inside the write transaction, before any mutation.
 * Each resolves to `null` when the check passes, otherwise the DomainError
 * that the write operation returns unchanged.
 *
 * The storage constraints stay authoritative; these exist so the common
 * failures produce a precise error and never reach the write at all.
 */

import type { LocationReader } from "../../repo/location.store.types";
import {
  duplicateCode,
  entityNotFound,
  restrictedDeletion,
  type DuplicateCode,
  type EntityNotFound,
  type RestrictedDeletion,
} from "../errors";

export type ParentType = "Country" | "State";

export async function validateParentExists(
  reader: LocationReader,
  parentType: ParentType,
  parentId: string
): Promise<EntityNotFound | null> {
  const parent =
    parentType === "Country"
      ? await reader.findCountryById(parentId)
      : await reader.findStateById(parentId);
  return parent ? null : entityNotFound(parentType, parentId);
}

export async function validateCodeUnique(
  reader: LocationReader,
  entityType: ParentType,
  code: string,
  excludeId?: string
): Promise<DuplicateCode | null> {
  const existing =
    entityType === "Country"
      ? await reader.findCountryByCode(code, excludeId)
      : await reader.findStateByCode(code, excludeId);
  return existing ? duplicateCode(entityType, code) : null;
}

/** Only active cities compete for a code; inactive rows are ignored. */
export async function validateActiveCityCodeUnique(
  reader: LocationReader,
  code: string,
  excludeId?: string
): Promise<DuplicateCode | null> {
  const existing = await reader.findActiveCityByCode(code, excludeId);
  return existing ? duplicateCode("Active city", code) : null;
}

export async function validateNoChildren(
  reader: LocationReader,
  entityType: ParentType,
  id: string
): Promise<RestrictedDeletion | null> {
  if (entityType === "Country") {
    const states = await reader.countStatesByCountry(id);
    return states > 0 ? restrictedDeletion("Country", id, "states") : null;
  }
  const cities = await reader.countCitiesByState(id);
  return cities > 0 ? restrictedDeletion("State", id, "cities") : null;
}
