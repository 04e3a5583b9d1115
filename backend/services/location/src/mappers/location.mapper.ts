// backend/services/location/src/mappers/location.mapper.ts
import type {
  City,
  Country,
  EventLog,
  State,
} from "../../../shared/contracts/location.contract";
import type { CountryDoc } from "../repo/mongo/models/country.model";
import type { StateDoc } from "../repo/mongo/models/state.model";
import type { CityDoc } from "../repo/mongo/models/city.model";
import type { EventLogDoc } from "../repo/mongo/models/eventLog.model";

// Domain ↔ DB mappers. Keep thin; no business logic here.
// Counters (stateCount/cityCount) are storage internals and never leave the repo.

export function toCountry(doc: Pick<CountryDoc, "_id" | "name" | "code">): Country {
  return { id: String(doc._id), name: doc.name, code: doc.code };
}

export function toState(
  doc: Pick<StateDoc, "_id" | "countryId" | "name" | "code">
): State {
  return {
    id: String(doc._id),
    countryId: String(doc.countryId),
    name: doc.name,
    code: doc.code,
  };
}

export function toCity(
  doc: Pick<CityDoc, "_id" | "stateId" | "name" | "code" | "isActive">
): City {
  return {
    id: String(doc._id),
    stateId: String(doc.stateId),
    name: doc.name,
    code: doc.code,
    isActive: doc.isActive,
  };
}

export function toEventLog(doc: EventLogDoc): EventLog {
  return {
    id: String(doc._id),
    eventType: doc.eventType,
    entityType: doc.entityType,
    entityId: doc.entityId,
    requestMethod: doc.requestMethod,
    requestPath: doc.requestPath,
    requestBody: doc.requestBody ?? null,
    userId: doc.userId ?? null,
    ipAddress: doc.ipAddress ?? null,
    createdAt: doc.createdAt,
    statusCode: doc.statusCode ?? null,
    processingStatus: doc.processingStatus,
    processedAt: doc.processedAt ?? null,
  };
}

/** Drop undefined keys so a partial patch never unsets a stored field. */
export function definedOnly<T extends object>(patch: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key of Object.keys(patch)) {
    if (!isKeyOf(patch, key)) continue;
    const value = patch[key];
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function isKeyOf<T extends object>(obj: T, key: PropertyKey): key is keyof T {
  return key in obj;
}
