// backend/services/location/src/repo/location.store.types.ts
/**
 * Purpose:
 * - Canonical store interface for the location service.
 * - Reads are available everywhere; writes only inside `transaction()`, so an
 *   entity change and its event-log row can never be persisted separately.
 *
 * Constraints every implementation enforces at the storage level:
 * - `uq_country_code`      countries.code unique
 * - `uq_state_code`        states.code unique
 * - `uq_city_code_active`  cities.code unique among rows with isActive = true
 * - states.countryId / cities.stateId reference an existing parent; a parent
 *   with children cannot be deleted (restrict)
 */

import type {
  City,
  Country,
  EntityType,
  EventLog,
  EventType,
  NewEventLog,
  State,
} from "../../../shared/contracts/location.contract";
import type { Pagination } from "../../../shared/contracts/common";

export const INDEX_COUNTRY_CODE = "uq_country_code";
export const INDEX_STATE_CODE = "uq_state_code";
export const INDEX_CITY_CODE_ACTIVE = "uq_city_code_active";

export type CountryInsert = Omit<Country, "id">;
export type CountryPatch = Partial<CountryInsert>;

export type StateInsert = Omit<State, "id">;
export type StatePatch = Partial<StateInsert>;

export type CityInsert = Omit<City, "id">;
export type CityPatch = Partial<Omit<City, "id" | "stateId">>;

export interface StateFilter {
  countryId?: string;
}

export interface CityFilter {
  stateId?: string;
  includeInactive?: boolean;
}

export interface EventLogFilter {
  entityType?: EntityType;
  entityId?: string;
  eventType?: EventType;
}

export interface LocationReader {
  findCountryById(id: string): Promise<Country | null>;
  findCountryByCode(code: string, excludeId?: string): Promise<Country | null>;
  listCountries(page: Pagination): Promise<Country[]>;

  findStateById(id: string): Promise<State | null>;
  findStateByCode(code: string, excludeId?: string): Promise<State | null>;
  listStates(filter: StateFilter, page: Pagination): Promise<State[]>;
  countStatesByCountry(countryId: string): Promise<number>;

  /** Returns the row regardless of activity; callers apply visibility. */
  findCityById(id: string): Promise<City | null>;
  findActiveCityByCode(code: string, excludeId?: string): Promise<City | null>;
  listCities(filter: CityFilter, page: Pagination): Promise<City[]>;
  countCitiesByState(stateId: string): Promise<number>;

  listEventLogs(filter: EventLogFilter, page: Pagination): Promise<EventLog[]>;
}

export interface LocationWriter {
  insertCountry(input: CountryInsert): Promise<Country>;
  updateCountry(id: string, patch: CountryPatch): Promise<Country | null>;
  deleteCountry(id: string): Promise<Country | null>;

  insertState(input: StateInsert): Promise<State>;
  updateState(id: string, patch: StatePatch): Promise<State | null>;
  deleteState(id: string): Promise<State | null>;

  insertCity(input: CityInsert): Promise<City>;
  updateCity(id: string, patch: CityPatch): Promise<City | null>;
  deleteCity(id: string): Promise<City | null>;

  appendEventLog(entry: NewEventLog): Promise<EventLog>;
}

export type LocationTx = LocationReader & LocationWriter;

export interface LocationStore {
  /** Reads outside any transaction (committed state). */
  readonly reader: LocationReader;

  /**
   * Run `work` in one transaction. Commits when it resolves; rolls back and
   * rethrows when it (or the commit) throws.
   */
  transaction<T>(work: (tx: LocationTx) => Promise<T>): Promise<T>;

  /** Create or sync the indexes listed above. Idempotent. */
  ensureIndexes(): Promise<void>;

  /** Lightweight readiness probe. */
  isReady(): Promise<boolean>;

  close(): Promise<void>;
}

// ──────────────────────────────────────────────────────────────────────────────
// Storage-level integrity failures (duplicate keys use the shared DuplicateKeyError)
// ──────────────────────────────────────────────────────────────────────────────

export type ParentCollection = "countries" | "states";
export type ChildCollection = "states" | "cities";

/** A child row referenced a parent that does not exist. */
export class ForeignKeyViolationError extends Error {
  public readonly collection: ChildCollection;
  public readonly field: "countryId" | "stateId";
  public readonly value: string;

  constructor(
    collection: ChildCollection,
    field: "countryId" | "stateId",
    value: string
  ) {
    super(`${collection}.${field} references missing parent ${value}`);
    this.name = "ForeignKeyViolationError";
    this.collection = collection;
    this.field = field;
    this.value = value;
  }
}

/** A parent row still has children and cannot be deleted. */
export class RestrictViolationError extends Error {
  public readonly collection: ParentCollection;
  public readonly id: string;
  public readonly childCollection: ChildCollection;

  constructor(
    collection: ParentCollection,
    id: string,
    childCollection: ChildCollection
  ) {
    super(`${collection} ${id} is still referenced by ${childCollection}`);
    this.name = "RestrictViolationError";
    this.collection = collection;
    this.id = id;
    this.childCollection = childCollection;
  }
}
