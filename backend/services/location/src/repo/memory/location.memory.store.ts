// backend/services/location/src/repo/memory/location.memory.store.ts
/**
 * Purpose:
 * - In-process LocationStore for tests and local runs without a replica set.
 * - Mirrors the Mongo adapter's constraints: the three unique indexes (city
 *   code only among active rows), parent existence, restrict-on-delete.
 *
 * Transactions:
 * - Work runs against a private snapshot taken when `transaction()` is called.
 * - Every write is also recorded; commit replays the recording on top of the
 *   latest committed data, so two transactions racing on the same code or
 *   parent fail at commit like concurrent Mongo sessions would.
 * - Rows a transaction updated or deleted carry a version; if another commit
 *   changed one of them since the snapshot, commit throws WriteConflictError.
 * - Nothing is visible to other readers until commit; a throw discards it all.
 */

import { Types } from "mongoose";
import type {
  City,
  Country,
  EventLog,
  NewEventLog,
  State,
} from "../../../../shared/contracts/location.contract";
import type { Pagination } from "../../../../shared/contracts/common";
import { DuplicateKeyError } from "../../../../shared/persistence/dupeKeyError";
import { WriteConflictError } from "../../../../shared/persistence/writeConflict";
import {
  ForeignKeyViolationError,
  INDEX_CITY_CODE_ACTIVE,
  INDEX_COUNTRY_CODE,
  INDEX_STATE_CODE,
  RestrictViolationError,
  type CityFilter,
  type CityInsert,
  type CityPatch,
  type CountryInsert,
  type CountryPatch,
  type EventLogFilter,
  type LocationReader,
  type LocationStore,
  type LocationTx,
  type LocationWriter,
  type StateFilter,
  type StateInsert,
  type StatePatch,
} from "../location.store.types";
import { definedOnly } from "../../mappers/location.mapper";

const DB_NAME = "location";

function newId(): string {
  return new Types.ObjectId().toHexString();
}

function byId<T extends { id: string }>(a: T, b: T): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function page<T>(rows: T[], p: Pagination): T[] {
  return rows.slice(p.skip, p.skip + p.limit);
}

function duplicate(collection: string, index: string, code: string): DuplicateKeyError {
  return new DuplicateKeyError({
    index,
    key: { code },
    message: `E11000 duplicate key error collection: ${DB_NAME}.${collection} index: ${index} dup key: { code: "${code}" }`,
  });
}

type Collection = "countries" | "states" | "cities";

function rowKey(collection: Collection, id: string): string {
  return `${collection}:${id}`;
}

/**
 * One consistent copy of all four collections plus the constraint checks.
 * Both snapshots and the committed state are instances of this.
 */
class LocationData {
  countries = new Map<string, Country>();
  states = new Map<string, State>();
  cities = new Map<string, City>();
  eventLogs = new Map<string, EventLog>();
  /** Bumped on every update or delete, keyed "<collection>:<id>". */
  private versions = new Map<string, number>();

  clone(): LocationData {
    const copy = new LocationData();
    for (const [k, v] of this.countries) copy.countries.set(k, { ...v });
    for (const [k, v] of this.states) copy.states.set(k, { ...v });
    for (const [k, v] of this.cities) copy.cities.set(k, { ...v });
    for (const [k, v] of this.eventLogs) copy.eventLogs.set(k, { ...v });
    copy.versions = new Map(this.versions);
    return copy;
  }

  version(key: string): number {
    return this.versions.get(key) ?? 0;
  }

  private touch(key: string): void {
    this.versions.set(key, this.version(key) + 1);
  }

  // ── constraint checks ──────────────────────────────────────────────────────

  private assertCountryCodeFree(code: string, selfId: string): void {
    for (const c of this.countries.values()) {
      if (c.code === code && c.id !== selfId) {
        throw duplicate("countries", INDEX_COUNTRY_CODE, code);
      }
    }
  }

  private assertStateCodeFree(code: string, selfId: string): void {
    for (const s of this.states.values()) {
      if (s.code === code && s.id !== selfId) {
        throw duplicate("states", INDEX_STATE_CODE, code);
      }
    }
  }

  private assertActiveCityCodeFree(city: City): void {
    if (!city.isActive) return;
    for (const c of this.cities.values()) {
      if (c.isActive && c.code === city.code && c.id !== city.id) {
        throw duplicate("cities", INDEX_CITY_CODE_ACTIVE, city.code);
      }
    }
  }

  // ── mutations (deterministic: replayed verbatim at commit) ─────────────────

  insertCountry(row: Country): Country {
    this.assertCountryCodeFree(row.code, row.id);
    this.countries.set(row.id, { ...row });
    return { ...row };
  }

  updateCountry(id: string, patch: CountryPatch): Country | null {
    const current = this.countries.get(id);
    if (!current) return null;
    const next: Country = { ...current, ...definedOnly(patch) };
    this.assertCountryCodeFree(next.code, id);
    this.countries.set(id, next);
    this.touch(rowKey("countries", id));
    return { ...next };
  }

  deleteCountry(id: string): Country | null {
    const current = this.countries.get(id);
    if (!current) return null;
    for (const s of this.states.values()) {
      if (s.countryId === id) throw new RestrictViolationError("countries", id, "states");
    }
    this.countries.delete(id);
    this.touch(rowKey("countries", id));
    return { ...current };
  }

  insertState(row: State): State {
    if (!this.countries.has(row.countryId)) {
      throw new ForeignKeyViolationError("states", "countryId", row.countryId);
    }
    this.assertStateCodeFree(row.code, row.id);
    this.states.set(row.id, { ...row });
    return { ...row };
  }

  updateState(id: string, patch: StatePatch): State | null {
    const current = this.states.get(id);
    if (!current) return null;
    const next: State = { ...current, ...definedOnly(patch) };
    if (!this.countries.has(next.countryId)) {
      throw new ForeignKeyViolationError("states", "countryId", next.countryId);
    }
    this.assertStateCodeFree(next.code, id);
    this.states.set(id, next);
    this.touch(rowKey("states", id));
    return { ...next };
  }

  deleteState(id: string): State | null {
    const current = this.states.get(id);
    if (!current) return null;
    for (const c of this.cities.values()) {
      if (c.stateId === id) throw new RestrictViolationError("states", id, "cities");
    }
    this.states.delete(id);
    this.touch(rowKey("states", id));
    return { ...current };
  }

  insertCity(row: City): City {
    if (!this.states.has(row.stateId)) {
      throw new ForeignKeyViolationError("cities", "stateId", row.stateId);
    }
    this.assertActiveCityCodeFree(row);
    this.cities.set(row.id, { ...row });
    return { ...row };
  }

  updateCity(id: string, patch: CityPatch): City | null {
    const current = this.cities.get(id);
    if (!current) return null;
    const next: City = { ...current, ...definedOnly(patch) };
    this.assertActiveCityCodeFree(next);
    this.cities.set(id, next);
    this.touch(rowKey("cities", id));
    return { ...next };
  }

  deleteCity(id: string): City | null {
    const current = this.cities.get(id);
    if (!current) return null;
    this.cities.delete(id);
    this.touch(rowKey("cities", id));
    return { ...current };
  }

  appendEventLog(row: EventLog): EventLog {
    this.eventLogs.set(row.id, { ...row });
    return { ...row };
  }
}

/** Read side over one LocationData instance. */
class MemoryLocationReader implements LocationReader {
  constructor(protected readonly data: () => LocationData) {}

  public async findCountryById(id: string): Promise<Country | null> {
    const row = this.data().countries.get(id);
    return row ? { ...row } : null;
  }

  public async findCountryByCode(code: string, excludeId?: string): Promise<Country | null> {
    for (const c of this.data().countries.values()) {
      if (c.code === code && c.id !== excludeId) return { ...c };
    }
    return null;
  }

  public async listCountries(p: Pagination): Promise<Country[]> {
    return page([...this.data().countries.values()].sort(byId), p).map((c) => ({ ...c }));
  }

  public async findStateById(id: string): Promise<State | null> {
    const row = this.data().states.get(id);
    return row ? { ...row } : null;
  }

  public async findStateByCode(code: string, excludeId?: string): Promise<State | null> {
    for (const s of this.data().states.values()) {
      if (s.code === code && s.id !== excludeId) return { ...s };
    }
    return null;
  }

  public async listStates(filter: StateFilter, p: Pagination): Promise<State[]> {
    const rows = [...this.data().states.values()]
      .filter((s) => filter.countryId === undefined || s.countryId === filter.countryId)
      .sort(byId);
    return page(rows, p).map((s) => ({ ...s }));
  }

  public async countStatesByCountry(countryId: string): Promise<number> {
    let n = 0;
    for (const s of this.data().states.values()) if (s.countryId === countryId) n++;
    return n;
  }

  public async findCityById(id: string): Promise<City | null> {
    const row = this.data().cities.get(id);
    return row ? { ...row } : null;
  }

  public async findActiveCityByCode(code: string, excludeId?: string): Promise<City | null> {
    for (const c of this.data().cities.values()) {
      if (c.isActive && c.code === code && c.id !== excludeId) return { ...c };
    }
    return null;
  }

  public async listCities(filter: CityFilter, p: Pagination): Promise<City[]> {
    const rows = [...this.data().cities.values()]
      .filter((c) => filter.stateId === undefined || c.stateId === filter.stateId)
      .filter((c) => filter.includeInactive === true || c.isActive)
      .sort(byId);
    return page(rows, p).map((c) => ({ ...c }));
  }

  public async countCitiesByState(stateId: string): Promise<number> {
    let n = 0;
    for (const c of this.data().cities.values()) if (c.stateId === stateId) n++;
    return n;
  }

  public async listEventLogs(filter: EventLogFilter, p: Pagination): Promise<EventLog[]> {
    const rows = [...this.data().eventLogs.values()]
      .filter((e) => filter.entityType === undefined || e.entityType === filter.entityType)
      .filter((e) => filter.entityId === undefined || e.entityId === filter.entityId)
      .filter((e) => filter.eventType === undefined || e.eventType === filter.eventType)
      .sort(byId);
    return page(rows, p).map((e) => ({ ...e }));
  }
}

type Replay = (data: LocationData) => void;

type WriteOp = keyof LocationWriter;

/** Reads see the snapshot plus this transaction's own writes. */
class MemoryLocationTx extends MemoryLocationReader implements LocationTx {
  public readonly log: Replay[] = [];
  private readonly touched = new Set<string>();
  private readonly snapshot: LocationData;

  constructor(
    private readonly base: LocationData,
    private readonly faultFor: (op: WriteOp) => Error | undefined
  ) {
    const snapshot = base.clone();
    super(() => snapshot);
    this.snapshot = snapshot;
  }

  /** Throws if `latest` changed any row this transaction updated or deleted. */
  public assertNoConflict(latest: LocationData): void {
    for (const key of this.touched) {
      if (latest.version(key) !== this.base.version(key)) {
        throw new WriteConflictError(`WriteConflict on ${key}`);
      }
    }
  }

  private record<T>(op: WriteOp, apply: (d: LocationData) => T, target?: string): T {
    const fault = this.faultFor(op);
    if (fault) throw fault;
    const out = apply(this.snapshot);
    if (target) this.touched.add(target);
    this.log.push((d) => {
      apply(d);
    });
    return out;
  }

  public async insertCountry(input: CountryInsert): Promise<Country> {
    const row: Country = { id: newId(), ...input };
    return this.record("insertCountry", (d) => d.insertCountry(row));
  }

  public async updateCountry(id: string, patch: CountryPatch): Promise<Country | null> {
    return this.record("updateCountry", (d) => d.updateCountry(id, patch), rowKey("countries", id));
  }

  public async deleteCountry(id: string): Promise<Country | null> {
    return this.record("deleteCountry", (d) => d.deleteCountry(id), rowKey("countries", id));
  }

  public async insertState(input: StateInsert): Promise<State> {
    const row: State = { id: newId(), ...input };
    return this.record("insertState", (d) => d.insertState(row));
  }

  public async updateState(id: string, patch: StatePatch): Promise<State | null> {
    return this.record("updateState", (d) => d.updateState(id, patch), rowKey("states", id));
  }

  public async deleteState(id: string): Promise<State | null> {
    return this.record("deleteState", (d) => d.deleteState(id), rowKey("states", id));
  }

  public async insertCity(input: CityInsert): Promise<City> {
    const row: City = { id: newId(), ...input };
    return this.record("insertCity", (d) => d.insertCity(row));
  }

  public async updateCity(id: string, patch: CityPatch): Promise<City | null> {
    return this.record("updateCity", (d) => d.updateCity(id, patch), rowKey("cities", id));
  }

  public async deleteCity(id: string): Promise<City | null> {
    return this.record("deleteCity", (d) => d.deleteCity(id), rowKey("cities", id));
  }

  public async appendEventLog(entry: NewEventLog): Promise<EventLog> {
    const row: EventLog = { ...entry, id: newId(), createdAt: new Date() };
    return this.record("appendEventLog", (d) => d.appendEventLog(row));
  }
}

export class LocationMemoryStore implements LocationStore {
  public readonly reader: LocationReader;
  private committed = new LocationData();
  private readonly faults = new Map<WriteOp, Error>();
  private ready = true;

  public constructor() {
    this.reader = new MemoryLocationReader(() => this.committed);
  }

  public async transaction<T>(work: (tx: LocationTx) => Promise<T>): Promise<T> {
    // Snapshot before the first await so concurrent callers each get their own view.
    const tx = new MemoryLocationTx(this.committed, (op) => this.takeFault(op));
    const result = await work(tx);

    tx.assertNoConflict(this.committed);
    const next = this.committed.clone();
    for (const replay of tx.log) replay(next);
    this.committed = next;
    return result;
  }

  public async ensureIndexes(): Promise<void> {
    // Constraints are built into LocationData.
  }

  public async isReady(): Promise<boolean> {
    return this.ready;
  }

  public async close(): Promise<void> {
    this.ready = false;
  }

  /** Make the next call to `op` inside a transaction throw `err` (one-shot). */
  public failNext(op: WriteOp, err: Error): void {
    this.faults.set(op, err);
  }

  private takeFault(op: WriteOp): Error | undefined {
    const err = this.faults.get(op);
    if (err) this.faults.delete(op);
    return err;
  }
}
