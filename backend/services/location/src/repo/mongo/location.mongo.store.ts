// backend/services/location/src/repo/mongo/location.mongo.store.ts
/**
 * Purpose:
 * - Mongo adapter for the location store.
 * - Every write runs on the caller's ClientSession inside one multi-document
 *   transaction (requires a replica set).
 *
 * Notes:
 * - Restrict-on-delete and parent existence are enforced through the parent's
 *   child counter: children bump it with a conditional $inc, parents are only
 *   deleted while it is 0. Two transactions touching the same parent document
 *   write-conflict, so exactly one of them commits.
 * - Malformed ids never reach a query (no CastError); they simply match nothing.
 */

import type { ClientSession, Connection, FilterQuery } from "mongoose";
import type {
  City,
  Country,
  EventLog,
  NewEventLog,
  State,
} from "../../../../shared/contracts/location.contract";
import type { Pagination } from "../../../../shared/contracts/common";
import { logger as rootLogger, type Logger } from "../../../../shared/utils/logger";
import {
  ForeignKeyViolationError,
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
  type StateFilter,
  type StateInsert,
  type StatePatch,
} from "../location.store.types";
import {
  definedOnly,
  toCity,
  toCountry,
  toEventLog,
  toState,
} from "../../mappers/location.mapper";
import { countryModel, type CountryDoc, type CountryModel } from "./models/country.model";
import { stateModel, type StateDoc, type StateModel } from "./models/state.model";
import { cityModel, type CityDoc, type CityModel } from "./models/city.model";
import { eventLogModel, type EventLogDoc, type EventLogModel } from "./models/eventLog.model";

const OBJECT_ID_RE = /^[a-f0-9]{24}$/i;

function isObjectIdHex(id: string): boolean {
  return OBJECT_ID_RE.test(id);
}

interface LocationModels {
  Country: CountryModel;
  State: StateModel;
  City: CityModel;
  EventLog: EventLogModel;
}

export function registerLocationModels(conn: Connection): LocationModels {
  return {
    Country: countryModel(conn),
    State: stateModel(conn),
    City: cityModel(conn),
    EventLog: eventLogModel(conn),
  };
}

/**
 * Reads and writes bound to one session (or none, for committed-state reads).
 */
class MongoLocationAccess implements LocationTx {
  constructor(
    private readonly m: LocationModels,
    private readonly session: ClientSession | null
  ) {}

  // ── Countries ──────────────────────────────────────────────────────────────

  public async findCountryById(id: string): Promise<Country | null> {
    if (!isObjectIdHex(id)) return null;
    const doc = await this.m.Country.findById(id)
      .session(this.session)
      .lean<CountryDoc>()
      .exec();
    return doc ? toCountry(doc) : null;
  }

  public async findCountryByCode(
    code: string,
    excludeId?: string
  ): Promise<Country | null> {
    const filter: FilterQuery<CountryDoc> =
      excludeId && isObjectIdHex(excludeId)
        ? { code, _id: { $ne: excludeId } }
        : { code };
    const doc = await this.m.Country.findOne(filter)
      .session(this.session)
      .lean<CountryDoc>()
      .exec();
    return doc ? toCountry(doc) : null;
  }

  public async listCountries(page: Pagination): Promise<Country[]> {
    const docs = await this.m.Country.find({})
      .sort({ _id: 1 })
      .skip(page.skip)
      .limit(page.limit)
      .session(this.session)
      .lean<CountryDoc[]>()
      .exec();
    return docs.map(toCountry);
  }

  public async insertCountry(input: CountryInsert): Promise<Country> {
    const [doc] = await this.m.Country.create([{ ...input, stateCount: 0 }], {
      session: this.session,
    });
    return toCountry(doc);
  }

  public async updateCountry(
    id: string,
    patch: CountryPatch
  ): Promise<Country | null> {
    if (!isObjectIdHex(id)) return null;
    const doc = await this.m.Country.findOneAndUpdate(
      { _id: id },
      { $set: definedOnly(patch) },
      { new: true, runValidators: true, session: this.session }
    )
      .lean<CountryDoc>()
      .exec();
    return doc ? toCountry(doc) : null;
  }

  public async deleteCountry(id: string): Promise<Country | null> {
    if (!isObjectIdHex(id)) return null;
    const doc = await this.m.Country.findOneAndDelete(
      { _id: id, stateCount: 0 },
      { session: this.session }
    )
      .lean<CountryDoc>()
      .exec();
    if (doc) return toCountry(doc);

    const exists = await this.m.Country.exists({ _id: id })
      .session(this.session)
      .exec();
    if (exists) throw new RestrictViolationError("countries", id, "states");
    return null;
  }

  // ── States ─────────────────────────────────────────────────────────────────

  public async findStateById(id: string): Promise<State | null> {
    if (!isObjectIdHex(id)) return null;
    const doc = await this.m.State.findById(id)
      .session(this.session)
      .lean<StateDoc>()
      .exec();
    return doc ? toState(doc) : null;
  }

  public async findStateByCode(
    code: string,
    excludeId?: string
  ): Promise<State | null> {
    const filter: FilterQuery<StateDoc> =
      excludeId && isObjectIdHex(excludeId)
        ? { code, _id: { $ne: excludeId } }
        : { code };
    const doc = await this.m.State.findOne(filter)
      .session(this.session)
      .lean<StateDoc>()
      .exec();
    return doc ? toState(doc) : null;
  }

  public async listStates(
    filter: StateFilter,
    page: Pagination
  ): Promise<State[]> {
    const q: FilterQuery<StateDoc> = {};
    if (filter.countryId !== undefined) {
      if (!isObjectIdHex(filter.countryId)) return [];
      q.countryId = filter.countryId;
    }
    const docs = await this.m.State.find(q)
      .sort({ _id: 1 })
      .skip(page.skip)
      .limit(page.limit)
      .session(this.session)
      .lean<StateDoc[]>()
      .exec();
    return docs.map(toState);
  }

  public async countStatesByCountry(countryId: string): Promise<number> {
    if (!isObjectIdHex(countryId)) return 0;
    return this.m.State.countDocuments({ countryId })
      .session(this.session)
      .exec();
  }

  public async insertState(input: StateInsert): Promise<State> {
    if (!(await this.adjustStateCount(input.countryId, 1))) {
      throw new ForeignKeyViolationError("states", "countryId", input.countryId);
    }
    const [doc] = await this.m.State.create([{ ...input, cityCount: 0 }], {
      session: this.session,
    });
    return toState(doc);
  }

  public async updateState(
    id: string,
    patch: StatePatch
  ): Promise<State | null> {
    if (!isObjectIdHex(id)) return null;

    if (patch.countryId !== undefined) {
      const current = await this.m.State.findById(id)
        .session(this.session)
        .lean<StateDoc>()
        .exec();
      if (!current) return null;

      const previousCountryId = String(current.countryId);
      if (previousCountryId !== patch.countryId) {
        if (!(await this.adjustStateCount(patch.countryId, 1))) {
          throw new ForeignKeyViolationError("states", "countryId", patch.countryId);
        }
        await this.adjustStateCount(previousCountryId, -1);
      }
    }

    const doc = await this.m.State.findOneAndUpdate(
      { _id: id },
      { $set: definedOnly(patch) },
      { new: true, runValidators: true, session: this.session }
    )
      .lean<StateDoc>()
      .exec();
    return doc ? toState(doc) : null;
  }

  public async deleteState(id: string): Promise<State | null> {
    if (!isObjectIdHex(id)) return null;
    const doc = await this.m.State.findOneAndDelete(
      { _id: id, cityCount: 0 },
      { session: this.session }
    )
      .lean<StateDoc>()
      .exec();
    if (doc) {
      await this.adjustStateCount(String(doc.countryId), -1);
      return toState(doc);
    }

    const exists = await this.m.State.exists({ _id: id })
      .session(this.session)
      .exec();
    if (exists) throw new RestrictViolationError("states", id, "cities");
    return null;
  }

  // ── Cities ─────────────────────────────────────────────────────────────────

  public async findCityById(id: string): Promise<City | null> {
    if (!isObjectIdHex(id)) return null;
    const doc = await this.m.City.findById(id)
      .session(this.session)
      .lean<CityDoc>()
      .exec();
    return doc ? toCity(doc) : null;
  }

  public async findActiveCityByCode(
    code: string,
    excludeId?: string
  ): Promise<City | null> {
    const filter: FilterQuery<CityDoc> =
      excludeId && isObjectIdHex(excludeId)
        ? { code, isActive: true, _id: { $ne: excludeId } }
        : { code, isActive: true };
    const doc = await this.m.City.findOne(filter)
      .session(this.session)
      .lean<CityDoc>()
      .exec();
    return doc ? toCity(doc) : null;
  }

  public async listCities(
    filter: CityFilter,
    page: Pagination
  ): Promise<City[]> {
    const q: FilterQuery<CityDoc> = {};
    if (filter.stateId !== undefined) {
      if (!isObjectIdHex(filter.stateId)) return [];
      q.stateId = filter.stateId;
    }
    if (!filter.includeInactive) q.isActive = true;
    const docs = await this.m.City.find(q)
      .sort({ _id: 1 })
      .skip(page.skip)
      .limit(page.limit)
      .session(this.session)
      .lean<CityDoc[]>()
      .exec();
    return docs.map(toCity);
  }

  public async countCitiesByState(stateId: string): Promise<number> {
    if (!isObjectIdHex(stateId)) return 0;
    return this.m.City.countDocuments({ stateId })
      .session(this.session)
      .exec();
  }

  public async insertCity(input: CityInsert): Promise<City> {
    if (!(await this.adjustCityCount(input.stateId, 1))) {
      throw new ForeignKeyViolationError("cities", "stateId", input.stateId);
    }
    const [doc] = await this.m.City.create([input], { session: this.session });
    return toCity(doc);
  }

  public async updateCity(id: string, patch: CityPatch): Promise<City | null> {
    if (!isObjectIdHex(id)) return null;
    const doc = await this.m.City.findOneAndUpdate(
      { _id: id },
      { $set: definedOnly(patch) },
      { new: true, runValidators: true, session: this.session }
    )
      .lean<CityDoc>()
      .exec();
    return doc ? toCity(doc) : null;
  }

  public async deleteCity(id: string): Promise<City | null> {
    if (!isObjectIdHex(id)) return null;
    const doc = await this.m.City.findOneAndDelete(
      { _id: id },
      { session: this.session }
    )
      .lean<CityDoc>()
      .exec();
    if (!doc) return null;
    await this.adjustCityCount(String(doc.stateId), -1);
    return toCity(doc);
  }

  // ── Event log ──────────────────────────────────────────────────────────────

  public async appendEventLog(entry: NewEventLog): Promise<EventLog> {
    const [doc] = await this.m.EventLog.create([entry], {
      session: this.session,
    });
    return toEventLog(doc.toObject());
  }

  public async listEventLogs(
    filter: EventLogFilter,
    page: Pagination
  ): Promise<EventLog[]> {
    const docs = await this.m.EventLog.find(definedOnly(filter))
      .sort({ _id: 1 })
      .skip(page.skip)
      .limit(page.limit)
      .session(this.session)
      .lean<EventLogDoc[]>()
      .exec();
    return docs.map(toEventLog);
  }

  // ── Parent counters ────────────────────────────────────────────────────────

  private async adjustStateCount(countryId: string, delta: 1 | -1): Promise<boolean> {
    if (!isObjectIdHex(countryId)) return false;
    const res = await this.m.Country.updateOne(
      { _id: countryId },
      { $inc: { stateCount: delta } },
      { session: this.session ?? undefined }
    ).exec();
    return res.matchedCount > 0;
  }

  private async adjustCityCount(stateId: string, delta: 1 | -1): Promise<boolean> {
    if (!isObjectIdHex(stateId)) return false;
    const res = await this.m.State.updateOne(
      { _id: stateId },
      { $inc: { cityCount: delta } },
      { session: this.session ?? undefined }
    ).exec();
    return res.matchedCount > 0;
  }
}

export class LocationMongoStore implements LocationStore {
  public readonly reader: LocationReader;
  private readonly models: LocationModels;
  private readonly log: Logger;

  public constructor(
    private readonly conn: Connection,
    opts: { logger?: Logger } = {}
  ) {
    this.models = registerLocationModels(conn);
    this.reader = new MongoLocationAccess(this.models, null);
    this.log = opts.logger ?? rootLogger;
  }

  public async transaction<T>(work: (tx: LocationTx) => Promise<T>): Promise<T> {
    const session = await this.conn.startSession();
    try {
      session.startTransaction({
        readConcern: { level: "snapshot" },
        writeConcern: { w: "majority" },
      });
      const result = await work(new MongoLocationAccess(this.models, session));
      await session.commitTransaction();
      return result;
    } catch (err) {
      if (session.inTransaction()) {
        await session.abortTransaction().catch((abortErr: unknown) => {
          this.log.warn({ err: abortErr }, "[location.mongo] abortTransaction failed");
        });
      }
      throw err;
    } finally {
      await session.endSession();
    }
  }

  /** Sync declared indexes (drops stale ones, builds the partial city index). */
  public async ensureIndexes(): Promise<void> {
    for (const model of [
      this.models.Country,
      this.models.State,
      this.models.City,
      this.models.EventLog,
    ]) {
      const dropped = await model.syncIndexes();
      if (dropped.length > 0) {
        this.log.info(
          { collection: model.collection.name, dropped },
          "[location.mongo] dropped stale indexes"
        );
      }
    }
  }

  public async isReady(): Promise<boolean> {
    return this.conn.readyState === 1;
  }

  public async close(): Promise<void> {
    await this.conn.close();
  }
}
