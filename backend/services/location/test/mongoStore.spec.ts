// backend/services/location/test/mongoStore.spec.ts
import { describe, it, expect, vi, beforeEach } from "vitest";

// Models and connection are replaced wholesale; the store only sees these fakes.
const fakes = vi.hoisted(() => {
  const model = (collection: string) => ({
    collection: { name: collection },
    findById: vi.fn(),
    findOne: vi.fn(),
    find: vi.fn(),
    create: vi.fn(),
    findOneAndUpdate: vi.fn(),
    findOneAndDelete: vi.fn(),
    exists: vi.fn(),
    updateOne: vi.fn(),
    countDocuments: vi.fn(),
    syncIndexes: vi.fn(),
  });
  return {
    Country: model("countries"),
    State: model("states"),
    City: model("cities"),
    EventLog: model("event_logs"),
    session: {
      startTransaction: vi.fn(),
      commitTransaction: vi.fn(),
      abortTransaction: vi.fn(),
      endSession: vi.fn(),
      inTransaction: vi.fn(),
    },
    conn: { startSession: vi.fn(), close: vi.fn(), readyState: 1 },
  };
});

vi.mock("mongoose", () => ({
  default: { createConnection: () => fakes.conn },
}));
vi.mock("../src/repo/mongo/models/country.model", () => ({ countryModel: () => fakes.Country }));
vi.mock("../src/repo/mongo/models/state.model", () => ({ stateModel: () => fakes.State }));
vi.mock("../src/repo/mongo/models/city.model", () => ({ cityModel: () => fakes.City }));
vi.mock("../src/repo/mongo/models/eventLog.model", () => ({
  eventLogModel: () => fakes.EventLog,
}));

import mongoose from "mongoose";
import { LocationMongoStore } from "../src/repo/mongo/location.mongo.store";
import {
  ForeignKeyViolationError,
  RestrictViolationError,
} from "../src/repo/location.store.types";

const JP = "64a000000000000000000001";
const US = "64a000000000000000000002";
const TOKYO = "64b000000000000000000001";
const CHIYODA = "64c000000000000000000001";

/** Chainable stand-in for a mongoose Query resolving to `result`. */
function query(result: unknown) {
  return {
    session: vi.fn().mockReturnThis(),
    lean: vi.fn().mockReturnThis(),
    sort: vi.fn().mockReturnThis(),
    skip: vi.fn().mockReturnThis(),
    limit: vi.fn().mockReturnThis(),
    exec: vi.fn().mockResolvedValue(result),
  };
}

const matched = (n: number) => query({ matchedCount: n, modifiedCount: n });

let store: LocationMongoStore;

beforeEach(() => {
  for (const model of [fakes.Country, fakes.State, fakes.City, fakes.EventLog]) {
    for (const fn of Object.values(model)) {
      if (vi.isMockFunction(fn)) fn.mockReset();
    }
  }
  for (const fn of Object.values(fakes.session)) fn.mockReset();
  fakes.session.commitTransaction.mockResolvedValue(undefined);
  fakes.session.abortTransaction.mockResolvedValue(undefined);
  fakes.session.endSession.mockResolvedValue(undefined);
  fakes.session.inTransaction.mockReturnValue(true);
  fakes.conn.startSession.mockReset().mockResolvedValue(fakes.session);
  fakes.conn.close.mockReset().mockResolvedValue(undefined);

  store = new LocationMongoStore(mongoose.createConnection());
});

describe("transaction", () => {
  it("commits with snapshot reads and majority writes, then ends the session", async () => {
    await expect(store.transaction(async () => "done")).resolves.toBe("done");

    expect(fakes.session.startTransaction).toHaveBeenCalledWith({
      readConcern: { level: "snapshot" },
      writeConcern: { w: "majority" },
    });
    expect(fakes.session.commitTransaction).toHaveBeenCalledTimes(1);
    expect(fakes.session.abortTransaction).not.toHaveBeenCalled();
    expect(fakes.session.endSession).toHaveBeenCalledTimes(1);
  });

  it("aborts and rethrows when the work throws", async () => {
    await expect(
      store.transaction(async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    expect(fakes.session.commitTransaction).not.toHaveBeenCalled();
    expect(fakes.session.abortTransaction).toHaveBeenCalledTimes(1);
    expect(fakes.session.endSession).toHaveBeenCalledTimes(1);
  });

  it("rethrows a failed commit even when the abort fails too", async () => {
    const conflict = Object.assign(new Error("WriteConflict"), { code: 112 });
    fakes.session.commitTransaction.mockRejectedValue(conflict);
    fakes.session.abortTransaction.mockRejectedValue(new Error("no transaction"));

    await expect(store.transaction(async () => "done")).rejects.toBe(conflict);
    expect(fakes.session.endSession).toHaveBeenCalledTimes(1);
  });

  it("skips the abort once the session has left the transaction", async () => {
    fakes.session.inTransaction.mockReturnValue(false);
    fakes.session.commitTransaction.mockRejectedValue(new Error("commit failed"));

    await expect(store.transaction(async () => "done")).rejects.toThrow("commit failed");
    expect(fakes.session.abortTransaction).not.toHaveBeenCalled();
  });
});

describe("parent counters", () => {
  it("bumps the country's stateCount before inserting a state", async () => {
    fakes.Country.updateOne.mockReturnValue(matched(1));
    fakes.State.create.mockResolvedValue([
      { _id: TOKYO, countryId: JP, name: "Tokyo", code: "JP-13", cityCount: 0 },
    ]);

    const state = await store.transaction((tx) =>
      tx.insertState({ countryId: JP, name: "Tokyo", code: "JP-13" })
    );

    expect(state).toEqual({ id: TOKYO, countryId: JP, name: "Tokyo", code: "JP-13" });
    expect(fakes.Country.updateOne).toHaveBeenCalledWith(
      { _id: JP },
      { $inc: { stateCount: 1 } },
      { session: fakes.session }
    );
    expect(fakes.State.create).toHaveBeenCalledWith(
      [{ countryId: JP, name: "Tokyo", code: "JP-13", cityCount: 0 }],
      { session: fakes.session }
    );
  });

  it("raises a foreign-key violation when the country is gone", async () => {
    fakes.Country.updateOne.mockReturnValue(matched(0));

    await expect(
      store.transaction((tx) => tx.insertState({ countryId: JP, name: "Tokyo", code: "JP-13" }))
    ).rejects.toBeInstanceOf(ForeignKeyViolationError);
    expect(fakes.State.create).not.toHaveBeenCalled();
  });

  it("never queries with a malformed parent id", async () => {
    await expect(
      store.transaction((tx) =>
        tx.insertCity({ stateId: "not-an-id", name: "Chiyoda", code: "131016", isActive: true })
      )
    ).rejects.toMatchObject({ field: "stateId", value: "not-an-id" });
    expect(fakes.State.updateOne).not.toHaveBeenCalled();
  });

  it("moves a state's count from the old country to the new one", async () => {
    fakes.State.findById.mockReturnValue(
      query({ _id: TOKYO, countryId: JP, name: "Tokyo", code: "JP-13" })
    );
    fakes.Country.updateOne.mockReturnValue(matched(1));
    fakes.State.findOneAndUpdate.mockReturnValue(
      query({ _id: TOKYO, countryId: US, name: "Tokyo", code: "JP-13" })
    );

    const moved = await store.transaction((tx) => tx.updateState(TOKYO, { countryId: US }));

    expect(moved).toEqual({ id: TOKYO, countryId: US, name: "Tokyo", code: "JP-13" });
    expect(fakes.Country.updateOne.mock.calls.map((c) => c.slice(0, 2))).toEqual([
      [{ _id: US }, { $inc: { stateCount: 1 } }],
      [{ _id: JP }, { $inc: { stateCount: -1 } }],
    ]);
    expect(fakes.State.findOneAndUpdate).toHaveBeenCalledWith(
      { _id: TOKYO },
      { $set: { countryId: US } },
      { new: true, runValidators: true, session: fakes.session }
    );
  });

  it("leaves counters alone when a state keeps its country", async () => {
    fakes.State.findById.mockReturnValue(
      query({ _id: TOKYO, countryId: JP, name: "Tokyo", code: "JP-13" })
    );
    fakes.State.findOneAndUpdate.mockReturnValue(
      query({ _id: TOKYO, countryId: JP, name: "Tōkyō", code: "JP-13" })
    );

    await store.transaction((tx) => tx.updateState(TOKYO, { countryId: JP, name: "Tōkyō" }));
    expect(fakes.Country.updateOne).not.toHaveBeenCalled();
  });

  it("decrements the state's cityCount after deleting a city", async () => {
    fakes.City.findOneAndDelete.mockReturnValue(
      query({ _id: CHIYODA, stateId: TOKYO, name: "Chiyoda", code: "131016", isActive: true })
    );
    fakes.State.updateOne.mockReturnValue(matched(1));

    const city = await store.transaction((tx) => tx.deleteCity(CHIYODA));

    expect(city).toEqual({
      id: CHIYODA,
      stateId: TOKYO,
      name: "Chiyoda",
      code: "131016",
      isActive: true,
    });
    expect(fakes.City.findOneAndDelete).toHaveBeenCalledWith(
      { _id: CHIYODA },
      { session: fakes.session }
    );
    expect(fakes.State.updateOne).toHaveBeenCalledWith(
      { _id: TOKYO },
      { $inc: { cityCount: -1 } },
      { session: fakes.session }
    );
  });

  it("decrements the country's stateCount after deleting a state", async () => {
    fakes.State.findOneAndDelete.mockReturnValue(
      query({ _id: TOKYO, countryId: JP, name: "Tokyo", code: "JP-13" })
    );
    fakes.Country.updateOne.mockReturnValue(matched(1));

    await store.transaction((tx) => tx.deleteState(TOKYO));

    expect(fakes.State.findOneAndDelete).toHaveBeenCalledWith(
      { _id: TOKYO, cityCount: 0 },
      { session: fakes.session }
    );
    expect(fakes.Country.updateOne).toHaveBeenCalledWith(
      { _id: JP },
      { $inc: { stateCount: -1 } },
      { session: fakes.session }
    );
  });
});

describe("restrict on delete", () => {
  it("deletes a country only while its stateCount is 0", async () => {
    fakes.Country.findOneAndDelete.mockReturnValue(query({ _id: JP, name: "Japan", code: "JP" }));

    const country = await store.transaction((tx) => tx.deleteCountry(JP));

    expect(country).toEqual({ id: JP, name: "Japan", code: "JP" });
    expect(fakes.Country.findOneAndDelete).toHaveBeenCalledWith(
      { _id: JP, stateCount: 0 },
      { session: fakes.session }
    );
    expect(fakes.Country.exists).not.toHaveBeenCalled();
  });

  it("raises a restrict violation when the country still exists", async () => {
    fakes.Country.findOneAndDelete.mockReturnValue(query(null));
    const exists = query({ _id: JP });
    fakes.Country.exists.mockReturnValue(exists);

    const err = await store.transaction((tx) => tx.deleteCountry(JP)).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RestrictViolationError);
    expect(err).toMatchObject({ collection: "countries", id: JP, childCollection: "states" });
    expect(fakes.Country.exists).toHaveBeenCalledWith({ _id: JP });
    expect(exists.session).toHaveBeenCalledWith(fakes.session);
  });

  it("returns null when the state is simply absent", async () => {
    fakes.State.findOneAndDelete.mockReturnValue(query(null));
    fakes.State.exists.mockReturnValue(query(null));

    await expect(store.transaction((tx) => tx.deleteState(TOKYO))).resolves.toBeNull();
    expect(fakes.Country.updateOne).not.toHaveBeenCalled();
  });
});

describe("reads", () => {
  it("looks up active cities by code, excluding the given id", async () => {
    const q = query(null);
    fakes.City.findOne.mockReturnValue(q);

    await store.reader.findActiveCityByCode("131016", CHIYODA);
    await store.reader.findActiveCityByCode("131016");

    expect(fakes.City.findOne.mock.calls).toEqual([
      [{ code: "131016", isActive: true, _id: { $ne: CHIYODA } }],
      [{ code: "131016", isActive: true }],
    ]);
    expect(q.session).toHaveBeenCalledWith(null);
  });

  it("hides inactive cities unless asked and pages by _id", async () => {
    const q = query([]);
    fakes.City.find.mockReturnValue(q);

    await store.reader.listCities({ stateId: TOKYO }, { skip: 10, limit: 5 });
    await store.reader.listCities({ includeInactive: true }, { skip: 0, limit: 5 });

    expect(fakes.City.find.mock.calls).toEqual([[{ stateId: TOKYO, isActive: true }], [{}]]);
    expect(q.sort).toHaveBeenCalledWith({ _id: 1 });
    expect(q.skip).toHaveBeenCalledWith(10);
    expect(q.limit).toHaveBeenCalledWith(5);
  });

  it("answers malformed ids without touching the database", async () => {
    expect(await store.reader.findCountryById("nope")).toBeNull();
    expect(await store.reader.listStates({ countryId: "nope" }, { skip: 0, limit: 5 })).toEqual([]);
    expect(await store.reader.countCitiesByState("nope")).toBe(0);
    expect(fakes.Country.findById).not.toHaveBeenCalled();
    expect(fakes.State.find).not.toHaveBeenCalled();
    expect(fakes.City.countDocuments).not.toHaveBeenCalled();
  });
});

describe("lifecycle", () => {
  it("syncs the indexes of every collection", async () => {
    for (const model of [fakes.Country, fakes.State, fakes.City, fakes.EventLog]) {
      model.syncIndexes.mockResolvedValue([]);
    }
    await store.ensureIndexes();
    for (const model of [fakes.Country, fakes.State, fakes.City, fakes.EventLog]) {
      expect(model.syncIndexes).toHaveBeenCalledTimes(1);
    }
  });

  it("is ready while connected and closes the connection", async () => {
    expect(await store.isReady()).toBe(true);
    await store.close();
    expect(fakes.conn.close).toHaveBeenCalledTimes(1);
  });
});
