// backend/services/location/test/writeServices.spec.ts
import { describe, it, expect, beforeEach } from "vitest";
import { createLocationServices } from "../src/app";
import { describeDomainError } from "../src/domain/errors";
import {
  ForeignKeyViolationError,
  RestrictViolationError,
  type LocationTx,
} from "../src/repo/location.store.types";
import { LocationMemoryStore } from "../src/repo/memory/location.memory.store";
import { WriteConflictError } from "../../shared/persistence/writeConflict";
import { makeHarness, page, reqInfo, seedJapan, unwrap, type Harness } from "./helpers/fixtures";

const MISSING_ID = "0123456789abcdef01234567";

let h: Harness;

beforeEach(() => {
  h = makeHarness();
});

async function eventLogs() {
  return h.store.reader.listEventLogs({}, page());
}

/**
 * The next transaction does its work, then a rival commits and the first one
 * fails with a write conflict, the way a losing Mongo session does.
 */
class RivalCommitStore extends LocationMemoryStore {
  private rival: (() => Promise<unknown>) | null = null;

  loseNextTo(rival: () => Promise<unknown>): void {
    this.rival = rival;
  }

  public async transaction<T>(work: (tx: LocationTx) => Promise<T>): Promise<T> {
    const rival = this.rival;
    if (!rival) return super.transaction(work);
    this.rival = null;
    return super.transaction(async (tx) => {
      await work(tx);
      await rival();
      throw new WriteConflictError();
    });
  }
}

describe("create", () => {
  it("returns the input plus a generated id, readable afterwards", async () => {
    const { country, state, city } = await seedJapan(h);

    expect(country).toEqual({ id: expect.stringMatching(/^[a-f0-9]{24}$/), name: "Japan", code: "JP" });
    expect(unwrap(await h.svc.read.getCountry(country.id))).toEqual(country);
    expect(unwrap(await h.svc.read.getState(state.id))).toEqual({
      id: state.id,
      countryId: country.id,
      name: "Tokyo",
      code: "JP-13",
    });
    expect(unwrap(await h.svc.read.getCity(city.id))).toEqual({
      id: city.id,
      stateId: state.id,
      name: "Chiyoda",
      code: "131016",
      isActive: true,
    });
  });

  it("writes exactly one event row per mutation, stamped with the request metadata", async () => {
    const { country, state, city } = await seedJapan(h);
    const logs = await eventLogs();

    expect(logs.map((l) => [l.entityType, l.entityId, l.eventType])).toEqual([
      ["country", country.id, "CREATE"],
      ["state", state.id, "CREATE"],
      ["city", city.id, "CREATE"],
    ]);
    expect(logs[0]).toMatchObject({
      requestMethod: "POST",
      requestPath: "/test",
      requestBody: null,
      userId: "tester",
      ipAddress: "127.0.0.1",
      statusCode: 201,
      processingStatus: "completed",
      processedAt: null,
    });
    expect(logs[0].createdAt).toBeInstanceOf(Date);
  });

  it("treats country codes case-insensitively (JP then jp)", async () => {
    unwrap(await h.svc.countries.create({ name: "Japan", code: "JP" }, reqInfo()));
    const second = await h.svc.countries.create({ name: "Japan again", code: "jp" }, reqInfo());

    expect(second).toEqual({
      ok: false,
      error: { kind: "DuplicateCode", entityType: "Country", code: "JP" },
    });
    expect(second.ok ? "" : describeDomainError(second.error)).toBe(
      "Country with code 'JP' already exists"
    );
    expect(await eventLogs()).toHaveLength(1);
  });

  it("rejects a state whose country does not exist", async () => {
    const res = await h.svc.states.create(
      { countryId: MISSING_ID, name: "Nowhere", code: "XX-1" },
      reqInfo()
    );
    expect(res).toEqual({
      ok: false,
      error: { kind: "EntityNotFound", entityType: "Country", id: MISSING_ID },
    });
    expect(await eventLogs()).toHaveLength(0);
  });

  it("rejects a duplicate state code", async () => {
    const { country } = await seedJapan(h);
    const res = await h.svc.states.create(
      { countryId: country.id, name: "Tokyo 2", code: "jp-13" },
      reqInfo()
    );
    expect(res).toEqual({
      ok: false,
      error: { kind: "DuplicateCode", entityType: "State", code: "JP-13" },
    });
  });

  it("rejects a city whose state does not exist", async () => {
    const res = await h.svc.cities.create(
      { stateId: MISSING_ID, name: "Ghost", code: "999999" },
      reqInfo()
    );
    expect(res).toEqual({
      ok: false,
      error: { kind: "EntityNotFound", entityType: "State", id: MISSING_ID },
    });
  });
});

describe("active city code rule", () => {
  it("rejects a second active city with the same code", async () => {
    const { state } = await seedJapan(h);
    const res = await h.svc.cities.create(
      { stateId: state.id, name: "Chiyoda 2", code: "131016" },
      reqInfo()
    );
    expect(res).toEqual({
      ok: false,
      error: { kind: "DuplicateCode", entityType: "Active city", code: "131016" },
    });
    expect(res.ok ? "" : describeDomainError(res.error)).toBe(
      "Active city with code '131016' already exists"
    );
  });

  it("allows an inactive city to share an active city's code", async () => {
    const { state } = await seedJapan(h);
    const old = unwrap(
      await h.svc.cities.create(
        { stateId: state.id, name: "Old Chiyoda", code: "131016", isActive: false },
        reqInfo()
      )
    );
    expect(old.isActive).toBe(false);
  });

  it("refuses to activate an inactive city whose code is taken", async () => {
    const { state } = await seedJapan(h);
    const old = unwrap(
      await h.svc.cities.create(
        { stateId: state.id, name: "Old Chiyoda", code: "131016", isActive: false },
        reqInfo()
      )
    );

    const res = await h.svc.cities.update(
      old.id,
      { isActive: true },
      reqInfo({ method: "PATCH", statusCode: 200 }),
      { includeInactive: true }
    );
    expect(res).toEqual({
      ok: false,
      error: { kind: "DuplicateCode", entityType: "Active city", code: "131016" },
    });
  });

  it("frees the code once the holder is deactivated", async () => {
    const { state, city } = await seedJapan(h);
    unwrap(await h.svc.cities.update(city.id, { isActive: false }, reqInfo()));

    const successor = unwrap(
      await h.svc.cities.create(
        { stateId: state.id, name: "New Chiyoda", code: "131016" },
        reqInfo()
      )
    );
    expect(successor.isActive).toBe(true);
  });

  it("targets only active cities unless includeInactive is set", async () => {
    const { city } = await seedJapan(h);
    unwrap(await h.svc.cities.update(city.id, { isActive: false }, reqInfo()));

    const hidden = await h.svc.cities.update(city.id, { name: "Renamed" }, reqInfo());
    expect(hidden).toEqual({
      ok: false,
      error: { kind: "EntityNotFound", entityType: "City", id: city.id },
    });

    const renamed = unwrap(
      await h.svc.cities.update(city.id, { name: "Renamed" }, reqInfo(), {
        includeInactive: true,
      })
    );
    expect(renamed).toMatchObject({ name: "Renamed", isActive: false });

    expect(await h.svc.cities.delete(city.id, reqInfo())).toEqual({
      ok: false,
      error: { kind: "EntityNotFound", entityType: "City", id: city.id },
    });
    expect(
      unwrap(await h.svc.cities.delete(city.id, reqInfo(), { includeInactive: true })).id
    ).toBe(city.id);
  });
});

describe("update", () => {
  it("changes only the supplied fields and logs one UPDATE", async () => {
    const { country } = await seedJapan(h);
    const updated = unwrap(
      await h.svc.countries.update(country.id, { name: "Nippon" }, reqInfo({ method: "PATCH" }))
    );
    expect(updated).toEqual({ id: country.id, name: "Nippon", code: "JP" });

    const logs = await h.store.reader.listEventLogs({ eventType: "UPDATE" }, page());
    expect(logs).toHaveLength(1);
    expect(logs[0]).toMatchObject({ entityType: "country", entityId: country.id, requestMethod: "PATCH" });
  });

  it("does not re-check uniqueness when the code is unchanged", async () => {
    const { country } = await seedJapan(h);
    const res = await h.svc.countries.update(country.id, { code: "jp" }, reqInfo());
    expect(unwrap(res).code).toBe("JP");
  });

  it("rejects a code already held by another country", async () => {
    await seedJapan(h);
    const us = unwrap(await h.svc.countries.create({ name: "United States", code: "US" }, reqInfo()));
    expect(await h.svc.countries.update(us.id, { code: "JP" }, reqInfo())).toEqual({
      ok: false,
      error: { kind: "DuplicateCode", entityType: "Country", code: "JP" },
    });
  });

  it("reports a missing target", async () => {
    expect(await h.svc.countries.update(MISSING_ID, { name: "X" }, reqInfo())).toEqual({
      ok: false,
      error: { kind: "EntityNotFound", entityType: "Country", id: MISSING_ID },
    });
  });

  it("moves a state to another existing country", async () => {
    const { country, state } = await seedJapan(h);
    const us = unwrap(await h.svc.countries.create({ name: "United States", code: "US" }, reqInfo()));

    const moved = unwrap(await h.svc.states.update(state.id, { countryId: us.id }, reqInfo()));
    expect(moved.countryId).toBe(us.id);

    // Japan has no states left, so it can go.
    expect(unwrap(await h.svc.countries.delete(country.id, reqInfo())).id).toBe(country.id);
  });

  it("rejects moving a state to a missing country", async () => {
    const { state } = await seedJapan(h);
    expect(await h.svc.states.update(state.id, { countryId: MISSING_ID }, reqInfo())).toEqual({
      ok: false,
      error: { kind: "EntityNotFound", entityType: "Country", id: MISSING_ID },
    });
  });
});

describe("delete", () => {
  it("refuses to delete a country that still has states, without logging", async () => {
    const { country } = await seedJapan(h);
    const res = await h.svc.countries.delete(country.id, reqInfo({ method: "DELETE" }));

    expect(res).toEqual({
      ok: false,
      error: {
        kind: "RestrictedDeletion",
        entityType: "Country",
        id: country.id,
        blockingChildType: "states",
      },
    });
    expect(res.ok ? "" : describeDomainError(res.error)).toBe(
      "Cannot delete country with existing states"
    );
    expect(await h.store.reader.listEventLogs({ eventType: "DELETE" }, page())).toEqual([]);
  });

  it("refuses to delete a state with only inactive cities", async () => {
    const { state, city } = await seedJapan(h);
    unwrap(await h.svc.cities.update(city.id, { isActive: false }, reqInfo()));

    expect(await h.svc.states.delete(state.id, reqInfo())).toEqual({
      ok: false,
      error: {
        kind: "RestrictedDeletion",
        entityType: "State",
        id: state.id,
        blockingChildType: "cities",
      },
    });
  });

  it("removes bottom-up and logs a DELETE with the captured id", async () => {
    const { country, state, city } = await seedJapan(h);

    expect(unwrap(await h.svc.cities.delete(city.id, reqInfo())).id).toBe(city.id);
    expect(unwrap(await h.svc.states.delete(state.id, reqInfo())).id).toBe(state.id);
    expect(unwrap(await h.svc.countries.delete(country.id, reqInfo())).id).toBe(country.id);

    const deletes = await h.store.reader.listEventLogs({ eventType: "DELETE" }, page());
    expect(deletes.map((l) => [l.entityType, l.entityId])).toEqual([
      ["city", city.id],
      ["state", state.id],
      ["country", country.id],
    ]);
    expect(await h.svc.read.getCountry(country.id)).toEqual({
      ok: false,
      error: { kind: "EntityNotFound", entityType: "Country", id: country.id },
    });
  });
});

describe("storage failures", () => {
  it("maps a commit-time uniqueness race to DuplicateCode; one writer wins", async () => {
    const [a, b] = await Promise.all([
      h.svc.countries.create({ name: "Japan", code: "JP" }, reqInfo()),
      h.svc.countries.create({ name: "Japan (dup)", code: "JP" }, reqInfo()),
    ]);

    const failures = [a, b].filter((r) => !r.ok);
    expect([a, b].filter((r) => r.ok)).toHaveLength(1);
    expect(failures).toEqual([
      { ok: false, error: { kind: "DuplicateCode", entityType: "Country", code: "JP" } },
    ]);
    expect(await h.svc.read.listCountries(page())).toHaveLength(1);
    expect(await eventLogs()).toHaveLength(1);
  });

  it("maps an active-city race to DuplicateCode", async () => {
    const { state } = await seedJapan(h);
    const [a, b] = await Promise.all([
      h.svc.cities.create({ stateId: state.id, name: "A", code: "131024" }, reqInfo()),
      h.svc.cities.create({ stateId: state.id, name: "B", code: "131024" }, reqInfo()),
    ]);
    expect([a, b].filter((r) => !r.ok)).toEqual([
      { ok: false, error: { kind: "DuplicateCode", entityType: "Active city", code: "131024" } },
    ]);
  });

  it("translates a raw E11000 error from the driver", async () => {
    const { state } = await seedJapan(h);
    h.store.failNext(
      "insertCity",
      Object.assign(
        new Error(
          'E11000 duplicate key error collection: location.cities index: uq_city_code_active dup key: { code: "131032" }'
        ),
        { code: 11000 }
      )
    );
    const res = await h.svc.cities.create({ stateId: state.id, name: "C", code: "131032" }, reqInfo());
    expect(res).toEqual({
      ok: false,
      error: { kind: "DuplicateCode", entityType: "Active city", code: "131032" },
    });
  });

  it("translates foreign-key and restrict violations", async () => {
    const { country, state } = await seedJapan(h);

    h.store.failNext("insertState", new ForeignKeyViolationError("states", "countryId", country.id));
    expect(
      await h.svc.states.create({ countryId: country.id, name: "Osaka", code: "JP-27" }, reqInfo())
    ).toEqual({
      ok: false,
      error: { kind: "EntityNotFound", entityType: "Country", id: country.id },
    });

    const empty = unwrap(
      await h.svc.states.create({ countryId: country.id, name: "Kyoto", code: "JP-26" }, reqInfo())
    );
    h.store.failNext("deleteState", new RestrictViolationError("states", empty.id, "cities"));
    expect(await h.svc.states.delete(empty.id, reqInfo())).toEqual({
      ok: false,
      error: { kind: "RestrictedDeletion", entityType: "State", id: empty.id, blockingChildType: "cities" },
    });

    expect(unwrap(await h.svc.read.getState(state.id)).id).toBe(state.id);
  });

  it("lets only one of two concurrent deletes commit", async () => {
    const { city } = await seedJapan(h);
    const results = await Promise.all([
      h.svc.cities.delete(city.id, reqInfo({ method: "DELETE" })),
      h.svc.cities.delete(city.id, reqInfo({ method: "DELETE" })),
    ]);

    expect(results.filter((r) => r.ok)).toEqual([{ ok: true, value: city }]);
    expect(results.filter((r) => !r.ok)).toEqual([
      { ok: false, error: { kind: "EntityNotFound", entityType: "City", id: city.id } },
    ]);
    expect(await h.store.reader.listEventLogs({ eventType: "DELETE" }, page())).toHaveLength(1);
  });

  it("logs no UPDATE for a city deleted underneath the update", async () => {
    const { city } = await seedJapan(h);
    const [removed, renamed] = await Promise.all([
      h.svc.cities.delete(city.id, reqInfo()),
      h.svc.cities.update(city.id, { name: "Ghost" }, reqInfo()),
    ]);

    expect(removed.ok).toBe(true);
    expect(renamed).toEqual({
      ok: false,
      error: { kind: "EntityNotFound", entityType: "City", id: city.id },
    });
    expect(await h.store.reader.listEventLogs({ eventType: "UPDATE" }, page())).toEqual([]);
  });

  it("re-checks a lost write conflict against committed state (duplicate code)", async () => {
    const store = new RivalCommitStore();
    const svc = createLocationServices(store);
    store.loseNextTo(() => svc.countries.create({ name: "Nippon", code: "JP" }, reqInfo()));

    const res = await svc.countries.create({ name: "Japan", code: "jp" }, reqInfo());

    expect(res).toEqual({
      ok: false,
      error: { kind: "DuplicateCode", entityType: "Country", code: "JP" },
    });
    expect(await svc.read.listCountries(page())).toEqual([
      { id: expect.any(String), name: "Nippon", code: "JP" },
    ]);
    expect(await store.reader.listEventLogs({}, page())).toHaveLength(1);
  });

  it("re-checks a lost write conflict against committed state (parent gone)", async () => {
    const store = new RivalCommitStore();
    const svc = createLocationServices(store);
    const country = unwrap(await svc.countries.create({ name: "Japan", code: "JP" }, reqInfo()));
    store.loseNextTo(() => svc.countries.delete(country.id, reqInfo()));

    const res = await svc.states.create(
      { countryId: country.id, name: "Tokyo", code: "JP-13" },
      reqInfo()
    );

    expect(res).toEqual({
      ok: false,
      error: { kind: "EntityNotFound", entityType: "Country", id: country.id },
    });
    expect(await store.reader.listStates({}, page())).toEqual([]);
  });

  it("reports a write conflict the validators cannot explain as unexpected", async () => {
    h.store.failNext("insertCountry", Object.assign(new Error("WriteConflict"), { code: 112 }));
    const res = await h.svc.countries.create({ name: "Japan", code: "JP" }, reqInfo());

    expect(res).toEqual({
      ok: false,
      error: { kind: "UnexpectedStorageError", incidentId: expect.any(String) },
    });
    expect(await eventLogs()).toEqual([]);
  });

  it("maps an unknown failure to UnexpectedStorageError and leaves nothing behind", async () => {
    h.store.failNext("appendEventLog", new Error("disk full"));
    const res = await h.svc.countries.create({ name: "Japan", code: "JP" }, reqInfo());

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error).toEqual({
      kind: "UnexpectedStorageError",
      incidentId: expect.stringMatching(/^[0-9a-f-]{36}$/),
    });
    expect(describeDomainError(res.error)).toBe("An unexpected error occurred");
    expect(await h.svc.read.listCountries(page())).toEqual([]);
    expect(await eventLogs()).toEqual([]);
  });
});
