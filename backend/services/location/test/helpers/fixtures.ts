// backend/services/location/test/helpers/fixtures.ts
import { LocationMemoryStore } from "../../src/repo/memory/location.memory.store";
import { createLocationServices, type LocationServices } from "../../src/app";
import type { RequestInfo } from "../../src/domain/requestInfo";
import type { Result } from "../../src/domain/result";

export interface Harness {
  store: LocationMemoryStore;
  svc: LocationServices;
}

export function makeHarness(): Harness {
  const store = new LocationMemoryStore();
  return { store, svc: createLocationServices(store) };
}

export function reqInfo(overrides: Partial<RequestInfo> = {}): RequestInfo {
  return {
    method: "POST",
    path: "/test",
    body: null,
    ipAddress: "127.0.0.1",
    userId: "tester",
    statusCode: 201,
    ...overrides,
  };
}

/** Unwrap a successful Result or fail the test with the error. */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) {
    throw new Error(`expected ok, got ${JSON.stringify(result.error)}`);
  }
  return result.value;
}

export const page = (skip = 0, limit = 100) => ({ skip, limit });

/** Seed Japan → Tokyo → Chiyoda (all active). */
export async function seedJapan(h: Harness) {
  const country = unwrap(await h.svc.countries.create({ name: "Japan", code: "JP" }, reqInfo()));
  const state = unwrap(
    await h.svc.states.create(
      { countryId: country.id, name: "Tokyo", code: "JP-13" },
      reqInfo()
    )
  );
  const city = unwrap(
    await h.svc.cities.create(
      { stateId: state.id, name: "Chiyoda", code: "131016" },
      reqInfo()
    )
  );
  return { country, state, city };
}
