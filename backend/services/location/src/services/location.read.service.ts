// backend/services/location/src/services/location.read.service.ts
/**
 * Read side: committed state only, no validators, no event rows.
 * Lists are in insertion order.
 */

import type {
  City,
  Country,
  EventLog,
  State,
} from "../../../shared/contracts/location.contract";
import type { Pagination } from "../../../shared/contracts/common";
import { entityNotFound, type EntityNotFound } from "../domain/errors";
import { fail, ok, type Result } from "../domain/result";
import type {
  CityFilter,
  EventLogFilter,
  LocationReader,
  StateFilter,
} from "../repo/location.store.types";

export class LocationReadService {
  constructor(private readonly reader: LocationReader) {}

  public async getCountry(id: string): Promise<Result<Country, EntityNotFound>> {
    const country = await this.reader.findCountryById(id);
    return country ? ok(country) : fail(entityNotFound("Country", id));
  }

  public listCountries(page: Pagination): Promise<Country[]> {
    return this.reader.listCountries(page);
  }

  public async getState(id: string): Promise<Result<State, EntityNotFound>> {
    const state = await this.reader.findStateById(id);
    return state ? ok(state) : fail(entityNotFound("State", id));
  }

  public listStates(filter: StateFilter, page: Pagination): Promise<State[]> {
    return this.reader.listStates(filter, page);
  }

  public async listStatesOfCountry(
    countryId: string,
    page: Pagination
  ): Promise<Result<State[], EntityNotFound>> {
    const country = await this.reader.findCountryById(countryId);
    if (!country) return fail(entityNotFound("Country", countryId));
    return ok(await this.reader.listStates({ countryId }, page));
  }

  /** Inactive cities are reported as absent unless asked for. */
  public async getCity(
    id: string,
    opts: { includeInactive?: boolean } = {}
  ): Promise<Result<City, EntityNotFound>> {
    const city = await this.reader.findCityById(id);
    if (!city || (!city.isActive && !opts.includeInactive)) {
      return fail(entityNotFound("City", id));
    }
    return ok(city);
  }

  public listCities(filter: CityFilter, page: Pagination): Promise<City[]> {
    return this.reader.listCities(filter, page);
  }

  public async listCitiesOfState(
    stateId: string,
    page: Pagination,
    includeInactive = false
  ): Promise<Result<City[], EntityNotFound>> {
    const state = await this.reader.findStateById(stateId);
    if (!state) return fail(entityNotFound("State", stateId));
    return ok(await this.reader.listCities({ stateId, includeInactive }, page));
  }

  public listEventLogs(filter: EventLogFilter, page: Pagination): Promise<EventLog[]> {
    return this.reader.listEventLogs(filter, page);
  }
}
