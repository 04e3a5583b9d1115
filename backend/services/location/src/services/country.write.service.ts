// backend/services/location/src/services/country.write.service.ts
import type { Country } from "../../../shared/contracts/location.contract";
import { entityNotFound, type DomainError } from "../domain/errors";
import type { RequestInfo } from "../domain/requestInfo";
import { fail, type Result } from "../domain/result";
import {
  validateCodeUnique,
  validateNoChildren,
} from "../domain/validators/location.validators";
import { applied, type LocationUnitOfWork, type WorkResult } from "./location.unitOfWork";

export interface CountryCreateInput {
  name: string;
  code: string;
}

export interface CountryUpdateInput {
  name?: string;
  code?: string;
}

export class CountryWriteService {
  constructor(private readonly uow: LocationUnitOfWork) {}

  public create(
    input: CountryCreateInput,
    requestInfo: RequestInfo
  ): Promise<Result<Country, DomainError>> {
    const code = input.code.toUpperCase();
    return this.uow.run(
      { operation: "country.create", entityType: "country", requestInfo, input },
      async (tx): Promise<WorkResult<Country>> => {
        const dup = await validateCodeUnique(tx, "Country", code);
        if (dup) return fail(dup);

        const country = await tx.insertCountry({ name: input.name, code });
        return applied("CREATE", country);
      }
    );
  }

  public update(
    id: string,
    patch: CountryUpdateInput,
    requestInfo: RequestInfo
  ): Promise<Result<Country, DomainError>> {
    const code = patch.code?.toUpperCase();
    return this.uow.run(
      { operation: "country.update", entityType: "country", requestInfo, input: patch },
      async (tx): Promise<WorkResult<Country>> => {
        const current = await tx.findCountryById(id);
        if (!current) return fail(entityNotFound("Country", id));

        if (code !== undefined && code !== current.code) {
          const dup = await validateCodeUnique(tx, "Country", code, id);
          if (dup) return fail(dup);
        }

        const updated = await tx.updateCountry(id, { name: patch.name, code });
        if (!updated) return fail(entityNotFound("Country", id));
        return applied("UPDATE", updated);
      }
    );
  }

  /** Refused while any state still references the country. */
  public delete(
    id: string,
    requestInfo: RequestInfo
  ): Promise<Result<Country, DomainError>> {
    return this.uow.run(
      { operation: "country.delete", entityType: "country", requestInfo, input: { id } },
      async (tx): Promise<WorkResult<Country>> => {
        const current = await tx.findCountryById(id);
        if (!current) return fail(entityNotFound("Country", id));

        const blocked = await validateNoChildren(tx, "Country", id);
        if (blocked) return fail(blocked);

        const deleted = await tx.deleteCountry(id);
        if (!deleted) return fail(entityNotFound("Country", id));
        return applied("DELETE", deleted, current.id);
      }
    );
  }
}
