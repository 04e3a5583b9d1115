// backend/services/location/src/services/city.write.service.ts
import type { City } from "../../../shared/contracts/location.contract";
import { entityNotFound, type DomainError } from "../domain/errors";
import type { RequestInfo } from "../domain/requestInfo";
import { fail, type Result } from "../domain/result";
import {
  validateActiveCityCodeUnique,
  validateParentExists,
} from "../domain/validators/location.validators";
import type { LocationTx } from "../repo/location.store.types";
import { applied, type LocationUnitOfWork, type WorkResult } from "./location.unitOfWork";

export interface CityCreateInput {
  stateId: string;
  name: string;
  code: string;
  isActive?: boolean;
}

/** A city never changes state; only these fields are patchable. */
export interface CityUpdateInput {
  name?: string;
  code?: string;
  isActive?: boolean;
}

export interface CityTargetOptions {
  /** Allow update/delete of an inactive city. */
  includeInactive?: boolean;
}

async function findTarget(
  tx: LocationTx,
  id: string,
  opts: CityTargetOptions
): Promise<City | null> {
  const city = await tx.findCityById(id);
  if (!city) return null;
  return city.isActive || opts.includeInactive ? city : null;
}

export class CityWriteService {
  constructor(private readonly uow: LocationUnitOfWork) {}

  public create(
    input: CityCreateInput,
    requestInfo: RequestInfo
  ): Promise<Result<City, DomainError>> {
    const isActive = input.isActive ?? true;
    return this.uow.run(
      { operation: "city.create", entityType: "city", requestInfo, input },
      async (tx): Promise<WorkResult<City>> => {
        const missing = await validateParentExists(tx, "State", input.stateId);
        if (missing) return fail(missing);

        if (isActive) {
          const dup = await validateActiveCityCodeUnique(tx, input.code);
          if (dup) return fail(dup);
        }

        const city = await tx.insertCity({
          stateId: input.stateId,
          name: input.name,
          code: input.code,
          isActive,
        });
        return applied("CREATE", city);
      }
    );
  }

  public update(
    id: string,
    patch: CityUpdateInput,
    requestInfo: RequestInfo,
    opts: CityTargetOptions = {}
  ): Promise<Result<City, DomainError>> {
    return this.uow.run(
      { operation: "city.update", entityType: "city", requestInfo, input: patch },
      async (tx): Promise<WorkResult<City>> => {
        const current = await findTarget(tx, id, opts);
        if (!current) return fail(entityNotFound("City", id));

        // Checked against the resulting (code, isActive) pair.
        const nextCode = patch.code ?? current.code;
        const nextActive = patch.isActive ?? current.isActive;
        if (nextActive && (nextCode !== current.code || !current.isActive)) {
          const dup = await validateActiveCityCodeUnique(tx, nextCode, id);
          if (dup) return fail(dup);
        }

        const updated = await tx.updateCity(id, {
          name: patch.name,
          code: patch.code,
          isActive: patch.isActive,
        });
        if (!updated) return fail(entityNotFound("City", id));
        return applied("UPDATE", updated);
      }
    );
  }

  /** Physical removal, independent of activity. */
  public delete(
    id: string,
    requestInfo: RequestInfo,
    opts: CityTargetOptions = {}
  ): Promise<Result<City, DomainError>> {
    return this.uow.run(
      { operation: "city.delete", entityType: "city", requestInfo, input: { id } },
      async (tx): Promise<WorkResult<City>> => {
        const current = await findTarget(tx, id, opts);
        if (!current) return fail(entityNotFound("City", id));

        const deleted = await tx.deleteCity(id);
        if (!deleted) return fail(entityNotFound("City", id));
        return applied("DELETE", deleted, current.id);
      }
    );
  }
}
