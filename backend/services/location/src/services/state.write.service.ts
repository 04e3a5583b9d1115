// backend/services/location/src/services/state.write.service.ts
import type { State } from "../../../shared/contracts/location.contract";
import { entityNotFound, type DomainError } from "../domain/errors";
import type { RequestInfo } from "../domain/requestInfo";
import { fail, type Result } from "../domain/result";
import {
  validateCodeUnique,
  validateNoChildren,
  validateParentExists,
} from "../domain/validators/location.validators";
import { applied, type LocationUnitOfWork, type WorkResult } from "./location.unitOfWork";

export interface StateCreateInput {
  countryId: string;
  name: string;
  code: string;
}

export interface StateUpdateInput {
  countryId?: string;
  name?: string;
  code?: string;
}

export class StateWriteService {
  constructor(private readonly uow: LocationUnitOfWork) {}

  public create(
    input: StateCreateInput,
    requestInfo: RequestInfo
  ): Promise<Result<State, DomainError>> {
    const code = input.code.toUpperCase();
    return this.uow.run(
      { operation: "state.create", entityType: "state", requestInfo, input },
      async (tx): Promise<WorkResult<State>> => {
        const missing = await validateParentExists(tx, "Country", input.countryId);
        if (missing) return fail(missing);

        const dup = await validateCodeUnique(tx, "State", code);
        if (dup) return fail(dup);

        const state = await tx.insertState({
          countryId: input.countryId,
          name: input.name,
          code,
        });
        return applied("CREATE", state);
      }
    );
  }

  /** A state may move to another country; the new parent must exist. */
  public update(
    id: string,
    patch: StateUpdateInput,
    requestInfo: RequestInfo
  ): Promise<Result<State, DomainError>> {
    const code = patch.code?.toUpperCase();
    return this.uow.run(
      { operation: "state.update", entityType: "state", requestInfo, input: patch },
      async (tx): Promise<WorkResult<State>> => {
        const current = await tx.findStateById(id);
        if (!current) return fail(entityNotFound("State", id));

        if (patch.countryId !== undefined && patch.countryId !== current.countryId) {
          const missing = await validateParentExists(tx, "Country", patch.countryId);
          if (missing) return fail(missing);
        }

        if (code !== undefined && code !== current.code) {
          const dup = await validateCodeUnique(tx, "State", code, id);
          if (dup) return fail(dup);
        }

        const updated = await tx.updateState(id, {
          countryId: patch.countryId,
          name: patch.name,
          code,
        });
        if (!updated) return fail(entityNotFound("State", id));
        return applied("UPDATE", updated);
      }
    );
  }

  /** Refused while any city (active or not) still references the state. */
  public delete(
    id: string,
    requestInfo: RequestInfo
  ): Promise<Result<State, DomainError>> {
    return this.uow.run(
      { operation: "state.delete", entityType: "state", requestInfo, input: { id } },
      async (tx): Promise<WorkResult<State>> => {
        const current = await tx.findStateById(id);
        if (!current) return fail(entityNotFound("State", id));

        const blocked = await validateNoChildren(tx, "State", id);
        if (blocked) return fail(blocked);

        const deleted = await tx.deleteState(id);
        if (!deleted) return fail(entityNotFound("State", id));
        return applied("DELETE", deleted, current.id);
      }
    );
  }
}
