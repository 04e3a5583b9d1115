// backend/services/location/src/services/location.unitOfWork.ts
/**
 * Purpose:
 * - One write operation = one store transaction = one entity change + one
 *   event-log row. Either both commit or neither does.
 *
 * Flow:
 * - `work(tx)` runs the validators and, if they pass, the mutation. A failed
 *   validator aborts the transaction (nothing written) and its DomainError is
 *   returned as-is.
 * - After the mutation the event-log row is appended on the same `tx`.
 * - Storage errors raised during the work or the commit are translated once,
 *   here, so every write operation reports them the same way.
 * - A write conflict (another transaction won the race) re-runs `work` in
 *   validate-only mode against committed state; its DomainError is returned
 *   if the validators now fail, otherwise the conflict is unexpected.
 *
 * No retries: a failed transaction is reported, never replayed.
 */

import { randomUUID } from "crypto";
import type { EntityType, EventType } from "../../../shared/contracts/location.contract";
import { parseDuplicateKey } from "../../../shared/persistence/dupeKeyError";
import { isWriteConflict } from "../../../shared/persistence/writeConflict";
import type { Pagination } from "../../../shared/contracts/common";
import { logger as rootLogger, type Logger } from "../../../shared/utils/logger";
import {
  ForeignKeyViolationError,
  INDEX_CITY_CODE_ACTIVE,
  INDEX_COUNTRY_CODE,
  INDEX_STATE_CODE,
  RestrictViolationError,
  type CityFilter,
  type EventLogFilter,
  type LocationReader,
  type LocationStore,
  type LocationTx,
  type StateFilter,
} from "../repo/location.store.types";
import {
  duplicateCode,
  entityNotFound,
  restrictedDeletion,
  unexpectedStorageError,
  type DomainError,
  type EntityLabel,
} from "../domain/errors";
import type { RequestInfo } from "../domain/requestInfo";
import { fail, ok, type Result } from "../domain/result";

/** What a successful unit of work changed, for the event-log row. */
export interface Mutation<T> {
  entity: T;
  entityId: string;
  eventType: EventType;
}

export interface WriteContext {
  /** e.g. "country.create"; used in logs only */
  operation: string;
  entityType: EntityType;
  requestInfo: RequestInfo;
  /** Caller input, logged with unexpected failures */
  input?: unknown;
}

export type WorkResult<T> = Result<Mutation<T>, DomainError>;

/** Successful work outcome; `entityId` defaults to the entity's own id. */
export function applied<T extends { id: string }>(
  eventType: EventType,
  entity: T,
  entityId: string = entity.id
): WorkResult<T> {
  return ok({ entity, entityId, eventType });
}

/** Carries a validator failure out of the transaction so it rolls back. */
class RejectedWork extends Error {
  constructor(public readonly domainError: DomainError) {
    super(domainError.kind);
    this.name = "RejectedWork";
  }
}

/** Raised by ValidationOnlyTx once work gets past its validators. */
class ValidationPassed extends Error {
  constructor() {
    super("validation passed");
    this.name = "ValidationPassed";
  }
}

/** Committed-state reads; the first write stops the work. */
class ValidationOnlyTx implements LocationTx {
  constructor(private readonly reader: LocationReader) {}

  findCountryById(id: string) {
    return this.reader.findCountryById(id);
  }
  findCountryByCode(code: string, excludeId?: string) {
    return this.reader.findCountryByCode(code, excludeId);
  }
  listCountries(page: Pagination) {
    return this.reader.listCountries(page);
  }
  findStateById(id: string) {
    return this.reader.findStateById(id);
  }
  findStateByCode(code: string, excludeId?: string) {
    return this.reader.findStateByCode(code, excludeId);
  }
  listStates(filter: StateFilter, page: Pagination) {
    return this.reader.listStates(filter, page);
  }
  countStatesByCountry(countryId: string) {
    return this.reader.countStatesByCountry(countryId);
  }
  findCityById(id: string) {
    return this.reader.findCityById(id);
  }
  findActiveCityByCode(code: string, excludeId?: string) {
    return this.reader.findActiveCityByCode(code, excludeId);
  }
  listCities(filter: CityFilter, page: Pagination) {
    return this.reader.listCities(filter, page);
  }
  countCitiesByState(stateId: string) {
    return this.reader.countCitiesByState(stateId);
  }
  listEventLogs(filter: EventLogFilter, page: Pagination) {
    return this.reader.listEventLogs(filter, page);
  }

  private async stop(): Promise<never> {
    throw new ValidationPassed();
  }

  insertCountry() {
    return this.stop();
  }
  updateCountry() {
    return this.stop();
  }
  deleteCountry() {
    return this.stop();
  }
  insertState() {
    return this.stop();
  }
  updateState() {
    return this.stop();
  }
  deleteState() {
    return this.stop();
  }
  insertCity() {
    return this.stop();
  }
  updateCity() {
    return this.stop();
  }
  deleteCity() {
    return this.stop();
  }
  appendEventLog() {
    return this.stop();
  }
}

const LABEL_BY_INDEX: Record<string, EntityLabel> = {
  [INDEX_COUNTRY_CODE]: "Country",
  [INDEX_STATE_CODE]: "State",
  [INDEX_CITY_CODE_ACTIVE]: "Active city",
};

export class LocationUnitOfWork {
  private readonly log: Logger;

  constructor(
    private readonly store: LocationStore,
    opts: { logger?: Logger } = {}
  ) {
    this.log = opts.logger ?? rootLogger;
  }

  public async run<T>(
    ctx: WriteContext,
    work: (tx: LocationTx) => Promise<WorkResult<T>>
  ): Promise<Result<T, DomainError>> {
    this.log.debug(
      { operation: ctx.operation, path: ctx.requestInfo.path },
      "[location.uow] enter"
    );

    try {
      const entity = await this.store.transaction(async (tx) => {
        const outcome = await work(tx);
        if (!outcome.ok) throw new RejectedWork(outcome.error);

        const info = ctx.requestInfo;
        await tx.appendEventLog({
          eventType: outcome.value.eventType,
          entityType: ctx.entityType,
          entityId: outcome.value.entityId,
          requestMethod: info.method,
          requestPath: info.path,
          requestBody: info.body ?? null,
          userId: info.userId ?? null,
          ipAddress: info.ipAddress ?? null,
          statusCode: info.statusCode ?? null,
          processingStatus: "completed",
          processedAt: null,
        });
        return outcome.value.entity;
      });

      this.log.debug({ operation: ctx.operation }, "[location.uow] committed");
      return ok(entity);
    } catch (err) {
      if (err instanceof RejectedWork) {
        this.log.debug(
          { operation: ctx.operation, error: err.domainError },
          "[location.uow] rejected"
        );
        return fail(err.domainError);
      }
      if (isWriteConflict(err)) {
        const rejected = await this.revalidate(ctx, work);
        if (rejected) return fail(rejected);
      }
      return fail(this.translate(err, ctx));
    }
  }

  /** Re-run `work` against committed state; its DomainError, or null once it would write. */
  private async revalidate<T>(
    ctx: WriteContext,
    work: (tx: LocationTx) => Promise<WorkResult<T>>
  ): Promise<DomainError | null> {
    try {
      const outcome = await work(new ValidationOnlyTx(this.store.reader));
      if (outcome.ok) return null;
      this.log.info(
        { operation: ctx.operation, error: outcome.error },
        "[location.uow] write conflict resolved by revalidation"
      );
      return outcome.error;
    } catch (err) {
      if (!(err instanceof ValidationPassed)) {
        this.log.warn({ err, operation: ctx.operation }, "[location.uow] revalidation failed");
      }
      return null;
    }
  }

  /** Storage error → DomainError. Unknown failures get an incident id. */
  private translate(err: unknown, ctx: WriteContext): DomainError {
    const dup = parseDuplicateKey(err);
    if (dup) {
      const label = dup.index ? LABEL_BY_INDEX[dup.index] : undefined;
      const code = dup.key?.code;
      if (label && typeof code === "string") {
        this.log.info(
          { operation: ctx.operation, index: dup.index, code },
          "[location.uow] duplicate key at commit"
        );
        return duplicateCode(label, code);
      }
    }

    if (err instanceof ForeignKeyViolationError) {
      return entityNotFound(err.field === "countryId" ? "Country" : "State", err.value);
    }

    if (err instanceof RestrictViolationError) {
      return restrictedDeletion(
        err.collection === "countries" ? "Country" : "State",
        err.id,
        err.childCollection
      );
    }

    const incidentId = randomUUID();
    this.log.error(
      {
        err,
        incidentId,
        operation: ctx.operation,
        entityType: ctx.entityType,
        input: ctx.input,
        method: ctx.requestInfo.method,
        path: ctx.requestInfo.path,
      },
      "[location.uow] unexpected storage error"
    );
    return unexpectedStorageError(incidentId);
  }
}
