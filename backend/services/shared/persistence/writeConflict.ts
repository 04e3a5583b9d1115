// backend/services/shared/persistence/writeConflict.ts
/**
 * Purpose:
 * - Recognize a transaction that lost a write race (Mongo WriteConflict,
 *   code 112, labelled TransientTransactionError).
 * - Provide a WriteConflictError of the same shape for the in-memory store.
 */

export const WRITE_CONFLICT_CODE = 112;
export const TRANSIENT_TRANSACTION_LABEL = "TransientTransactionError";

function hasTransientLabel(err: object): boolean {
  if ("hasErrorLabel" in err && typeof err.hasErrorLabel === "function") {
    return err.hasErrorLabel(TRANSIENT_TRANSACTION_LABEL) === true;
  }
  if ("errorLabels" in err && Array.isArray(err.errorLabels)) {
    return err.errorLabels.includes(TRANSIENT_TRANSACTION_LABEL);
  }
  return false;
}

export function isWriteConflict(err: unknown): boolean {
  if (!err || typeof err !== "object") return false;
  if ("code" in err && err.code === WRITE_CONFLICT_CODE) return true;
  return hasTransientLabel(err);
}

export class WriteConflictError extends Error {
  public readonly code = WRITE_CONFLICT_CODE;
  public readonly errorLabels: readonly string[] = [TRANSIENT_TRANSACTION_LABEL];

  constructor(message = "WriteConflict") {
    super(message);
    this.name = "WriteConflictError";
  }

  public hasErrorLabel(label: string): boolean {
    return this.errorLabels.includes(label);
  }
}
