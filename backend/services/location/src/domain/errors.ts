// backend/services/location/src/domain/errors.ts

/**
 * Error taxonomy of the location core.
 *
 * The first three kinds are anticipated outcomes (validators, restrict rules,
 * translated storage constraints) and carry enough context for a precise
 * message. `UnexpectedStorageError` only carries an incident id; the full
 * context goes to the server log under that id.
 */

export type EntityLabel = "Country" | "State" | "City" | "Active city";

export type EntityNotFound = {
  kind: "EntityNotFound";
  entityType: EntityLabel;
  id: string;
};

export type DuplicateCode = {
  kind: "DuplicateCode";
  entityType: EntityLabel;
  code: string;
};

export type RestrictedDeletion = {
  kind: "RestrictedDeletion";
  entityType: EntityLabel;
  id: string;
  blockingChildType: "states" | "cities";
};

export type UnexpectedStorageError = {
  kind: "UnexpectedStorageError";
  incidentId: string;
};

export type DomainError =
  | EntityNotFound
  | DuplicateCode
  | RestrictedDeletion
  | UnexpectedStorageError;

export type DomainErrorKind = DomainError["kind"];

export const entityNotFound = (
  entityType: EntityLabel,
  id: string
): EntityNotFound => ({ kind: "EntityNotFound", entityType, id });

export const duplicateCode = (
  entityType: EntityLabel,
  code: string
): DuplicateCode => ({ kind: "DuplicateCode", entityType, code });

export const restrictedDeletion = (
  entityType: EntityLabel,
  id: string,
  blockingChildType: RestrictedDeletion["blockingChildType"]
): RestrictedDeletion => ({
  kind: "RestrictedDeletion",
  entityType,
  id,
  blockingChildType,
});

export const unexpectedStorageError = (
  incidentId: string
): UnexpectedStorageError => ({ kind: "UnexpectedStorageError", incidentId });

export function describeDomainError(error: DomainError): string {
  switch (error.kind) {
    case "EntityNotFound":
      return `${error.entityType} with id ${error.id} not found`;
    case "DuplicateCode":
      return `${error.entityType} with code '${error.code}' already exists`;
    case "RestrictedDeletion":
      return `Cannot delete ${error.entityType.toLowerCase()} with existing ${error.blockingChildType}`;
    case "UnexpectedStorageError":
      return "An unexpected error occurred";
  }
}
