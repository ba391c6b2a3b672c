/**
 * Error Taxonomy
 *
 * Two named failures cross layer boundaries:
 *
 *   NotFoundError          — raised by services when an operation needs a
 *                            record that does not exist                → 404
 *   RequestValidationError — raised by the REST adapter when a body or
 *                            path parameter fails its schema           → 422
 *
 * Everything the storage engine throws propagates unchanged and is
 * answered with a generic 500. Repositories never raise domain errors.
 */

import postgres from "postgres";

/**
 * The requested record does not exist.
 * `entity` is the human-readable label ("Food availability"); `key` names
 * what was looked up when it is not the id ("email").
 */
export class NotFoundError extends Error {
  public readonly entity: string;
  public readonly id: number | string;
  public readonly key: string;

  constructor(entity: string, id: number | string, key = "ID") {
    super(`${entity} with ${key} ${id} not found`);
    this.name = "NotFoundError";
    this.entity = entity;
    this.id = id;
    this.key = key;
  }
}

/** One failed field of a request payload */
export interface FieldError {
  field: string;
  message: string;
  code: string;
}

/**
 * Structured validation error.
 * Contains per-field error details for the client.
 */
export class RequestValidationError extends Error {
  public readonly fieldErrors: FieldError[];

  constructor(message: string, fieldErrors: FieldError[]) {
    super(message);
    this.name = "RequestValidationError";
    this.fieldErrors = fieldErrors;
  }
}

/**
 * Whether an error came from the database server (constraint violations,
 * bad references, ...). Only used to categorize; the client never sees
 * the details.
 */
export function isStorageError(error: unknown): boolean {
  return error instanceof postgres.PostgresError;
}
