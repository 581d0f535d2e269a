/**
 * Error taxonomy surfaced by the vocabulary store
 */

export type StoreErrorCode =
  | 'DUPLICATE_ENTRY'
  | 'INVALID_REFERENCE'
  | 'NOT_FOUND'
  | 'INVALID_INPUT'
  | 'MIGRATION_INCOMPLETE'
  | 'SCHEMA_CONFLICT';

export class StoreError extends Error {
  readonly code: StoreErrorCode;
  readonly recoverable: boolean;

  constructor(code: StoreErrorCode, message: string, recoverable: boolean, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.recoverable = recoverable;
  }
}

export class DuplicateEntryError extends StoreError {
  constructor(message: string, options?: ErrorOptions) {
    super('DUPLICATE_ENTRY', message, true, options);
  }
}

export class InvalidReferenceError extends StoreError {
  constructor(message: string, options?: ErrorOptions) {
    super('INVALID_REFERENCE', message, true, options);
  }
}

export class NotFoundError extends StoreError {
  constructor(message: string, options?: ErrorOptions) {
    super('NOT_FOUND', message, true, options);
  }
}

export class InvalidInputError extends StoreError {
  constructor(message: string, options?: ErrorOptions) {
    super('INVALID_INPUT', message, true, options);
  }
}

/**
 * Reported as a warning: the schema is left either fully migrated or untouched.
 */
export class MigrationIncompleteError extends StoreError {
  readonly table: string;

  constructor(table: string, message: string, options?: ErrorOptions) {
    super('MIGRATION_INCOMPLETE', message, true, options);
    this.table = table;
  }
}

export class SchemaConflictError extends StoreError {
  constructor(message: string, options?: ErrorOptions) {
    super('SCHEMA_CONFLICT', message, false, options);
  }
}

export function isStoreError(error: unknown): error is StoreError {
  return error instanceof StoreError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Driver-level error code (`SQLITE_CONSTRAINT_UNIQUE`, `23505`, ...), if any
 */
export function driverErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
