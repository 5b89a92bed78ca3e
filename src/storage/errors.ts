/**
 * Storage Errors
 * Every driver failure leaves the storage layer as a StorageError tagged by kind
 */

import Database from 'better-sqlite3';

/**
 * `constraint`: the database rejected the statement because of a schema rule
 * (foreign key, primary key, unique, check, not null).
 * `other`: anything else (I/O, locked database, malformed SQL, closed handle).
 */
export type StorageErrorKind = 'constraint' | 'other';

export class StorageError extends Error {
  readonly kind: StorageErrorKind;
  /** Driver error code, e.g. `SQLITE_CONSTRAINT_FOREIGNKEY` */
  readonly code: string | null;

  constructor(kind: StorageErrorKind, message: string, code: string | null = null, cause?: unknown) {
    super(message, { cause });
    this.name = 'StorageError';
    this.kind = kind;
    this.code = code;
  }

  isConstraint(): boolean {
    return this.kind === 'constraint';
  }
}

export function toStorageError(error: unknown): StorageError {
  if (error instanceof StorageError) {
    return error;
  }

  if (error instanceof Database.SqliteError) {
    const kind: StorageErrorKind = error.code.startsWith('SQLITE_CONSTRAINT') ? 'constraint' : 'other';
    return new StorageError(kind, error.message, error.code, error);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new StorageError('other', message, null, error);
}

/**
 * Run a driver call, rethrowing any failure as a StorageError
 */
export function guard<T>(fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    throw toStorageError(error);
  }
}
