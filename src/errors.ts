export type MemoryErrorCode =
  | 'INVALID_INPUT'
  | 'NOT_FOUND'
  | 'STORE_UNAVAILABLE'
  | 'SOURCE_NOT_FOUND'
  | 'SCHEMA_MISMATCH';

/** Structured error thrown by store, migration and brief operations. */
export class MemoryError extends Error {
  constructor(
    public readonly code: MemoryErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'MemoryError';
  }
}

/** Rejected before any write: bad significance, category, text or query. */
export class InvalidInputError extends MemoryError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
    this.name = 'InvalidInputError';
  }
}

export class NotFoundError extends MemoryError {
  constructor(public readonly id: string) {
    super('NOT_FOUND', `memory ${id} not found`);
    this.name = 'NotFoundError';
  }
}

/** The database could not be opened or stayed locked past the busy timeout. */
export class StoreUnavailableError extends MemoryError {
  constructor(message: string, cause?: unknown) {
    super('STORE_UNAVAILABLE', message, { cause });
    this.name = 'StoreUnavailableError';
  }
}

export class SourceNotFoundError extends MemoryError {
  constructor(public readonly sourcePath: string) {
    super('SOURCE_NOT_FOUND', `migration source not found: ${sourcePath}`);
    this.name = 'SourceNotFoundError';
  }
}

export class SchemaMismatchError extends MemoryError {
  constructor(
    public readonly sourcePath: string,
    detail: string,
  ) {
    super('SCHEMA_MISMATCH', `unrecognized migration source ${sourcePath}: ${detail}`);
    this.name = 'SchemaMismatchError';
  }
}

const LOCK_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_CANTOPEN']);

/** True for SQLite errors that mean "try again later" rather than bad data. */
export function isLockError(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) return false;
  const code = err.code;
  return typeof code === 'string' && [...LOCK_CODES].some(c => code.startsWith(c));
}
