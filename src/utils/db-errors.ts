/**
 * Error classes for task store operations
 */
export class DatabaseError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

export class StorageUnavailableError extends DatabaseError {
  constructor(message: string) {
    super(`Storage unavailable: ${message}`, 'STORAGE_UNAVAILABLE', 503);
    this.name = 'StorageUnavailableError';
  }
}

export class ValidationError extends DatabaseError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }
}

export class DuplicateTaskIdError extends DatabaseError {
  constructor(public taskId: string) {
    super(`Task ${taskId} already exists`, 'DUPLICATE_TASK_ID', 409);
    this.name = 'DuplicateTaskIdError';
  }
}

export class TaskNotFoundError extends DatabaseError {
  constructor(public taskId: string) {
    super(`Task ${taskId} not found`, 'TASK_NOT_FOUND', 404);
    this.name = 'TaskNotFoundError';
  }
}

export class CodecError extends DatabaseError {
  constructor(message: string) {
    super(`Cannot decode stored value: ${message}`, 'CODEC_ERROR', 500);
    this.name = 'CodecError';
  }
}

const UNAVAILABLE_CODES = ['SQLITE_CANTOPEN', 'SQLITE_READONLY', 'SQLITE_IOERR', 'SQLITE_BUSY', 'SQLITE_NOTADB', 'SQLITE_PERM'];

/**
 * SQLite result code of a better-sqlite3 error (extended codes such as SQLITE_CONSTRAINT_UNIQUE)
 */
export function sqliteCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * True for a UNIQUE or PRIMARY KEY constraint failure
 */
export function isUniqueViolation(error: unknown): boolean {
  const code = sqliteCode(error);
  return code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY';
}

/**
 * better-sqlite3 raises a TypeError for statements on a closed handle
 */
function isClosedConnection(error: unknown): boolean {
  return error instanceof TypeError && error.message.includes('database connection is not open');
}

/**
 * Maps a driver error onto the store's error taxonomy and rethrows it
 */
export function handleDatabaseError(error: unknown, context: string): never {
  if (error instanceof DatabaseError) {
    throw error;
  }

  const message = error instanceof Error ? error.message : String(error);

  if (isClosedConnection(error)) {
    throw new StorageUnavailableError(`${context}: connection is closed`);
  }

  const code = sqliteCode(error);
  if (code && UNAVAILABLE_CODES.some(prefix => code.startsWith(prefix))) {
    throw new StorageUnavailableError(`${context}: ${message}`);
  }

  if (code?.startsWith('SQLITE_CONSTRAINT')) {
    throw new DatabaseError(
      `Database constraint violation in ${context}: ${message}`,
      'CONSTRAINT_VIOLATION',
      400
    );
  }

  throw new DatabaseError(
    `Unexpected error in ${context}: ${message}`,
    'UNEXPECTED_ERROR',
    500
  );
}
