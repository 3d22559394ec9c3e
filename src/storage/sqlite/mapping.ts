import { UniqueConstraintError } from '../../errors/storage-error.js';

const UNIQUE_VIOLATION_CODES = new Set(['SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY']);

function isUniqueViolation(error: unknown): error is Error {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    UNIQUE_VIOLATION_CODES.has(error.code)
  );
}

/**
 * Run a write, reporting uniqueness violations as UniqueConstraintError
 */
export function withUniqueGuard<T>(write: () => T): T {
  try {
    return write();
  } catch (error) {
    if (isUniqueViolation(error)) {
      // "UNIQUE constraint failed: aliases.email"
      const constraint = error.message.split(': ')[1] ?? 'unknown';
      throw new UniqueConstraintError(constraint, { cause: error });
    }
    throw error;
  }
}

export function fromTimestamp(value: number | null): Date | undefined {
  return value === null ? undefined : new Date(value);
}
