import { QueryFailedError } from 'typeorm';

// better-sqlite3 and pg error codes for a violated UNIQUE constraint
const UNIQUE_VIOLATION_CODES = new Set(['SQLITE_CONSTRAINT_UNIQUE', '23505']);

export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) return false;

  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null) return false;
  if (!('code' in driverError)) return false;

  return (
    typeof driverError.code === 'string' &&
    UNIQUE_VIOLATION_CODES.has(driverError.code)
  );
}
