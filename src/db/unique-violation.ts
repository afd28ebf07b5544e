import { QueryFailedError } from 'typeorm';

// postgres, better-sqlite3, mysql
const UNIQUE_VIOLATION_CODES = new Set(['23505', 'SQLITE_CONSTRAINT_UNIQUE', 'ER_DUP_ENTRY']);

export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }

  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null || !('code' in driverError)) {
    return false;
  }

  return typeof driverError.code === 'string' && UNIQUE_VIOLATION_CODES.has(driverError.code);
}
