import { QueryFailedError } from 'typeorm';

const UNIQUE_VIOLATION_CODES = new Set([
  '23505', // postgres unique_violation
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT_PRIMARYKEY',
]);

const TRANSIENT_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  '57P01', // admin_shutdown
  '57P03', // cannot_connect_now
  '40001', // serialization_failure
  '40P01', // deadlock_detected
  'SQLITE_BUSY',
]);

function codeOf(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'code' in value && typeof value.code === 'string') {
    return value.code;
  }
  return undefined;
}

/**
 * Driver error code of a failed query, looking through TypeORM's wrapper.
 */
export function dbErrorCode(error: unknown): string | undefined {
  if (error instanceof QueryFailedError) {
    return codeOf(error.driverError) ?? codeOf(error);
  }
  return codeOf(error);
}

export function isUniqueViolation(error: unknown): boolean {
  const code = dbErrorCode(error);
  return code !== undefined && UNIQUE_VIOLATION_CODES.has(code);
}

export function isTransientDbError(error: unknown): boolean {
  const code = dbErrorCode(error);
  if (code === undefined) {
    return false;
  }
  // class 08: connection exception
  return TRANSIENT_CODES.has(code) || /^08[0-9A-Z]{3}$/.test(code);
}
