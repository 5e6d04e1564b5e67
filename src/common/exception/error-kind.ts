import { HttpStatus } from '@nestjs/common';

export const ERROR_KIND = {
  UNAUTHENTICATED: 'UNAUTHENTICATED',
  FORBIDDEN: 'FORBIDDEN',
  NOT_FOUND: 'NOT_FOUND',
  ALREADY_ENROLLED: 'ALREADY_ENROLLED',
  INVALID_LESSON: 'INVALID_LESSON',
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  CONFLICT: 'CONFLICT',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorKind = (typeof ERROR_KIND)[keyof typeof ERROR_KIND];

const KINDS: ReadonlySet<string> = new Set(Object.values(ERROR_KIND));

export function isErrorKind(value: unknown): value is ErrorKind {
  return typeof value === 'string' && KINDS.has(value);
}

/**
 * Fallback kind for exceptions that were not raised with an explicit one,
 * e.g. the UnauthorizedException thrown by passport.
 */
export function errorKindForStatus(status: number): ErrorKind {
  switch (status) {
    case HttpStatus.UNAUTHORIZED:
      return ERROR_KIND.UNAUTHENTICATED;
    case HttpStatus.FORBIDDEN:
      return ERROR_KIND.FORBIDDEN;
    case HttpStatus.NOT_FOUND:
      return ERROR_KIND.NOT_FOUND;
    case HttpStatus.BAD_REQUEST:
      return ERROR_KIND.VALIDATION_FAILED;
    case HttpStatus.CONFLICT:
      return ERROR_KIND.CONFLICT;
    default:
      return ERROR_KIND.INTERNAL_ERROR;
  }
}
