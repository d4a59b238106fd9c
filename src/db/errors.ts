/**
 * Data-access errors
 * Storage-level failure kinds. These never carry HTTP semantics; the
 * controllers translate them.
 */

import { parseUuid } from '../utils/uuid';

export type DBErrorKind = 'InvalidUUID' | 'Other';

export abstract class DBError extends Error {
  abstract readonly kind: DBErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The identifier is malformed, or names a parent row that does not exist
 */
export class InvalidUUIDError extends DBError {
  readonly kind = 'InvalidUUID';

  constructor(public readonly detail: string) {
    super(`Invalid UUID provided: ${detail}`);
  }
}

export class OtherDBError extends DBError {
  readonly kind = 'Other';

  constructor(cause: unknown) {
    super(`Database error: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

/**
 * Parse a caller-supplied identifier, rejecting with InvalidUUIDError when malformed
 */
export function requireUuid(value: string): string {
  const uuid = parseUuid(value);
  if (!uuid) {
    throw new InvalidUUIDError(`'${value}' is not a valid UUID`);
  }
  return uuid;
}

export function isDBError(error: unknown): error is DBError {
  return error instanceof DBError;
}

/** PostgreSQL SQLSTATE codes the data layer inspects */
export const postgresErrorCodes = {
  FOREIGN_KEY_VIOLATION: '23503',
} as const;

/**
 * Read the SQLSTATE code off an error raised by pg
 */
export function getPostgresErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
