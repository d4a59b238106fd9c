/**
 * Validation helpers
 * Request bodies are untrusted JSON; these read fields without assuming a shape.
 */

import { Request } from 'express';
import { BadRequestError } from '../utils/errors';
import { isUuid } from '../utils/uuid';

/**
 * Read a string field from a parsed body. Missing or non-string values read as ''.
 */
export function readStringField(source: unknown, field: string): string {
  if (typeof source !== 'object' || source === null) {
    return '';
  }
  const value: unknown = Reflect.get(source, field);
  return typeof value === 'string' ? value : '';
}

/**
 * Read a field from the JSON body, falling back to the query string only
 * when the body does not carry the field at all
 */
export function readBodyOrQueryField(req: Request, field: string): string {
  const body: unknown = req.body;
  if (typeof body === 'object' && body !== null && field in body) {
    return readStringField(body, field);
  }
  return readStringField(req.query, field);
}

export function requireNonEmpty(value: string, message: string): void {
  if (value.length === 0) {
    throw new BadRequestError(message);
  }
}

export function requireUUID(value: string, message: string): void {
  if (!isUuid(value)) {
    throw new BadRequestError(message);
  }
}
