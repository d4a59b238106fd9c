/**
 * UUID helpers
 * Any version and variant is accepted, as the Postgres UUID type does.
 */

const UUID_REGEX = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isUuid(value: string): boolean {
  return UUID_REGEX.test(value);
}

/**
 * Parse an identifier into canonical (lowercase) form.
 * Returns null when the string is not a UUID.
 */
export function parseUuid(value: string): string | null {
  return isUuid(value) ? value.toLowerCase() : null;
}
