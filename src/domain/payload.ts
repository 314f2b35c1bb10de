/**
 * Request payload decoding.
 *
 * Handlers receive the raw body text and decode it here. Field access is
 * tolerant: a payload that is not a JSON object simply has no fields, and a
 * field of the wrong type reads as absent.
 */

export type JsonObject = Record<string, unknown>;

export type ParseResult = { ok: true; value: unknown } | { ok: false };

/** Parse raw body text as JSON. Empty or malformed text is a parse failure. */
export function parseJsonPayload(raw: string): ParseResult {
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read a field of a decoded payload; undefined when the payload is not an object. */
export function readField(payload: unknown, field: string): unknown {
  if (!isJsonObject(payload)) return undefined;
  return Object.prototype.hasOwnProperty.call(payload, field) ? payload[field] : undefined;
}

/** A string field, or undefined when it is missing or not a string. */
export function optionalString(payload: unknown, field: string): string | undefined {
  const value = readField(payload, field);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Render any JSON value as text: strings as they are, scalars through
 * String(), objects and arrays as JSON. null and undefined give undefined.
 */
export function stringifyField(value: unknown): string | undefined {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'string') return value;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}
