/**
 * Synthetic identifiers and timestamps.
 *
 * Random ids are derived from v4 UUIDs and are unique only with high
 * probability; nothing records the ids that were handed out.
 */

import { v4 as uuid } from 'uuid';

/** Number of hex characters kept from the UUID for short ids. */
export const SHORT_ID_LENGTH = 8;

function uuidHex(): string {
  return uuid().replace(/-/g, '');
}

/** `<prefix>_<8 hex chars>`, e.g. `key_1a2b3c4d`. */
export function generateId(prefix: string): string {
  return `${prefix}_${uuidHex().slice(0, SHORT_ID_LENGTH)}`;
}

/** A secret token: the prefix followed by 32 hex chars. */
export function generateSecret(prefix: string): string {
  return `${prefix}${uuidHex()}`;
}

/**
 * Deployment ids are derived from the deployment name rather than
 * generated, so the same name always maps to the same id.
 */
export function deploymentId(name: string): string {
  return `dep_${name.toLowerCase()}_123`;
}

export function nowIso(): string {
  return new Date().toISOString();
}
