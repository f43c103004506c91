/**
 * Canonical hashing for deterministic identifiers
 *
 * Identifiers derived here must be byte-identical across runs and platforms:
 * object keys are sorted at every depth and the digest is taken over UTF-8.
 */

import { createHash } from 'crypto';

export type Canonicalizable =
  | string
  | number
  | boolean
  | null
  | undefined
  | readonly Canonicalizable[]
  | { readonly [key: string]: Canonicalizable };

function isCanonicalArray(value: Canonicalizable): value is readonly Canonicalizable[] {
  return Array.isArray(value);
}

function sortKeysDeep(value: Canonicalizable): Canonicalizable {
  if (isCanonicalArray(value)) {
    return value.map((item: Canonicalizable) => sortKeysDeep(item));
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.keys(value)
      .sort()
      .map((key): [string, Canonicalizable] => [key, sortKeysDeep(value[key])]);
    return Object.fromEntries(entries);
  }
  return value;
}

/**
 * JSON encoding with keys sorted at every depth
 */
export function canonicalJson(value: Canonicalizable): string {
  return JSON.stringify(sortKeysDeep(value));
}

/**
 * Hex SHA-1 digest truncated to `length` characters
 */
export function shortDigest(payload: string, length: number): string {
  return createHash('sha1').update(payload, 'utf8').digest('hex').slice(0, length);
}

export const CONTEXT_HASH_LENGTH = 16;
export const EXPERIENCE_ID_LENGTH = 20;

/**
 * Fingerprint of a racing context. Values are string-coerced so that 1200 and
 * "1200" land in the same bucket; null stays null.
 */
export function computeContextHash(
  context: Readonly<Record<string, string | number | boolean | null>>
): string {
  const payload = Object.fromEntries(
    Object.entries(context).map(([key, value]) => [key, value === null ? null : String(value)])
  );
  return shortDigest(canonicalJson(payload), CONTEXT_HASH_LENGTH);
}

/**
 * Deterministic identity of one logged action
 */
export function computeExperienceId(
  strategyId: string,
  raceId: string,
  runnerId: string,
  action: string
): string {
  return shortDigest(`${strategyId}|${raceId}|${runnerId}|${action}`, EXPERIENCE_ID_LENGTH);
}
