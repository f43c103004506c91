/**
 * Value Coercion Helpers
 *
 * These functions coerce values (numbers/booleans) but NEVER rename keys.
 * Use these in a command definition's coerce() function.
 */

import { ValidationError } from '@racelab/utils';

function isString(x: unknown): x is string {
  return typeof x === 'string';
}

/**
 * Coerce a value to a number
 * Accepts:
 * - Number: returns as-is
 * - String number: '123' -> 123
 * - undefined/null returns undefined
 */
export function coerceNumber(v: unknown, name: string): number | undefined {
  if (v === null || v === undefined) return undefined;
  if (typeof v === 'number') return v;
  if (isString(v) && v.trim() !== '') {
    const n = Number(v);
    if (!Number.isFinite(n))
      throw new ValidationError(`Invalid number for ${name}`, { name, value: v });
    return n;
  }
  throw new ValidationError(`Invalid number for ${name}`, { name, value: v });
}

/**
 * Coerce a value to a boolean
 * Accepts:
 * - Boolean: returns as-is
 * - 'true'/'false', '1'/'0', 'yes'/'no' (case-insensitive)
 * - undefined/null returns undefined
 */
export function coerceBoolean(v: unknown, name: string): boolean | undefined {
  if (v === null || v === undefined) return undefined;
  if (typeof v === 'boolean') return v;
  if (isString(v)) {
    const normalized = v.trim().toLowerCase();
    if (['true', '1', 'yes'].includes(normalized)) return true;
    if (['false', '0', 'no'].includes(normalized)) return false;
  }
  throw new ValidationError(`Invalid boolean for ${name}`, { name, value: v });
}
