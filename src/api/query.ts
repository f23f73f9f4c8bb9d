/**
 * Helpers for querystring values.
 */

import type { QueryValue } from './types.js';

/**
 * The value of a single-valued parameter. When the key is repeated the last
 * occurrence wins.
 */
export function singleValue(raw: QueryValue | undefined): string | undefined {
  return Array.isArray(raw) ? raw[raw.length - 1] : raw;
}

/**
 * Ids from `ids=a,b`, a repeated `ids=a&ids=b`, or both.
 */
export function parseIds(raw: QueryValue | undefined): string[] {
  if (raw === undefined) {
    return [];
  }
  const values = Array.isArray(raw) ? raw : [raw];
  return values
    .flatMap(value => value.split(','))
    .map(id => id.trim())
    .filter(id => id !== '');
}
