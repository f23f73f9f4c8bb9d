/**
 * AlbumParser — Convert between JSON lines and Album records.
 *
 * This module handles:
 * - Parsing one stored line into an Album (structural check via AlbumValidator)
 * - Coercing legacy values (numeric-string counts, missing ids, missing tags)
 * - Serializing albums back to lines with a fixed key order
 */

import { randomUUID } from 'node:crypto';
import type { Album } from '../types/album.js';
import type { ValidationIssue } from '../types/common.js';
import { isRecord } from '../types/common.js';
import type { AlbumValidator } from '../validation/AlbumValidator.js';

/** Title given to albums scraped without one. */
export const DEFAULT_TITLE = 'Untitled Album';

/**
 * Result of parsing one line.
 */
export interface ParseResult {
  /** Whether parsing succeeded */
  success: boolean;
  /** The parsed album (if successful) */
  album?: Album;
  /** True when the line had no id and one was generated */
  assignedId?: boolean;
  /** Error message (if failed) */
  error?: string;
  /** Schema problems (if the line was JSON but not a valid album) */
  issues?: ValidationIssue[];
}

/**
 * Coerce a stored or scraped item count to a non-negative integer.
 *
 * Accepts integers and digit-only strings. Anything else is treated as absent.
 */
export function coerceItemCount(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 ? value : undefined;
  }
  if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return undefined;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function uniqueStrings(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const seen = new Set<string>();
  for (const item of value) {
    if (typeof item === 'string') {
      seen.add(item);
    }
  }
  return [...seen];
}

/**
 * Parse one stored line.
 *
 * @param line - A single line of the collection file (not blank)
 * @param validator - Structural validator for the album schema
 */
export function parseAlbumLine(line: string, validator: AlbumValidator): ParseResult {
  let payload: unknown;
  try {
    payload = JSON.parse(line);
  } catch (err) {
    return {
      success: false,
      error: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  if (!isRecord(payload)) {
    return {
      success: false,
      error: `Expected object, got ${Array.isArray(payload) ? 'array' : typeof payload}`,
    };
  }

  const validation = validator.validate(payload);
  if (!validation.valid) {
    return {
      success: false,
      error: validation.issues.map(i => `${i.path}: ${i.message}`).join('; '),
      issues: validation.issues,
    };
  }

  const storedId = optionalString(payload.id);
  const itemCount = coerceItemCount(payload.itemCount);
  const dateRange = optionalString(payload.dateRange);
  const startDate = optionalString(payload.startDate);
  const endDate = optionalString(payload.endDate);

  const album: Album = {
    id: storedId ?? randomUUID(),
    url: String(payload.url),
    title: typeof payload.title === 'string' ? payload.title : DEFAULT_TITLE,
    ...(itemCount !== undefined ? { itemCount } : {}),
    tags: uniqueStrings(payload.tags),
    ...(dateRange !== undefined ? { dateRange } : {}),
    ...(startDate !== undefined ? { startDate } : {}),
    ...(endDate !== undefined ? { endDate } : {}),
  };

  return {
    success: true,
    album,
    assignedId: storedId === undefined,
  };
}

/**
 * Serialize an album to a single line (no trailing newline).
 *
 * Keys are written in a fixed order; optional fields are omitted when absent.
 */
export function serializeAlbum(album: Album): string {
  return JSON.stringify({
    id: album.id,
    url: album.url,
    title: album.title,
    ...(album.itemCount !== undefined ? { itemCount: album.itemCount } : {}),
    tags: album.tags,
    ...(album.dateRange !== undefined ? { dateRange: album.dateRange } : {}),
    ...(album.startDate !== undefined ? { startDate: album.startDate } : {}),
    ...(album.endDate !== undefined ? { endDate: album.endDate } : {}),
  });
}

/**
 * Serialize a sequence of albums to file content, one line each.
 */
export function serializeAlbums(albums: Iterable<Album>): string {
  let output = '';
  for (const album of albums) {
    output += `${serializeAlbum(album)}\n`;
  }
  return output;
}
