/**
 * QueryParser — Split a raw search string into a year filter and free-text terms.
 *
 * Syntax:
 *   y:2024           albums overlapping 2024
 *   y:2023-2024      albums overlapping 2023 through 2024
 *   anything else    terms that must all appear in the title
 */

const YEAR_TOKEN = /^y:(\d{4})(?:-(\d{4}))?$/i;
const SEPARATORS = /[-_/\\|]/g;
const WHITESPACE = /\s+/g;

/**
 * Inclusive year range.
 */
export interface YearRange {
  start: number;
  end: number;
}

export interface ParsedQuery {
  /** Normalized free-text terms (all must match) */
  terms: string[];
  /** Year filter, when the query carries one */
  years?: YearRange;
}

/**
 * Lower-case text, turn separators into spaces and collapse whitespace.
 */
export function normalizeText(text: string): string {
  return text.replace(SEPARATORS, ' ').replace(WHITESPACE, ' ').toLowerCase().trim();
}

/**
 * Parse a raw query. If several year tokens appear the last one wins.
 */
export function parseQuery(raw: string): ParsedQuery {
  let years: YearRange | undefined;
  const remaining: string[] = [];

  for (const token of raw.split(WHITESPACE)) {
    if (token === '') continue;

    const match = YEAR_TOKEN.exec(token);
    if (match) {
      const first = Number(match[1]);
      const second = match[2] !== undefined ? Number(match[2]) : first;
      years = { start: Math.min(first, second), end: Math.max(first, second) };
      continue;
    }
    remaining.push(token);
  }

  const normalized = normalizeText(remaining.join(' '));
  return {
    terms: normalized === '' ? [] : normalized.split(' '),
    ...(years !== undefined ? { years } : {}),
  };
}
