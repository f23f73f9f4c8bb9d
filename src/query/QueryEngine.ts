/**
 * QueryEngine — Filter, rank and decorate albums for display.
 *
 * Filters (id set, tag, year range, free text) are AND-combined. Matches are
 * ordered by start date, most recent first, with undated albums last; ties
 * keep store order.
 */

import type { Album, SearchFilters, SearchResult } from '../types/album.js';
import {
  NO_DATE,
  buildRange,
  displayDate,
  displayRange,
  splitRange,
  type DateNormalizer,
  type DateParts,
  type DateSpan,
} from '../dates/DateNormalizer.js';
import { parseQuery, normalizeText, type YearRange } from './QueryParser.js';
import { DEFAULT_TITLE_SUFFIX, cleanTitle, displayTitle, formatNumber } from './formatters.js';

export interface QueryEngineOptions {
  normalizer: DateNormalizer;
  /** Suffix stripped from titles (default: " - Google Photos") */
  titleSuffix?: string;
}

interface RankedAlbum {
  album: Album;
  sortKey: DateParts;
}

function compareDescending(a: DateParts, b: DateParts): number {
  for (let i = 0; i < 3; i++) {
    const diff = (b[i] ?? 0) - (a[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

function isUndated(parts: DateParts): boolean {
  return parts[0] === NO_DATE[0] && parts[1] === NO_DATE[1] && parts[2] === NO_DATE[2];
}

export class QueryEngine {
  private readonly normalizer: DateNormalizer;
  private readonly titleSuffix: string;

  constructor(options: QueryEngineOptions) {
    this.normalizer = options.normalizer;
    this.titleSuffix = options.titleSuffix ?? DEFAULT_TITLE_SUFFIX;
  }

  /**
   * Run a search over albums in store order.
   */
  search(albums: Iterable<Album>, rawQuery: string, filters: SearchFilters = {}): SearchResult[] {
    const query = parseQuery(rawQuery);
    const idSet = filters.ids !== undefined && filters.ids.length > 0 ? new Set(filters.ids) : null;
    const tag = filters.tag !== undefined && filters.tag !== '' ? filters.tag : null;

    const matches: RankedAlbum[] = [];
    for (const album of albums) {
      if (idSet && !idSet.has(album.id)) continue;
      if (tag !== null && !album.tags.includes(tag)) continue;
      if (query.years && !this.matchesYears(album, query.years)) continue;
      if (!matchesTerms(album.title, query.terms)) continue;

      const span = this.span(album);
      matches.push({
        album,
        sortKey: span ? this.normalizer.dateParts(span.startDate) : NO_DATE,
      });
    }

    // Array.prototype.sort is stable
    matches.sort((a, b) => {
      const aUndated = isUndated(a.sortKey);
      const bUndated = isUndated(b.sortKey);
      if (aUndated !== bUndated) return aUndated ? 1 : -1;
      return compareDescending(a.sortKey, b.sortKey);
    });

    const total = matches.length;
    return matches.map((match, i) => this.toResult(match, i + 1, total));
  }

  /**
   * Year-overlap check. Albums without a parseable start year never match.
   */
  matchesYears(album: Album, years: YearRange): boolean {
    const span = this.span(album);
    const startYear = span ? this.normalizer.yearOf(span.startDate) : null;
    if (startYear === null) {
      return false;
    }
    const endYear = this.normalizer.yearOf(span?.endDate) ?? startYear;
    return startYear <= years.end && endYear >= years.start;
  }

  /**
   * Human-readable date of an album, or null when it has none.
   */
  dateDisplay(album: Album): string | null {
    const span = this.span(album);
    if (span) {
      return span.endDate !== undefined
        ? displayRange(span.startDate, span.endDate)
        : displayDate(span.startDate);
    }
    return album.dateRange !== undefined && album.dateRange !== '' ? album.dateRange : null;
  }

  /**
   * Canonical `start` or `start--end` for editing, or '' when undated.
   */
  dateInput(album: Album): string {
    const span = this.span(album);
    return span ? buildRange(span.startDate, span.endDate) : '';
  }

  /**
   * Normalized dates of an album, from its start/end fields or its stored range.
   */
  private span(album: Album): DateSpan | null {
    const startDate = this.normalizer.normalize(album.startDate);
    if (startDate !== null) {
      const endDate = this.normalizer.normalize(album.endDate);
      return endDate !== null ? { startDate, endDate } : { startDate };
    }
    return album.dateRange !== undefined ? splitRange(album.dateRange) : null;
  }

  private toResult(match: RankedAlbum, index: number, total: number): SearchResult {
    const { album } = match;
    const clean = cleanTitle(album.title, this.titleSuffix);
    const dateDisplay = this.dateDisplay(album);
    const label = `${formatNumber(index)}/${formatNumber(total)}`;

    const details: string[] = [];
    if (dateDisplay !== null) {
      details.push(`📅 ${dateDisplay}`);
    }
    if (album.tags.length > 0) {
      details.push(`🏷️ ${album.tags.join(', ')}`);
    }
    const body = details.length > 0 ? details.join(' • ') : album.url;

    return {
      id: album.id,
      url: album.url,
      title: displayTitle(album.title, album.itemCount, this.titleSuffix),
      cleanTitle: clean,
      dateDisplay,
      tags: [...album.tags],
      position: { index, total, label },
      subtitle: `${label} • ${body}`,
      edit: {
        url: album.url,
        title: clean,
        tags: [...album.tags],
        ...(album.itemCount !== undefined ? { itemCount: album.itemCount } : {}),
        dateInput: this.dateInput(album),
      },
    };
  }
}

function matchesTerms(title: string, terms: readonly string[]): boolean {
  if (terms.length === 0) {
    return true;
  }
  const normalized = normalizeText(title);
  return terms.every(term => normalized.includes(term));
}

export function createQueryEngine(options: QueryEngineOptions): QueryEngine {
  return new QueryEngine(options);
}
