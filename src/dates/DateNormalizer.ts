/**
 * DateNormalizer — Canonical album dates.
 *
 * Scrapers report album dates as "Nov 27, 2014", or as "Nov 27" for albums
 * from the current year. Storage uses `YYYY-MM-DD`, and a range is two
 * canonical dates joined by `--`.
 *
 * Year-less dates are resolved against an explicit reference year passed at
 * construction. Nothing in this module reads the clock.
 */

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const;

const CANONICAL_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DISPLAY_WITH_YEAR_PATTERN = /^([A-Za-z]{3})\s+(\d{1,2}),\s*(\d{4})$/;
const DISPLAY_NO_YEAR_PATTERN = /^([A-Za-z]{3})\s+(\d{1,2})$/;

/** Separator between the two ends of a stored range. */
export const RANGE_SEPARATOR = '--';

/** Separator between the two ends of a displayed range. */
export const DISPLAY_RANGE_SEPARATOR = ' – ';

/**
 * (year, month, day) used for ordering.
 */
export type DateParts = readonly [year: number, month: number, day: number];

/** Sentinel for missing or unparseable dates; sorts before every real date. */
export const NO_DATE: DateParts = [0, 0, 0];

/**
 * Start/end decomposition of a stored range.
 */
export interface DateSpan {
  startDate: string;
  endDate?: string;
}

/**
 * Parsed user date input.
 */
export interface ParsedDateInput extends DateSpan {
  dateRange: string;
}

export interface DateNormalizerOptions {
  /** Year applied to dates written without one ("Nov 27") */
  referenceYear: number;
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    return isLeapYear(year) ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  return (
    year >= 1 &&
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= daysInMonth(year, month)
  );
}

function monthFromAbbreviation(abbreviation: string): number {
  const lower = abbreviation.toLowerCase();
  return MONTHS.findIndex(m => m.toLowerCase() === lower) + 1;
}

function monthAbbreviation(month: number): string {
  return MONTHS[month - 1] ?? '';
}

function toCanonical(year: number, month: number, day: number): string | null {
  if (!isCalendarDate(year, month, day)) {
    return null;
  }
  return `${String(year).padStart(4, '0')}-${pad2(month)}-${pad2(day)}`;
}

/**
 * Strict `YYYY-MM-DD` check with a real calendar (leap years included).
 */
export function validateDate(value: string): boolean {
  const match = CANONICAL_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  return isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

/**
 * Join canonical dates into a stored range string.
 */
export function buildRange(startDate: string, endDate?: string): string {
  return endDate ? `${startDate}${RANGE_SEPARATOR}${endDate}` : startDate;
}

/**
 * Inverse of {@link buildRange}. Returns null unless every part is canonical.
 */
export function splitRange(range: string): DateSpan | null {
  const trimmed = range.trim();
  if (!trimmed.includes(RANGE_SEPARATOR)) {
    return validateDate(trimmed) ? { startDate: trimmed } : null;
  }

  const parts = trimmed.split(RANGE_SEPARATOR);
  const [startDate, endDate] = parts;
  if (parts.length !== 2 || startDate === undefined || endDate === undefined) {
    return null;
  }
  if (!validateDate(startDate) || !validateDate(endDate)) {
    return null;
  }
  return { startDate, endDate };
}

/**
 * Format a canonical date as "Mar 01, 2023". Non-canonical input is returned as-is.
 */
export function displayDate(canonical: string): string {
  const match = CANONICAL_PATTERN.exec(canonical);
  if (!match || !validateDate(canonical)) {
    return canonical;
  }
  return `${monthAbbreviation(Number(match[2]))} ${match[3]}, ${match[1]}`;
}

/**
 * Format a canonical range.
 *
 * Same year: "Mar 01 – Mar 03, 2023". Different years: "Dec 30, 2023 – Jan 02, 2024".
 */
export function displayRange(startDate: string, endDate: string): string {
  const start = CANONICAL_PATTERN.exec(startDate);
  const end = CANONICAL_PATTERN.exec(endDate);
  if (!start || !end || !validateDate(startDate) || !validateDate(endDate)) {
    return `${startDate}${DISPLAY_RANGE_SEPARATOR}${endDate}`;
  }

  if (start[1] === end[1]) {
    const startShort = `${monthAbbreviation(Number(start[2]))} ${start[3]}`;
    return `${startShort}${DISPLAY_RANGE_SEPARATOR}${displayDate(endDate)}`;
  }
  return `${displayDate(startDate)}${DISPLAY_RANGE_SEPARATOR}${displayDate(endDate)}`;
}

/**
 * Normalizer bound to a reference year.
 */
export class DateNormalizer {
  readonly referenceYear: number;

  constructor(options: DateNormalizerOptions) {
    this.referenceYear = options.referenceYear;
  }

  /**
   * Normalize any supported representation to `YYYY-MM-DD`.
   *
   * Returns null when the value is missing or cannot be parsed; callers treat
   * that as "no date".
   */
  normalize(raw: string | null | undefined): string | null {
    if (!raw) {
      return null;
    }
    const value = raw.trim();

    const canonical = CANONICAL_PATTERN.exec(value);
    if (canonical) {
      return validateDate(value) ? value : null;
    }

    const withYear = DISPLAY_WITH_YEAR_PATTERN.exec(value);
    if (withYear) {
      return toCanonical(
        Number(withYear[3]),
        monthFromAbbreviation(withYear[1] ?? ''),
        Number(withYear[2])
      );
    }

    const noYear = DISPLAY_NO_YEAR_PATTERN.exec(value);
    if (noYear) {
      return toCanonical(
        this.referenceYear,
        monthFromAbbreviation(noYear[1] ?? ''),
        Number(noYear[2])
      );
    }

    return null;
  }

  /**
   * (year, month, day) of any supported representation, or {@link NO_DATE}.
   */
  dateParts(raw: string | null | undefined): DateParts {
    const canonical = this.normalize(raw);
    if (canonical === null) {
      return NO_DATE;
    }
    const [year, month, day] = canonical.split('-').map(Number);
    return [year ?? 0, month ?? 0, day ?? 0];
  }

  /**
   * Year of a parseable date, or null.
   */
  yearOf(raw: string | null | undefined): number | null {
    const [year] = this.dateParts(raw);
    return year > 0 ? year : null;
  }

  /**
   * Parse user date input: a single date or `start--end`.
   *
   * Each side may use any form {@link normalize} accepts. Ranges whose start
   * falls after their end are rejected.
   */
  parseDateInput(text: string): ParsedDateInput | null {
    const value = text.trim();

    if (!value.includes(RANGE_SEPARATOR)) {
      const startDate = this.normalize(value);
      return startDate === null ? null : { startDate, dateRange: startDate };
    }

    const parts = value.split(RANGE_SEPARATOR);
    if (parts.length !== 2) {
      return null;
    }
    const startDate = this.normalize(parts[0]);
    const endDate = this.normalize(parts[1]);
    if (startDate === null || endDate === null || startDate > endDate) {
      return null;
    }
    return { startDate, endDate, dateRange: buildRange(startDate, endDate) };
  }
}

/**
 * Create a normalizer for the given reference year.
 */
export function createDateNormalizer(options: DateNormalizerOptions): DateNormalizer {
  return new DateNormalizer(options);
}
