/**
 * Display helpers for album titles and counts.
 */

/** Suffix the photo service appends to page titles. */
export const DEFAULT_TITLE_SUFFIX = ' - Google Photos';

const numberFormat = new Intl.NumberFormat('en-US');

/**
 * Integer with thousands separators ("12,345").
 */
export function formatNumber(value: number): string {
  return numberFormat.format(value);
}

/**
 * Title without the trailing service suffix.
 */
export function cleanTitle(title: string, suffix: string = DEFAULT_TITLE_SUFFIX): string {
  return suffix !== '' && title.endsWith(suffix) ? title.slice(0, -suffix.length) : title;
}

/**
 * Clean title with the item count appended when known: "Trip (1,204)".
 */
export function displayTitle(title: string, itemCount?: number, suffix?: string): string {
  const clean = cleanTitle(title, suffix);
  return itemCount !== undefined && itemCount > 0 ? `${clean} (${formatNumber(itemCount)})` : clean;
}

/**
 * Markdown link to an album: "[Photos: Trip](https://...)".
 */
export function markdownLink(album: { url: string; title: string }, suffix?: string): string {
  return `[Photos: ${cleanTitle(album.title, suffix)}](${album.url})`;
}
