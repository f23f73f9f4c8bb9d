/**
 * AlbumStats — Completeness buckets over the collection.
 *
 * Each bucket is a list of album ids, in store order, suitable as the `ids`
 * filter of a search.
 */

import type { Album } from '../types/album.js';

export interface AlbumStatsReport {
  all: string[];
  /** Item count and date both present */
  complete: string[];
  incomplete: string[];
  /** Item count absent or 0 */
  missingItemCount: string[];
  /** Neither a start date nor a stored range */
  missingDate: string[];
  missingBoth: string[];
  withTags: string[];
  withoutTags: string[];
}

export function isMissingItemCount(album: Album): boolean {
  return !album.itemCount;
}

export function isMissingDate(album: Album): boolean {
  return !album.startDate && !album.dateRange;
}

export function computeStats(albums: Iterable<Album>): AlbumStatsReport {
  const report: AlbumStatsReport = {
    all: [],
    complete: [],
    incomplete: [],
    missingItemCount: [],
    missingDate: [],
    missingBoth: [],
    withTags: [],
    withoutTags: [],
  };

  for (const album of albums) {
    const missingCount = isMissingItemCount(album);
    const missingDate = isMissingDate(album);

    report.all.push(album.id);
    if (missingCount) report.missingItemCount.push(album.id);
    if (missingDate) report.missingDate.push(album.id);
    if (missingCount && missingDate) report.missingBoth.push(album.id);
    (missingCount || missingDate ? report.incomplete : report.complete).push(album.id);
    (album.tags.length > 0 ? report.withTags : report.withoutTags).push(album.id);
  }

  return report;
}
