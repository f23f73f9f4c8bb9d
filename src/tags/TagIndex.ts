/**
 * TagIndex — Tag counts and tag membership changes.
 *
 * Counts are computed on demand from the albums; nothing is cached between calls.
 */

import type { Album, TagAction, TagCount, ToggleOutcome } from '../types/album.js';

/**
 * `listing`: count desc, then tag case-insensitively, then exact tag.
 * `menu`: count desc, ties in first-appearance order.
 */
export type TagOrder = 'listing' | 'menu';

/** Outcome of a toggle on an album that exists. */
export type TagChange = Exclude<ToggleOutcome, 'album-not-found'>;

export interface ToggleResult {
  outcome: TagChange;
  album: Album;
}

export interface TagMenuEntry {
  tag: string;
  /** Albums carrying the tag (0 for a suggested new tag) */
  count: number;
  /** What selecting the entry does to the album */
  action: TagAction;
  /** True for the suggestion built from the filter text */
  isNew: boolean;
}

export interface TagMenu {
  url: string;
  title: string;
  currentTags: string[];
  entries: TagMenuEntry[];
}

function compareListing(a: TagCount, b: TagCount): number {
  if (a.count !== b.count) return b.count - a.count;
  const aLower = a.tag.toLowerCase();
  const bLower = b.tag.toLowerCase();
  if (aLower !== bLower) return aLower < bLower ? -1 : 1;
  if (a.tag !== b.tag) return a.tag < b.tag ? -1 : 1;
  return 0;
}

/**
 * Count albums per tag.
 */
export function allTags(albums: Iterable<Album>, order: TagOrder = 'listing'): TagCount[] {
  const counts = new Map<string, number>();
  for (const album of albums) {
    for (const tag of album.tags) {
      counts.set(tag, (counts.get(tag) ?? 0) + 1);
    }
  }

  const tags = [...counts].map(([tag, count]) => ({ tag, count }));
  if (order === 'menu') {
    return tags.sort((a, b) => b.count - a.count);
  }
  return tags.sort(compareListing);
}

/**
 * Keep tags containing the substring, case-insensitively. Order is kept.
 */
export function filterTags(tags: readonly TagCount[], substring?: string): TagCount[] {
  const needle = substring?.trim().toLowerCase() ?? '';
  if (needle === '') {
    return [...tags];
  }
  return tags.filter(t => t.tag.toLowerCase().includes(needle));
}

/**
 * Add or remove a tag. The input album is not modified.
 */
export function toggle(album: Album, tag: string, action: TagAction): ToggleResult {
  const has = album.tags.includes(tag);

  if (action === 'add') {
    return has
      ? { outcome: 'already-in-that-state', album }
      : { outcome: 'applied', album: { ...album, tags: [...album.tags, tag] } };
  }
  return has
    ? { outcome: 'applied', album: { ...album, tags: album.tags.filter(t => t !== tag) } }
    : { outcome: 'already-in-that-state', album };
}

/**
 * Tag choices for one album.
 *
 * A non-empty filter that names no existing tag (case-insensitively) adds a
 * suggestion to create it, lower-cased.
 */
export function tagMenu(albums: Iterable<Album>, album: Album, filter?: string): TagMenu {
  const needle = filter?.trim().toLowerCase() ?? '';
  const known = allTags(albums, 'menu');

  const entries: TagMenuEntry[] = filterTags(known, needle).map(({ tag, count }) => ({
    tag,
    count,
    action: album.tags.includes(tag) ? 'remove' : 'add',
    isNew: false,
  }));

  if (needle !== '' && !known.some(t => t.tag.toLowerCase() === needle)) {
    entries.push({ tag: needle, count: 0, action: 'add', isNew: true });
  }

  return {
    url: album.url,
    title: album.title,
    currentTags: [...album.tags],
    entries,
  };
}
