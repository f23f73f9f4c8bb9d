/**
 * Types for the Album Store.
 *
 * The store orchestrates:
 * - JSON line parsing/serialization (via AlbumParser)
 * - Structural validation (via AlbumValidator)
 * - File operations (via RepoAdapter)
 *
 * It has NO merge or query logic; those operate on the loaded snapshot.
 */

import type { AlbumCollection } from './AlbumCollection.js';

/**
 * What to do with a stored line that cannot be parsed.
 *
 * - `strict`: fail the whole load
 * - `lenient`: skip the line with a warning (it is dropped on the next write)
 */
export type ParsePolicy = 'strict' | 'lenient';

/**
 * Configuration for AlbumStore.
 */
export interface AlbumStoreConfig {
  /** Collection file, relative to the adapter base path (default: 'photoAlbums.json') */
  fileName?: string;
  /** Handling of unparseable lines (default: 'strict') */
  parsePolicy?: ParsePolicy;
}

/**
 * Result of a save.
 */
export interface SaveResult {
  /** Number of albums written */
  count: number;
}

/**
 * AlbumStore interface.
 */
export interface AlbumStore {
  /**
   * Load the whole collection. A missing file is an empty collection.
   */
  load(): Promise<AlbumCollection>;

  /**
   * Replace the whole collection on disk.
   */
  save(collection: AlbumCollection): Promise<SaveResult>;
}
