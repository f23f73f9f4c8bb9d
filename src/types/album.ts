/**
 * Album record and the values that flow around it.
 *
 * These types are shared by the store, the reconciliation engine,
 * the query engine and the adapters. They carry no I/O.
 */

/**
 * A persisted album, keyed by url.
 */
export interface Album {
  /** Opaque UUID, assigned once at creation */
  id: string;
  /** Natural key, unique across the store */
  url: string;
  /** User-editable title */
  title: string;
  /** Number of photos/videos; absent and 0 both mean "unknown" when merging */
  itemCount?: number;
  /** Free-text tags, no duplicates */
  tags: string[];
  /** `YYYY-MM-DD` or `YYYY-MM-DD--YYYY-MM-DD` */
  dateRange?: string;
  /** Start of the date range */
  startDate?: string;
  /** End of the date range (ranges only) */
  endDate?: string;
}

/**
 * Candidate from a single-album scrape: title, count and dates.
 */
export interface SingleCandidate {
  url: string;
  title?: string;
  itemCount?: number;
  startDate?: string;
  endDate?: string;
}

/**
 * Candidate from a bulk (album list) scrape: no dates.
 */
export interface BatchCandidate {
  url: string;
  title?: string;
  itemCount?: number;
}

/**
 * Classified ingest input.
 */
export type IngestInput =
  | { kind: 'single'; candidate: SingleCandidate }
  | { kind: 'bulk'; candidates: BatchCandidate[] };

export type IngestKind = IngestInput['kind'];

export type MergeOutcome = 'created' | 'updated' | 'unchanged';

/**
 * Result of reconciling one candidate.
 */
export interface MergeResult {
  id: string;
  outcome: MergeOutcome;
}

/**
 * Aggregated ingest outcome buckets.
 */
export interface IngestReport {
  kind: IngestKind;
  createdIds: string[];
  updatedIds: string[];
  unchangedIds: string[];
  /** Set for single-album ingests that produced an outcome */
  album?: {
    url: string;
    title: string;
  };
}

export type TagAction = 'add' | 'remove';

export type ToggleOutcome = 'applied' | 'already-in-that-state' | 'album-not-found';

export interface TagCount {
  tag: string;
  count: number;
}

/**
 * Restrictions applied on top of the parsed query.
 */
export interface SearchFilters {
  /** Only albums with one of these ids (empty means no restriction) */
  ids?: readonly string[];
  /** Only albums carrying this exact tag */
  tag?: string;
}

/**
 * Editable fields handed back to callers for follow-up edit actions.
 */
export interface AlbumEditFields {
  url: string;
  title: string;
  tags: string[];
  itemCount?: number;
  /** Canonical edit form: `start` or `start--end`, empty when undated */
  dateInput: string;
}

export interface SearchResult {
  id: string;
  url: string;
  /** Title with the suffix stripped and the item count appended */
  title: string;
  /** Title with the suffix stripped */
  cleanTitle: string;
  dateDisplay: string | null;
  tags: string[];
  position: {
    index: number;
    total: number;
    label: string;
  };
  subtitle: string;
  edit: AlbumEditFields;
}
