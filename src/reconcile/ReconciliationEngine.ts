/**
 * ReconciliationEngine — Merge scraped candidates into a loaded collection.
 *
 * Merge policy:
 * - a url seen for the first time creates an album with a fresh id
 * - an existing title is never replaced
 * - an item count only fills a missing one (absent or 0)
 * - dates (single ingest only) replace the stored range when they differ
 *
 * The engine mutates the collection in memory; persisting it is the caller's job.
 */

import { randomUUID } from 'node:crypto';
import type {
  Album,
  BatchCandidate,
  IngestInput,
  IngestReport,
  MergeResult,
  SingleCandidate,
} from '../types/album.js';
import type { AlbumCollection } from '../store/AlbumCollection.js';
import { DEFAULT_TITLE } from '../store/AlbumParser.js';
import { buildRange, splitRange, type DateNormalizer, type DateSpan } from '../dates/DateNormalizer.js';

/**
 * Buckets of ids by outcome.
 */
export interface BatchReport {
  createdIds: string[];
  updatedIds: string[];
  unchangedIds: string[];
}

export type IdGenerator = () => string;

export interface ReconciliationEngineOptions {
  normalizer: DateNormalizer;
  /** Source of ids for new albums (default: random UUID) */
  generateId?: IdGenerator;
}

function emptyReport(): BatchReport {
  return { createdIds: [], updatedIds: [], unchangedIds: [] };
}

function addToReport(report: BatchReport, result: MergeResult): void {
  switch (result.outcome) {
    case 'created':
      report.createdIds.push(result.id);
      break;
    case 'updated':
      report.updatedIds.push(result.id);
      break;
    case 'unchanged':
      report.unchangedIds.push(result.id);
      break;
  }
}

export class ReconciliationEngine {
  private readonly normalizer: DateNormalizer;
  private readonly generateId: IdGenerator;

  constructor(options: ReconciliationEngineOptions) {
    this.normalizer = options.normalizer;
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Merge a single-album scrape, dates included.
   *
   * Returns null when the candidate has no url.
   */
  mergeSingle(collection: AlbumCollection, candidate: SingleCandidate): MergeResult | null {
    return this.merge(collection, candidate, this.candidateSpan(candidate));
  }

  /**
   * Merge an album-list scrape. Candidates without a url are skipped.
   */
  mergeBatch(collection: AlbumCollection, candidates: readonly BatchCandidate[]): BatchReport {
    const report = emptyReport();
    for (const candidate of candidates) {
      const result = this.merge(collection, candidate, null);
      if (result) {
        addToReport(report, result);
      }
    }
    return report;
  }

  /**
   * Run a classified ingest and build its report.
   */
  ingest(collection: AlbumCollection, input: IngestInput): IngestReport {
    if (input.kind === 'bulk') {
      return { kind: 'bulk', ...this.mergeBatch(collection, input.candidates) };
    }

    const report = emptyReport();
    const result = this.mergeSingle(collection, input.candidate);
    if (!result) {
      return { kind: 'single', ...report };
    }
    addToReport(report, result);

    const album = collection.findById(result.id);
    return {
      kind: 'single',
      ...report,
      ...(album !== undefined ? { album: { url: album.url, title: album.title } } : {}),
    };
  }

  private merge(
    collection: AlbumCollection,
    candidate: BatchCandidate,
    span: DateSpan | null
  ): MergeResult | null {
    const url = candidate.url.trim();
    if (url === '') {
      return null;
    }

    const existing = collection.get(url);
    if (!existing) {
      const album: Album = {
        id: this.generateId(),
        url,
        title: candidate.title ?? DEFAULT_TITLE,
        ...(candidate.itemCount !== undefined ? { itemCount: candidate.itemCount } : {}),
        tags: [],
        ...(span !== null ? spanFields(span) : {}),
      };
      collection.set(album);
      return { id: album.id, outcome: 'created' };
    }

    const updated: Album = { ...existing };
    let changed = false;

    if (
      candidate.itemCount !== undefined &&
      !existing.itemCount &&
      candidate.itemCount !== existing.itemCount
    ) {
      updated.itemCount = candidate.itemCount;
      changed = true;
    }

    if (span !== null) {
      const newRange = buildRange(span.startDate, span.endDate);
      if (newRange !== this.existingRange(existing)) {
        updated.dateRange = newRange;
        updated.startDate = span.startDate;
        if (span.endDate !== undefined) {
          updated.endDate = span.endDate;
        } else {
          delete updated.endDate;
        }
        changed = true;
      }
    }

    if (!changed) {
      return { id: existing.id, outcome: 'unchanged' };
    }
    collection.set(updated);
    return { id: existing.id, outcome: 'updated' };
  }

  /**
   * Normalized dates of a single candidate, or null when it has no usable start.
   */
  private candidateSpan(candidate: SingleCandidate): DateSpan | null {
    const startDate = this.normalizer.normalize(candidate.startDate);
    if (startDate === null) {
      return null;
    }
    const endDate = this.normalizer.normalize(candidate.endDate);
    if (endDate === null || endDate < startDate) {
      return { startDate };
    }
    return { startDate, endDate };
  }

  /**
   * Stored range rebuilt from normalized fields, for comparison.
   */
  private existingRange(album: Album): string | null {
    const startDate = this.normalizer.normalize(album.startDate);
    if (startDate !== null) {
      const endDate = this.normalizer.normalize(album.endDate);
      return buildRange(startDate, endDate ?? undefined);
    }
    if (album.dateRange !== undefined) {
      const span = splitRange(album.dateRange);
      if (span) {
        return buildRange(span.startDate, span.endDate);
      }
    }
    return null;
  }
}

function spanFields(span: DateSpan): Pick<Album, 'dateRange' | 'startDate' | 'endDate'> {
  return {
    dateRange: buildRange(span.startDate, span.endDate),
    startDate: span.startDate,
    ...(span.endDate !== undefined ? { endDate: span.endDate } : {}),
  };
}

export function createReconciliationEngine(options: ReconciliationEngineOptions): ReconciliationEngine {
  return new ReconciliationEngine(options);
}
