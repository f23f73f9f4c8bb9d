/**
 * AlbumService — The operations exposed to adapters.
 *
 * Every call loads a fresh snapshot from the store. Mutating calls write the
 * whole snapshot back once, and only when something changed. Arguments are
 * validated before the store is touched.
 */

import type {
  Album,
  BatchCandidate,
  IngestInput,
  IngestReport,
  MergeResult,
  SearchFilters,
  SearchResult,
  SingleCandidate,
  TagAction,
  TagCount,
  ToggleOutcome,
} from '../types/album.js';
import { NotFoundError, ValidationError } from '../types/errors.js';
import type { AlbumStore } from '../store/types.js';
import type { AlbumCollection } from '../store/AlbumCollection.js';
import { displayDate, displayRange, type DateNormalizer } from '../dates/DateNormalizer.js';
import { ReconciliationEngine, type BatchReport, type IdGenerator } from '../reconcile/ReconciliationEngine.js';
import {
  classifyIngestInput,
  parseBatchCandidates,
  parseIngestText,
  parseSingleCandidate,
} from '../reconcile/IngestInput.js';
import { QueryEngine } from '../query/QueryEngine.js';
import { allTags, filterTags, tagMenu, toggle, type TagMenu } from '../tags/TagIndex.js';
import { computeStats, type AlbumStatsReport } from '../stats/AlbumStats.js';

export interface AlbumServiceOptions {
  store: AlbumStore;
  normalizer: DateNormalizer;
  /** Suffix stripped from titles in search results */
  titleSuffix?: string;
  /** Source of ids for new albums */
  generateId?: IdGenerator;
}

export interface TitleEdit {
  oldTitle: string;
  newTitle: string;
}

export interface ItemCountEdit {
  oldCount: number | null;
  newCount: number;
}

export interface DateEdit {
  dateRange: string;
  startDate: string;
  endDate?: string;
  /** Human-readable form of the new date */
  display: string;
}

function requireText(value: string, field: string): string {
  const trimmed = value.trim();
  if (trimmed === '') {
    throw new ValidationError(`${field} must not be empty`, { field });
  }
  return trimmed;
}

function parseCount(value: number | string): number {
  if (typeof value === 'number') {
    if (Number.isInteger(value) && value >= 0) {
      return value;
    }
  } else if (/^\s*\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  throw new ValidationError(`Item count must be a non-negative integer, got ${String(value)}`, {
    field: 'itemCount',
  });
}

export class AlbumService {
  private readonly store: AlbumStore;
  private readonly normalizer: DateNormalizer;
  private readonly reconciler: ReconciliationEngine;
  private readonly queries: QueryEngine;

  constructor(options: AlbumServiceOptions) {
    this.store = options.store;
    this.normalizer = options.normalizer;
    this.reconciler = new ReconciliationEngine({
      normalizer: options.normalizer,
      ...(options.generateId !== undefined ? { generateId: options.generateId } : {}),
    });
    this.queries = new QueryEngine({
      normalizer: options.normalizer,
      ...(options.titleSuffix !== undefined ? { titleSuffix: options.titleSuffix } : {}),
    });
  }

  // ============================================================================
  // Ingest
  // ============================================================================

  /**
   * Classify a raw scraper payload and merge it.
   *
   * @throws FormatError when the payload is not recognized
   */
  async ingest(raw: unknown): Promise<IngestReport> {
    return this.apply(classifyIngestInput(raw));
  }

  /**
   * Parse scraper JSON text and merge it.
   *
   * @throws FormatError for invalid JSON or an unrecognized payload
   */
  async ingestText(text: string): Promise<IngestReport> {
    return this.apply(parseIngestText(text));
  }

  private async apply(input: IngestInput): Promise<IngestReport> {
    const collection = await this.store.load();
    const report = this.reconciler.ingest(collection, input);
    await this.saveIfChanged(collection, report);
    return report;
  }

  /**
   * Merge one single-album candidate. Returns null when it has no url.
   *
   * @throws ValidationError for a malformed field, before the store is loaded
   */
  async ingestSingle(candidate: SingleCandidate): Promise<MergeResult | null> {
    const checked = parseSingleCandidate(candidate);
    if (checked.url.trim() === '') {
      return null;
    }
    const collection = await this.store.load();
    const result = this.reconciler.mergeSingle(collection, checked);
    if (result && result.outcome !== 'unchanged') {
      await this.store.save(collection);
    }
    return result;
  }

  /**
   * Merge a list of album-list candidates.
   *
   * @throws ValidationError for a malformed element, before the store is loaded
   */
  async ingestBatch(candidates: readonly BatchCandidate[]): Promise<BatchReport> {
    const checked = parseBatchCandidates(candidates);
    const collection = await this.store.load();
    const report = this.reconciler.mergeBatch(collection, checked);
    await this.saveIfChanged(collection, report);
    return report;
  }

  // ============================================================================
  // Queries
  // ============================================================================

  async search(query: string, filters: SearchFilters = {}): Promise<SearchResult[]> {
    const collection = await this.store.load();
    return this.queries.search(collection, query, filters);
  }

  async getAlbum(url: string): Promise<Album> {
    const key = requireText(url, 'url');
    const collection = await this.store.load();
    return this.find(collection, key);
  }

  async stats(): Promise<AlbumStatsReport> {
    const collection = await this.store.load();
    return computeStats(collection);
  }

  async count(): Promise<number> {
    const collection = await this.store.load();
    return collection.size;
  }

  // ============================================================================
  // Tags
  // ============================================================================

  async listTags(filter?: string): Promise<TagCount[]> {
    const collection = await this.store.load();
    return filterTags(allTags(collection, 'listing'), filter);
  }

  async tagMenu(url: string, filter?: string): Promise<TagMenu> {
    const key = requireText(url, 'url');
    const collection = await this.store.load();
    return tagMenu(collection, this.find(collection, key), filter);
  }

  /**
   * Add or remove a tag. Only an applied change is written.
   */
  async toggleTag(url: string, tag: string, action: TagAction): Promise<ToggleOutcome> {
    const key = requireText(url, 'url');
    const name = requireText(tag, 'tag');

    const collection = await this.store.load();
    const album = collection.get(key);
    if (!album) {
      return 'album-not-found';
    }

    const result = toggle(album, name, action);
    if (result.outcome === 'applied') {
      collection.set(result.album);
      await this.store.save(collection);
    }
    return result.outcome;
  }

  // ============================================================================
  // Edits
  // ============================================================================

  async editTitle(url: string, newTitle: string): Promise<TitleEdit> {
    const key = requireText(url, 'url');
    const title = requireText(newTitle, 'title');

    const collection = await this.store.load();
    const album = this.find(collection, key);
    collection.set({ ...album, title });
    await this.store.save(collection);

    return { oldTitle: album.title, newTitle: title };
  }

  async editItemCount(url: string, newCount: number | string): Promise<ItemCountEdit> {
    const key = requireText(url, 'url');
    const itemCount = parseCount(newCount);

    const collection = await this.store.load();
    const album = this.find(collection, key);
    collection.set({ ...album, itemCount });
    await this.store.save(collection);

    return { oldCount: album.itemCount ?? null, newCount: itemCount };
  }

  /**
   * Replace an album's date with user input (`date` or `start--end`).
   */
  async editDate(url: string, dateInput: string): Promise<DateEdit> {
    const key = requireText(url, 'url');
    const parsed = this.normalizer.parseDateInput(dateInput);
    if (!parsed) {
      throw new ValidationError(
        `Invalid date "${dateInput}": use YYYY-MM-DD or YYYY-MM-DD--YYYY-MM-DD`,
        { field: 'date' }
      );
    }

    const collection = await this.store.load();
    const album = this.find(collection, key);

    const updated: Album = {
      ...album,
      dateRange: parsed.dateRange,
      startDate: parsed.startDate,
    };
    if (parsed.endDate !== undefined) {
      updated.endDate = parsed.endDate;
    } else {
      delete updated.endDate;
    }
    collection.set(updated);
    await this.store.save(collection);

    return {
      dateRange: parsed.dateRange,
      startDate: parsed.startDate,
      ...(parsed.endDate !== undefined ? { endDate: parsed.endDate } : {}),
      display:
        parsed.endDate !== undefined
          ? displayRange(parsed.startDate, parsed.endDate)
          : displayDate(parsed.startDate),
    };
  }

  async deleteAlbum(url: string): Promise<Album> {
    const key = requireText(url, 'url');

    const collection = await this.store.load();
    const album = collection.delete(key);
    if (!album) {
      throw new NotFoundError(key);
    }
    await this.store.save(collection);
    return album;
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private find(collection: AlbumCollection, url: string): Album {
    const album = collection.get(url);
    if (!album) {
      throw new NotFoundError(url);
    }
    return album;
  }

  private async saveIfChanged(collection: AlbumCollection, report: BatchReport): Promise<void> {
    if (report.createdIds.length > 0 || report.updatedIds.length > 0) {
      await this.store.save(collection);
    }
  }
}

export function createAlbumService(options: AlbumServiceOptions): AlbumService {
  return new AlbumService(options);
}
