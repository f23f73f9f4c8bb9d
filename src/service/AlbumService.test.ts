/**
 * Tests for the album service against a store in a temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, rm, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { AlbumService } from './AlbumService.js';
import { createAlbumStore, type AlbumStoreImpl } from '../store/AlbumStoreImpl.js';
import { createLocalRepoAdapter } from '../repo/LocalRepoAdapter.js';
import { createAlbumValidator } from '../validation/AlbumValidator.js';
import { createDateNormalizer } from '../dates/DateNormalizer.js';
import { FormatError, NotFoundError, ValidationError } from '../types/errors.js';

const validator = createAlbumValidator();

describe('AlbumService', () => {
  let testDir: string;
  let store: AlbumStoreImpl;
  let service: AlbumService;
  let nextId: number;

  beforeEach(async () => {
    testDir = join(tmpdir(), `album-ledger-service-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
    nextId = 0;
    store = createAlbumStore(createLocalRepoAdapter({ basePath: testDir }), validator);
    service = new AlbumService({
      store,
      normalizer: createDateNormalizer({ referenceYear: 2025 }),
      generateId: () => `album-${++nextId}`,
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  async function seed(): Promise<void> {
    await service.ingest({
      type: 'bulk',
      albums: [
        { url: 'https://photos.example/a', title: 'Beach - Google Photos', itemCount: 12 },
        { url: 'https://photos.example/b', title: 'Mountains' },
      ],
    });
  }

  describe('ingest', () => {
    it('creates, then reports unchanged on the same single scrape', async () => {
      const payload = {
        type: 'single',
        url: 'https://photos.example/trip',
        title: 'Trip',
        itemCount: 5,
        startDate: 'Mar 1, 2023',
        endDate: 'Mar 3, 2023',
      };

      const first = await service.ingest(payload);
      const save = vi.spyOn(store, 'save');
      const second = await service.ingest(payload);

      expect(first).toEqual({
        kind: 'single',
        createdIds: ['album-1'],
        updatedIds: [],
        unchangedIds: [],
        album: { url: 'https://photos.example/trip', title: 'Trip' },
      });
      expect(second.unchangedIds).toEqual(['album-1']);
      expect(save).not.toHaveBeenCalled();

      const album = await service.getAlbum('https://photos.example/trip');
      expect(album.dateRange).toBe('2023-03-01--2023-03-03');
      expect(album.startDate).toBe('2023-03-01');
      expect(album.endDate).toBe('2023-03-03');
    });

    it('persists one line per album', async () => {
      await seed();

      const content = await readFile(join(testDir, 'photoAlbums.json'), 'utf-8');

      expect(content).toBe(
        '{"id":"album-1","url":"https://photos.example/a","title":"Beach - Google Photos","itemCount":12,"tags":[]}\n' +
          '{"id":"album-2","url":"https://photos.example/b","title":"Mountains","tags":[]}\n'
      );
    });

    it('rejects unknown payloads without touching the store', async () => {
      const load = vi.spyOn(store, 'load');

      await expect(service.ingest({ error: 'Not an album page' })).rejects.toBeInstanceOf(FormatError);
      expect(load).not.toHaveBeenCalled();
    });

    it('parses scraper text before merging', async () => {
      const report = await service.ingestText('{"type":"bulk","albums":[{"url":"https://photos.example/c"}]}');

      expect(report.createdIds).toEqual(['album-1']);
      await expect(service.ingestText('not json')).rejects.toBeInstanceOf(FormatError);
    });

    it('does not write for an empty batch', async () => {
      const save = vi.spyOn(store, 'save');

      const report = await service.ingest({ type: 'bulk', albums: [] });

      expect(report).toEqual({ kind: 'bulk', createdIds: [], updatedIds: [], unchangedIds: [] });
      expect(save).not.toHaveBeenCalled();
    });
  });

  describe('ingestSingle and ingestBatch', () => {
    it('returns null for an empty url', async () => {
      expect(await service.ingestSingle({ url: ' ' })).toBeNull();
    });

    it('fills a missing count from a later batch', async () => {
      await seed();

      const report = await service.ingestBatch([
        { url: 'https://photos.example/b', itemCount: 40 },
        { url: 'https://photos.example/a', itemCount: 99 },
      ]);

      expect(report).toEqual({ createdIds: [], updatedIds: ['album-2'], unchangedIds: ['album-1'] });
      expect((await service.getAlbum('https://photos.example/a')).itemCount).toBe(12);
      expect((await service.getAlbum('https://photos.example/b')).itemCount).toBe(40);
    });

    it('rejects a batch with an invalid count and leaves the file as it was', async () => {
      await seed();
      const before = await readFile(join(testDir, 'photoAlbums.json'), 'utf-8');
      const load = vi.spyOn(store, 'load');

      await expect(
        service.ingestBatch([
          { url: 'https://photos.example/c', title: 'C', itemCount: 3 },
          { url: 'https://photos.example/d', title: 'D', itemCount: -5 },
        ])
      ).rejects.toBeInstanceOf(ValidationError);

      expect(load).not.toHaveBeenCalled();
      expect(await readFile(join(testDir, 'photoAlbums.json'), 'utf-8')).toBe(before);
      expect(await service.count()).toBe(2);
    });

    it('rejects a single candidate with a fractional count', async () => {
      await seed();
      const before = await readFile(join(testDir, 'photoAlbums.json'), 'utf-8');

      await expect(
        service.ingestSingle({ url: 'https://photos.example/c', itemCount: 2.5 })
      ).rejects.toBeInstanceOf(ValidationError);

      expect(await readFile(join(testDir, 'photoAlbums.json'), 'utf-8')).toBe(before);
      expect((await service.search('')).map(r => r.id)).toEqual(['album-1', 'album-2']);
    });
  });

  describe('search', () => {
    it('returns decorated results', async () => {
      await seed();

      const results = await service.search('beach');

      expect(results).toHaveLength(1);
      expect(results[0]?.title).toBe('Beach (12)');
      expect(results[0]?.subtitle).toBe('1/1 • https://photos.example/a');
    });
  });

  describe('tags', () => {
    it('toggles idempotently and writes only applied changes', async () => {
      await seed();
      const url = 'https://photos.example/a';

      expect(await service.toggleTag(url, 'summer', 'add')).toBe('applied');
      const save = vi.spyOn(store, 'save');
      expect(await service.toggleTag(url, 'summer', 'add')).toBe('already-in-that-state');
      expect(save).not.toHaveBeenCalled();

      expect(await service.toggleTag(url, 'summer', 'remove')).toBe('applied');
      expect(await service.toggleTag(url, 'summer', 'remove')).toBe('already-in-that-state');
    });

    it('reports a missing album as an outcome', async () => {
      expect(await service.toggleTag('https://photos.example/none', 'x', 'add')).toBe('album-not-found');
    });

    it('rejects an empty tag', async () => {
      await expect(service.toggleTag('https://photos.example/a', ' ', 'add')).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    it('lists and filters tags', async () => {
      await seed();
      await service.toggleTag('https://photos.example/a', 'family', 'add');
      await service.toggleTag('https://photos.example/b', 'family', 'add');
      await service.toggleTag('https://photos.example/b', 'Hiking', 'add');

      expect(await service.listTags()).toEqual([
        { tag: 'family', count: 2 },
        { tag: 'Hiking', count: 1 },
      ]);
      expect(await service.listTags('hik')).toEqual([{ tag: 'Hiking', count: 1 }]);
    });

    it('builds a tag menu for an album', async () => {
      await seed();
      await service.toggleTag('https://photos.example/b', 'family', 'add');

      const menu = await service.tagMenu('https://photos.example/a', 'new');

      expect(menu.title).toBe('Beach - Google Photos');
      expect(menu.entries).toEqual([{ tag: 'new', count: 0, action: 'add', isNew: true }]);
    });
  });

  describe('edits', () => {
    it('edits the title', async () => {
      await seed();

      const result = await service.editTitle('https://photos.example/b', '  Alps  ');

      expect(result).toEqual({ oldTitle: 'Mountains', newTitle: 'Alps' });
      expect((await service.getAlbum('https://photos.example/b')).title).toBe('Alps');
    });

    it('rejects an empty title before loading', async () => {
      const load = vi.spyOn(store, 'load');

      await expect(service.editTitle('https://photos.example/b', '   ')).rejects.toBeInstanceOf(ValidationError);
      expect(load).not.toHaveBeenCalled();
    });

    it('edits the item count', async () => {
      await seed();

      expect(await service.editItemCount('https://photos.example/b', '7')).toEqual({ oldCount: null, newCount: 7 });
      expect(await service.editItemCount('https://photos.example/b', 0)).toEqual({ oldCount: 7, newCount: 0 });
    });

    it('rejects negative and fractional counts', async () => {
      await expect(service.editItemCount('https://photos.example/b', -1)).rejects.toBeInstanceOf(ValidationError);
      await expect(service.editItemCount('https://photos.example/b', 2.5)).rejects.toBeInstanceOf(ValidationError);
      await expect(service.editItemCount('https://photos.example/b', 'ten')).rejects.toBeInstanceOf(ValidationError);
    });

    it('edits the date and clears the end when switching to one day', async () => {
      await seed();
      const url = 'https://photos.example/a';

      const range = await service.editDate(url, '2023-03-01--Mar 3, 2023');
      expect(range).toEqual({
        dateRange: '2023-03-01--2023-03-03',
        startDate: '2023-03-01',
        endDate: '2023-03-03',
        display: 'Mar 01 – Mar 03, 2023',
      });

      const single = await service.editDate(url, '2024-07-04');
      expect(single).toEqual({ dateRange: '2024-07-04', startDate: '2024-07-04', display: 'Jul 04, 2024' });

      const album = await service.getAlbum(url);
      expect(album.dateRange).toBe('2024-07-04');
      expect(album).not.toHaveProperty('endDate');
    });

    it('rejects unparseable and reversed dates', async () => {
      await expect(service.editDate('https://photos.example/a', 'soon')).rejects.toBeInstanceOf(ValidationError);
      await expect(service.editDate('https://photos.example/a', '2023-03-05--2023-03-01')).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    it('raises NotFoundError for unknown albums', async () => {
      await seed();

      await expect(service.editTitle('https://photos.example/none', 'X')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('deleteAlbum', () => {
    it('removes the album, then reports it missing', async () => {
      await seed();

      const deleted = await service.deleteAlbum('https://photos.example/a');

      expect(deleted.id).toBe('album-1');
      await expect(service.getAlbum('https://photos.example/a')).rejects.toBeInstanceOf(NotFoundError);
      await expect(service.deleteAlbum('https://photos.example/a')).rejects.toThrow(
        'Album not found: https://photos.example/a'
      );
      expect(await service.count()).toBe(1);
    });
  });

  describe('stats', () => {
    it('buckets the stored albums', async () => {
      await seed();
      await service.editDate('https://photos.example/a', '2023-01-01');

      const stats = await service.stats();

      expect(stats.complete).toEqual(['album-1']);
      expect(stats.missingBoth).toEqual(['album-2']);
    });
  });
});
