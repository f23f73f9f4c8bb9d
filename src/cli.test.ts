/**
 * Tests for the command runner.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { runCommand, type CliIO } from './cli.js';
import { createAlbumService, type AlbumService } from './service/AlbumService.js';
import { createAlbumStore } from './store/AlbumStoreImpl.js';
import { createLocalRepoAdapter } from './repo/LocalRepoAdapter.js';
import { createAlbumValidator } from './validation/AlbumValidator.js';
import { createDateNormalizer } from './dates/DateNormalizer.js';

const TRIP_URL = 'https://photos.example/trip';

describe('runCommand', () => {
  let testDir: string;
  let service: AlbumService;
  let output: string[];
  let stdin: string;
  let io: CliIO;

  beforeEach(async () => {
    testDir = join(tmpdir(), `album-ledger-cli-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
    let nextId = 0;
    service = createAlbumService({
      store: createAlbumStore(createLocalRepoAdapter({ basePath: testDir }), createAlbumValidator()),
      normalizer: createDateNormalizer({ referenceYear: 2025 }),
      generateId: () => `album-${++nextId}`,
    });
    output = [];
    stdin = '';
    io = {
      write: line => {
        output.push(line);
      },
      readInput: async () => stdin,
    };
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  function lastJson(): unknown {
    const last = output[output.length - 1];
    return last === undefined ? undefined : JSON.parse(last);
  }

  async function run(...argv: string[]): Promise<number> {
    return runCommand(argv, service, io);
  }

  async function ingestTrip(): Promise<void> {
    const payload = JSON.stringify({
      type: 'single',
      url: TRIP_URL,
      title: 'Trip - Google Photos',
      startDate: 'Mar 1, 2023',
    });
    expect(await run('ingest', payload)).toBe(0);
  }

  it('ingests a payload given as an argument', async () => {
    await ingestTrip();

    expect(lastJson()).toEqual({
      report: {
        kind: 'single',
        createdIds: ['album-1'],
        updatedIds: [],
        unchangedIds: [],
        album: { url: TRIP_URL, title: 'Trip - Google Photos' },
      },
      link: `[Photos: Trip](${TRIP_URL})`,
    });
  });

  it('reads the payload from input for "-"', async () => {
    stdin = JSON.stringify({ type: 'bulk', albums: [{ url: 'https://photos.example/a' }] });

    expect(await run('ingest', '-')).toBe(0);
    expect(lastJson()).toEqual({
      report: { kind: 'bulk', createdIds: ['album-1'], updatedIds: [], unchangedIds: [] },
    });
  });

  it('reports invalid JSON as a format error', async () => {
    expect(await run('ingest', '{oops')).toBe(1);

    const body = lastJson();
    expect(body).toMatchObject({ error: 'FORMAT_ERROR' });
  });

  it('searches with flags', async () => {
    await ingestTrip();
    await run('toggle-tag', TRIP_URL, 'family', 'add');

    expect(await run('search', 'trip', '--tag', 'family', '--ids', 'album-1,album-9')).toBe(0);
    expect(lastJson()).toMatchObject({ total: 1, results: [{ id: 'album-1', title: 'Trip' }] });

    expect(await run('search', '--tag', 'other')).toBe(0);
    expect(lastJson()).toEqual({ results: [], total: 0 });
  });

  it('lists tags and builds a tag menu', async () => {
    await ingestTrip();
    await run('toggle-tag', TRIP_URL, 'family', 'add');

    expect(await run('tags')).toBe(0);
    expect(lastJson()).toEqual({ tags: [{ tag: 'family', count: 1 }], total: 1 });

    expect(await run('tag-menu', TRIP_URL, 'family')).toBe(0);
    expect(lastJson()).toEqual({
      url: TRIP_URL,
      title: 'Trip - Google Photos',
      currentTags: ['family'],
      entries: [{ tag: 'family', count: 1, action: 'remove', isNew: false }],
    });
  });

  it('exits 1 when toggling a tag on a missing album', async () => {
    expect(await run('toggle-tag', 'https://photos.example/none', 'x', 'add')).toBe(1);
    expect(lastJson()).toEqual({ outcome: 'album-not-found' });
  });

  it('joins the remaining words of a title', async () => {
    await ingestTrip();

    expect(await run('edit-title', TRIP_URL, 'Spring', 'Trip')).toBe(0);
    expect(lastJson()).toEqual({ oldTitle: 'Trip - Google Photos', newTitle: 'Spring Trip' });
  });

  it('edits the count and the date', async () => {
    await ingestTrip();

    expect(await run('edit-count', TRIP_URL, '42')).toBe(0);
    expect(lastJson()).toEqual({ oldCount: null, newCount: 42 });

    expect(await run('edit-date', TRIP_URL, '2023-03-01--2023-03-03')).toBe(0);
    expect(lastJson()).toEqual({
      dateRange: '2023-03-01--2023-03-03',
      startDate: '2023-03-01',
      endDate: '2023-03-03',
      display: 'Mar 01 – Mar 03, 2023',
    });
  });

  it('reports service errors with their code', async () => {
    await ingestTrip();

    expect(await run('edit-count', TRIP_URL, 'many')).toBe(1);
    expect(lastJson()).toEqual({
      error: 'VALIDATION_ERROR',
      message: 'Item count must be a non-negative integer, got many',
    });

    expect(await run('delete', 'https://photos.example/none')).toBe(1);
    expect(lastJson()).toEqual({ error: 'NOT_FOUND', message: 'Album not found: https://photos.example/none' });
  });

  it('rejects stray arguments to edit-count without writing', async () => {
    await ingestTrip();

    expect(await run('edit-count', TRIP_URL, '5', 'extra')).toBe(1);
    expect(lastJson()).toEqual({
      error: 'USAGE_ERROR',
      message: expect.stringContaining('Invalid arguments for edit-count'),
    });
    expect((await service.getAlbum(TRIP_URL)).itemCount).toBeUndefined();
  });

  it('deletes an album and updates the stats', async () => {
    await ingestTrip();

    expect(await run('delete', TRIP_URL)).toBe(0);
    expect(lastJson()).toMatchObject({ deleted: { id: 'album-1', url: TRIP_URL } });

    expect(await run('stats')).toBe(0);
    expect(lastJson()).toMatchObject({ all: [] });
  });

  it('rejects unknown commands, options and missing arguments', async () => {
    expect(await run('frobnicate')).toBe(1);
    expect(lastJson()).toMatchObject({ error: 'USAGE_ERROR' });

    expect(await run('search', '--limit', '3')).toBe(1);
    expect(lastJson()).toEqual({ error: 'USAGE_ERROR', message: 'Unknown option: --limit' });

    expect(await run('toggle-tag', TRIP_URL, 'x', 'flip')).toBe(1);
    expect(lastJson()).toMatchObject({ error: 'USAGE_ERROR' });

    expect(await run('edit-count', TRIP_URL)).toBe(1);
    expect(lastJson()).toMatchObject({ error: 'USAGE_ERROR' });

    expect(await runCommand([], service, io)).toBe(1);
    expect(lastJson()).toMatchObject({ error: 'USAGE_ERROR' });
  });
});
