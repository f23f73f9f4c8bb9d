/**
 * Tests for Repository Adapter module.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile, readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { createLocalRepoAdapter, LocalRepoAdapter } from './LocalRepoAdapter.js';

describe('LocalRepoAdapter', () => {
  let testDir: string;
  let adapter: LocalRepoAdapter;

  beforeEach(async () => {
    testDir = join(tmpdir(), `album-ledger-repo-${randomUUID()}`);
    adapter = createLocalRepoAdapter({ basePath: testDir });
    await adapter.initialize();
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  describe('getFile', () => {
    it('returns null for a missing file', async () => {
      expect(await adapter.getFile('nope.json')).toBeNull();
    });

    it('reads the content', async () => {
      await writeFile(join(testDir, 'albums.json'), '{"url":"a"}\n', 'utf-8');

      const file = await adapter.getFile('albums.json');

      expect(file).toEqual({ path: 'albums.json', content: '{"url":"a"}\n' });
    });

    it('rethrows errors other than a missing file', async () => {
      await mkdir(join(testDir, 'dir.json'));

      await expect(adapter.getFile('dir.json')).rejects.toThrow();
    });
  });

  describe('writeFile', () => {
    it('creates missing directories', async () => {
      const result = await adapter.writeFile({ path: 'nested/dir/albums.json', content: 'x\n' });

      expect(result).toEqual({ success: true });
      expect(await readFile(join(testDir, 'nested/dir/albums.json'), 'utf-8')).toBe('x\n');
    });

    it('replaces existing content and leaves no temporary files', async () => {
      await adapter.writeFile({ path: 'albums.json', content: 'old\n' });
      await adapter.writeFile({ path: 'albums.json', content: 'new\n' });

      expect(await readFile(join(testDir, 'albums.json'), 'utf-8')).toBe('new\n');
      expect(await readdir(testDir)).toEqual(['albums.json']);
    });

    it('reports failure and cleans up when the target cannot be replaced', async () => {
      await mkdir(join(testDir, 'albums.json'));
      await writeFile(join(testDir, 'albums.json', 'keep'), 'k', 'utf-8');

      const result = await adapter.writeFile({ path: 'albums.json', content: 'new\n' });

      expect(result.success).toBe(false);
      expect(result.error).toBeDefined();
      expect(await readdir(testDir)).toEqual(['albums.json']);
    });
  });
});
