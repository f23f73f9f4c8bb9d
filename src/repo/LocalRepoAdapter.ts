/**
 * LocalRepoAdapter — Data directory on the local filesystem.
 *
 * Writes go to a temporary sibling file which is then renamed over the
 * target, so the target always holds either the old or the new content.
 */

import { readFile, writeFile, mkdir, rename, rm } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { randomUUID } from 'node:crypto';
import type {
  RepoAdapter,
  RepoFile,
  WriteFileOptions,
  FileOperationResult,
  LocalRepoConfig,
} from './types.js';
import { errorMessage } from '../types/errors.js';
import { isRecord } from '../types/common.js';

function isNotFound(err: unknown): boolean {
  return isRecord(err) && err.code === 'ENOENT';
}

export class LocalRepoAdapter implements RepoAdapter {
  private readonly dataDir: string;

  constructor(config: LocalRepoConfig) {
    this.dataDir = config.basePath;
  }

  async initialize(): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
  }

  /**
   * Absolute location of a data file.
   */
  locate(path: string): string {
    return join(this.dataDir, path);
  }

  async getFile(path: string): Promise<RepoFile | null> {
    let content: string;
    try {
      content = await readFile(this.locate(path), 'utf-8');
    } catch (err) {
      if (isNotFound(err)) {
        return null;
      }
      throw err;
    }
    return { path, content };
  }

  /**
   * Replace a file through a temporary sibling and a rename.
   */
  async writeFile(options: WriteFileOptions): Promise<FileOperationResult> {
    const target = this.locate(options.path);
    const staging = `${target}.${randomUUID()}.tmp`;

    try {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(staging, options.content, 'utf-8');
      await rename(staging, target);
    } catch (err) {
      await rm(staging, { force: true }).catch((cleanupErr: unknown) => {
        console.warn(`Failed to remove temporary file ${staging}:`, cleanupErr);
      });
      return { success: false, error: errorMessage(err) };
    }

    return { success: true };
  }
}

export function createLocalRepoAdapter(config: LocalRepoConfig): LocalRepoAdapter {
  return new LocalRepoAdapter(config);
}
