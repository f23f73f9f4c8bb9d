/**
 * AlbumStoreImpl — Line-oriented album collection on top of a RepoAdapter.
 *
 * One album per line. The whole file is read on load and rewritten on save;
 * the adapter makes the rewrite a single visible replacement.
 */

import type { RepoAdapter } from '../repo/types.js';
import type { AlbumValidator } from '../validation/AlbumValidator.js';
import { PersistenceError, errorMessage } from '../types/errors.js';
import { AlbumCollection } from './AlbumCollection.js';
import { parseAlbumLine, serializeAlbums } from './AlbumParser.js';
import type { AlbumStore, AlbumStoreConfig, ParsePolicy, SaveResult } from './types.js';

/**
 * Default configuration.
 */
const DEFAULT_CONFIG: Required<AlbumStoreConfig> = {
  fileName: 'photoAlbums.json',
  parsePolicy: 'strict',
};

const LINE_BREAK = /\r?\n/;

export class AlbumStoreImpl implements AlbumStore {
  private readonly config: Required<AlbumStoreConfig>;
  private readonly repo: RepoAdapter;
  private readonly validator: AlbumValidator;

  constructor(
    repo: RepoAdapter,
    validator: AlbumValidator,
    config: AlbumStoreConfig = {}
  ) {
    this.repo = repo;
    this.validator = validator;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get fileName(): string {
    return this.config.fileName;
  }

  get parsePolicy(): ParsePolicy {
    return this.config.parsePolicy;
  }

  /**
   * Load the whole collection.
   */
  async load(): Promise<AlbumCollection> {
    const file = await this.repo.getFile(this.config.fileName).catch((err: unknown) => {
      throw new PersistenceError(
        `Failed to read ${this.config.fileName}: ${errorMessage(err)}`
      );
    });
    if (!file) {
      return new AlbumCollection();
    }

    const collection = new AlbumCollection();
    const lines = file.content.split(LINE_BREAK);

    for (const [index, rawLine] of lines.entries()) {
      const line = rawLine.trim();
      if (line === '') continue;

      const result = parseAlbumLine(line, this.validator);
      if (!result.success || !result.album) {
        const lineNumber = index + 1;
        const message = `Invalid album record at ${this.config.fileName}:${lineNumber}: ${result.error ?? 'unknown error'}`;

        if (this.config.parsePolicy === 'strict') {
          throw new PersistenceError(message, {
            line: lineNumber,
            ...(result.issues !== undefined ? { issues: result.issues } : {}),
          });
        }
        console.warn(`${message} (skipped)`);
        continue;
      }

      collection.set(result.album);
    }

    return collection;
  }

  /**
   * Replace the collection file with the given snapshot.
   */
  async save(collection: AlbumCollection): Promise<SaveResult> {
    const content = serializeAlbums(collection);

    const result = await this.repo.writeFile({
      path: this.config.fileName,
      content,
    }).catch((err: unknown) => {
      throw new PersistenceError(
        `Failed to write ${this.config.fileName}: ${errorMessage(err)}`
      );
    });

    if (!result.success) {
      throw new PersistenceError(
        `Failed to write ${this.config.fileName}: ${result.error ?? 'unknown error'}`
      );
    }

    return { count: collection.size };
  }
}

/**
 * Create a new AlbumStore instance.
 */
export function createAlbumStore(
  repo: RepoAdapter,
  validator: AlbumValidator,
  config?: AlbumStoreConfig
): AlbumStoreImpl {
  return new AlbumStoreImpl(repo, validator, config);
}
