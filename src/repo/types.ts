/**
 * Types for the repository adapter.
 *
 * The adapter moves whole files in and out of the album data directory.
 * It knows nothing about albums.
 */

/**
 * Content of one file in the data directory.
 */
export interface RepoFile {
  /** Path relative to the data directory */
  path: string;
  content: string;
}

/**
 * Full replacement of a file.
 */
export interface WriteFileOptions {
  /** Path relative to the data directory */
  path: string;
  content: string;
}

/**
 * Outcome of a write.
 */
export interface FileOperationResult {
  success: boolean;
  /** Error message if failed */
  error?: string;
}

export interface RepoAdapter {
  /**
   * Read a file.
   *
   * @returns null when the file does not exist
   */
  getFile(path: string): Promise<RepoFile | null>;

  /**
   * Replace a file's content as a single visible unit.
   *
   * Readers see either the previous content or the new content, never a
   * partially written file.
   */
  writeFile(options: WriteFileOptions): Promise<FileOperationResult>;

  /**
   * Create the data directory if needed.
   */
  initialize?(): Promise<void>;
}

export interface LocalRepoConfig {
  /** Data directory holding the collection file */
  basePath: string;
}
