/**
 * Error taxonomy for album operations.
 *
 * Every error carries a stable `code` so adapters can map it to a status
 * code or an exit code without string matching.
 */

export type AlbumErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'PERSISTENCE_ERROR'
  | 'FORMAT_ERROR';

/**
 * Base class for all album ledger errors.
 */
export class AlbumLedgerError extends Error {
  constructor(
    public readonly code: AlbumErrorCode,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'AlbumLedgerError';
  }
}

/**
 * A required field is missing or malformed.
 */
export class ValidationError extends AlbumLedgerError {
  constructor(message: string, details?: unknown) {
    super('VALIDATION_ERROR', message, details);
    this.name = 'ValidationError';
  }
}

/**
 * The operation targets a url that is not in the store.
 */
export class NotFoundError extends AlbumLedgerError {
  constructor(public readonly url: string) {
    super('NOT_FOUND', `Album not found: ${url}`);
    this.name = 'NotFoundError';
  }
}

/**
 * The collection could not be read or written.
 */
export class PersistenceError extends AlbumLedgerError {
  constructor(message: string, details?: unknown) {
    super('PERSISTENCE_ERROR', message, details);
    this.name = 'PersistenceError';
  }
}

/**
 * Top-level input shape is not recognized.
 */
export class FormatError extends AlbumLedgerError {
  constructor(message: string, details?: unknown) {
    super('FORMAT_ERROR', message, details);
    this.name = 'FormatError';
  }
}

export function isAlbumLedgerError(err: unknown): err is AlbumLedgerError {
  return err instanceof AlbumLedgerError;
}

/**
 * Render any thrown value as a message.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
