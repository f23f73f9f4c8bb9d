/**
 * album-ledger — Photo album records with scrape reconciliation, tagging and search.
 *
 * This is the main entry point for the library.
 */

// Types
export * from './types/index.js';

// Repository adapter
export * from './repo/index.js';

// Album store
export * from './store/types.js';
export { AlbumCollection } from './store/AlbumCollection.js';
export { AlbumStoreImpl, createAlbumStore } from './store/AlbumStoreImpl.js';
export { parseAlbumLine, serializeAlbum, serializeAlbums } from './store/AlbumParser.js';
export { AlbumValidator, createAlbumValidator } from './validation/AlbumValidator.js';

// Dates
export * from './dates/DateNormalizer.js';

// Reconciliation
export * from './reconcile/ReconciliationEngine.js';
export { classifyIngestInput, parseIngestText } from './reconcile/IngestInput.js';

// Queries, tags and stats
export * from './query/QueryEngine.js';
export * from './query/QueryParser.js';
export * from './query/formatters.js';
export * from './tags/TagIndex.js';
export * from './stats/AlbumStats.js';

// Service
export * from './service/AlbumService.js';

// Configuration
export { loadConfig, validateConfig, mergeWithDefaults, ConfigValidationError } from './config/loader.js';
export * from './config/types.js';

// Server
export { initializeApp, createServer, startServer } from './server.js';
export type { AppContext, InitializeOptions } from './server.js';
