/**
 * Handler exports for the API layer.
 */

export * from './AlbumHandlers.js';
export * from './TagHandlers.js';
