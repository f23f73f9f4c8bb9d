/**
 * Repository module exports.
 */

export * from './types.js';
export * from './LocalRepoAdapter.js';
