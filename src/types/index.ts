/**
 * Type exports.
 */

export * from './album.js';
export * from './errors.js';
export * from './common.js';
