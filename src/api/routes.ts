/**
 * Route configuration for the API.
 *
 * This module registers all API routes on a Fastify instance.
 * Route handlers are thin wrappers around AlbumService.
 */

import type { FastifyInstance } from 'fastify';
import type { AlbumHandlers } from './handlers/AlbumHandlers.js';
import type { TagHandlers } from './handlers/TagHandlers.js';
import type { HealthResponse } from './types.js';
import { errorMessage } from '../types/errors.js';

/**
 * Options for registering routes.
 */
export interface RouteOptions {
  albumHandlers: AlbumHandlers;
  tagHandlers: TagHandlers;
  albumCount: () => Promise<number>;
}

/**
 * Register all API routes on a Fastify instance.
 */
export function registerRoutes(
  fastify: FastifyInstance,
  options: RouteOptions
): void {
  const { albumHandlers, tagHandlers, albumCount } = options;

  // ============================================================================
  // Health Check
  // ============================================================================

  fastify.get('/health', async (request, reply): Promise<HealthResponse> => {
    try {
      return {
        status: 'ok',
        timestamp: new Date().toISOString(),
        albums: await albumCount(),
      };
    } catch (err) {
      request.log.error({ err }, `Health check failed: ${errorMessage(err)}`);
      reply.status(503);
      return {
        status: 'error',
        timestamp: new Date().toISOString(),
      };
    }
  });

  // ============================================================================
  // Album Routes
  // ============================================================================

  // Search albums
  fastify.get('/albums', albumHandlers.searchAlbums);

  // Completeness buckets
  fastify.get('/albums/stats', albumHandlers.getStats);

  // Get one album by url
  fastify.get('/albums/lookup', albumHandlers.getAlbum);

  // Merge scraper output
  fastify.post('/albums/ingest', albumHandlers.ingest);

  // Edits
  fastify.patch('/albums/title', albumHandlers.editTitle);
  fastify.patch('/albums/item-count', albumHandlers.editItemCount);
  fastify.patch('/albums/date', albumHandlers.editDate);

  // Delete album by url
  fastify.delete('/albums', albumHandlers.deleteAlbum);

  // ============================================================================
  // Tag Routes
  // ============================================================================

  fastify.get('/tags', tagHandlers.listTags);
  fastify.get('/tags/menu', tagHandlers.getTagMenu);
  fastify.post('/tags/toggle', tagHandlers.toggleTag);
}
