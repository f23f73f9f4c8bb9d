/**
 * TagHandlers — HTTP handlers for tag listing, the tag menu and toggling.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { AlbumService } from '../../service/AlbumService.js';
import type { TagMenu } from '../../tags/TagIndex.js';
import { replyWithBadRequest, replyWithError } from '../errors.js';
import { singleValue } from '../query.js';
import type { ApiError, TagListQuery, TagListResponse, TagMenuQuery, ToggleTagResponse } from '../types.js';

const toggleTagBody = z.object({
  url: z.string(),
  tag: z.string(),
  action: z.enum(['add', 'remove']),
});

/**
 * Create tag handlers bound to an AlbumService.
 */
export function createTagHandlers(service: AlbumService) {
  return {
    /**
     * GET /tags?q=...
     * Tags by count, filtered by case-insensitive substring.
     */
    async listTags(
      request: FastifyRequest<{ Querystring: TagListQuery }>,
      reply: FastifyReply
    ): Promise<TagListResponse | ApiError> {
      try {
        const tags = await service.listTags(singleValue(request.query.q));
        return { tags, total: tags.length };
      } catch (err) {
        return replyWithError(reply, err, 'list tags');
      }
    },

    /**
     * GET /tags/menu?url=...&q=...
     */
    async getTagMenu(
      request: FastifyRequest<{ Querystring: TagMenuQuery }>,
      reply: FastifyReply
    ): Promise<TagMenu | ApiError> {
      try {
        return await service.tagMenu(singleValue(request.query.url) ?? '', singleValue(request.query.q));
      } catch (err) {
        return replyWithError(reply, err, 'build tag menu');
      }
    },

    /**
     * POST /tags/toggle
     * Responds 404 with the outcome when the album does not exist.
     */
    async toggleTag(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply
    ): Promise<ToggleTagResponse | ApiError> {
      const parsed = toggleTagBody.safeParse(request.body);
      if (!parsed.success) {
        return replyWithBadRequest(reply, parsed.error);
      }
      try {
        const { url, tag, action } = parsed.data;
        const outcome = await service.toggleTag(url, tag, action);
        if (outcome === 'album-not-found') {
          reply.status(404);
        }
        return { outcome };
      } catch (err) {
        return replyWithError(reply, err, 'toggle tag');
      }
    },
  };
}

export type TagHandlers = ReturnType<typeof createTagHandlers>;
