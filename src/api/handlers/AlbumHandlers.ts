/**
 * AlbumHandlers — HTTP handlers for album queries, ingest and edits.
 *
 * These handlers are thin wrappers around AlbumService. Request bodies are
 * checked with zod; service errors are mapped to status codes.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { AlbumService, DateEdit, ItemCountEdit, TitleEdit } from '../../service/AlbumService.js';
import type { AlbumStatsReport } from '../../stats/AlbumStats.js';
import { markdownLink } from '../../query/formatters.js';
import { replyWithBadRequest, replyWithError } from '../errors.js';
import { parseIds, singleValue } from '../query.js';
import type {
  AlbumResponse,
  ApiError,
  DeleteAlbumResponse,
  IngestResponse,
  SearchAlbumsQuery,
  SearchAlbumsResponse,
  UrlQuery,
} from '../types.js';

const editTitleBody = z.object({
  url: z.string(),
  title: z.string(),
});

const editItemCountBody = z.object({
  url: z.string(),
  itemCount: z.union([z.number(), z.string()]),
});

const editDateBody = z.object({
  url: z.string(),
  date: z.string(),
});

export interface AlbumHandlerOptions {
  /** Suffix stripped from titles in markdown links */
  titleSuffix?: string;
}

/**
 * Create album handlers bound to an AlbumService.
 */
export function createAlbumHandlers(service: AlbumService, options: AlbumHandlerOptions = {}) {
  return {
    /**
     * GET /albums?q=...&tag=...&ids=a,b
     */
    async searchAlbums(
      request: FastifyRequest<{ Querystring: SearchAlbumsQuery }>,
      reply: FastifyReply
    ): Promise<SearchAlbumsResponse | ApiError> {
      try {
        const q = singleValue(request.query.q);
        const tag = singleValue(request.query.tag);
        const results = await service.search(q ?? '', {
          ids: parseIds(request.query.ids),
          ...(tag !== undefined && tag.trim() !== '' ? { tag: tag.trim() } : {}),
        });
        return { results, total: results.length };
      } catch (err) {
        return replyWithError(reply, err, 'search albums');
      }
    },

    /**
     * GET /albums/lookup?url=...
     */
    async getAlbum(
      request: FastifyRequest<{ Querystring: UrlQuery }>,
      reply: FastifyReply
    ): Promise<AlbumResponse | ApiError> {
      try {
        const album = await service.getAlbum(singleValue(request.query.url) ?? '');
        return { album };
      } catch (err) {
        return replyWithError(reply, err, 'get album');
      }
    },

    /**
     * GET /albums/stats
     */
    async getStats(
      _request: FastifyRequest,
      reply: FastifyReply
    ): Promise<AlbumStatsReport | ApiError> {
      try {
        return await service.stats();
      } catch (err) {
        return replyWithError(reply, err, 'compute stats');
      }
    },

    /**
     * POST /albums/ingest
     * Body is the raw scraper payload.
     */
    async ingest(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply
    ): Promise<IngestResponse | ApiError> {
      try {
        const report = await service.ingest(request.body);
        return {
          report,
          ...(report.album !== undefined ? { link: markdownLink(report.album, options.titleSuffix) } : {}),
        };
      } catch (err) {
        return replyWithError(reply, err, 'ingest albums');
      }
    },

    /**
     * PATCH /albums/title
     */
    async editTitle(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply
    ): Promise<TitleEdit | ApiError> {
      const parsed = editTitleBody.safeParse(request.body);
      if (!parsed.success) {
        return replyWithBadRequest(reply, parsed.error);
      }
      try {
        return await service.editTitle(parsed.data.url, parsed.data.title);
      } catch (err) {
        return replyWithError(reply, err, 'edit title');
      }
    },

    /**
     * PATCH /albums/item-count
     */
    async editItemCount(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply
    ): Promise<ItemCountEdit | ApiError> {
      const parsed = editItemCountBody.safeParse(request.body);
      if (!parsed.success) {
        return replyWithBadRequest(reply, parsed.error);
      }
      try {
        return await service.editItemCount(parsed.data.url, parsed.data.itemCount);
      } catch (err) {
        return replyWithError(reply, err, 'edit item count');
      }
    },

    /**
     * PATCH /albums/date
     */
    async editDate(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply
    ): Promise<DateEdit | ApiError> {
      const parsed = editDateBody.safeParse(request.body);
      if (!parsed.success) {
        return replyWithBadRequest(reply, parsed.error);
      }
      try {
        return await service.editDate(parsed.data.url, parsed.data.date);
      } catch (err) {
        return replyWithError(reply, err, 'edit date');
      }
    },

    /**
     * DELETE /albums?url=...
     */
    async deleteAlbum(
      request: FastifyRequest<{ Querystring: UrlQuery }>,
      reply: FastifyReply
    ): Promise<DeleteAlbumResponse | ApiError> {
      try {
        const deleted = await service.deleteAlbum(singleValue(request.query.url) ?? '');
        return { deleted };
      } catch (err) {
        return replyWithError(reply, err, 'delete album');
      }
    },
  };
}

export type AlbumHandlers = ReturnType<typeof createAlbumHandlers>;
