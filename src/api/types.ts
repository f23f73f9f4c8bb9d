/**
 * Types for the HTTP API layer.
 *
 * These types define request/response structures for the REST API.
 * They carry no merge or query logic; that lives in AlbumService.
 */

import type { Album, IngestReport, SearchResult, TagCount, ToggleOutcome } from '../types/album.js';

// ============================================================================
// Error Response
// ============================================================================

/**
 * Standard error response.
 */
export interface ApiError {
  /** Error type/code */
  error: string;
  /** Human-readable message */
  message: string;
  /** Additional details (optional) */
  details?: unknown;
}

// ============================================================================
// Album Endpoints
// ============================================================================

/**
 * A querystring value. Fastify parses a repeated key into an array.
 */
export type QueryValue = string | string[];

/**
 * Query parameters for searching albums.
 */
export interface SearchAlbumsQuery {
  /** Raw query: free text and an optional y:YYYY or y:YYYY-YYYY token */
  q?: QueryValue;
  /** Exact tag filter */
  tag?: QueryValue;
  /** Comma-separated album ids, possibly repeated */
  ids?: QueryValue;
}

export interface SearchAlbumsResponse {
  results: SearchResult[];
  total: number;
}

export interface UrlQuery {
  url?: QueryValue;
}

export interface AlbumResponse {
  album: Album;
}

export interface IngestResponse {
  report: IngestReport;
  /** Markdown link to the album of a single ingest */
  link?: string;
}

export interface DeleteAlbumResponse {
  deleted: Album;
}

// ============================================================================
// Tag Endpoints
// ============================================================================

export interface TagListQuery {
  q?: QueryValue;
}

export interface TagMenuQuery {
  url?: QueryValue;
  q?: QueryValue;
}

export interface TagListResponse {
  tags: TagCount[];
  total: number;
}

export interface ToggleTagResponse {
  outcome: ToggleOutcome;
}

// ============================================================================
// Health Check
// ============================================================================

/**
 * Health check response.
 */
export interface HealthResponse {
  /** Status */
  status: 'ok' | 'error';
  /** Timestamp */
  timestamp: string;
  /** Albums in the store (absent when the store cannot be read) */
  albums?: number;
}
