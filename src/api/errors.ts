/**
 * Mapping from service errors to HTTP responses.
 */

import type { FastifyReply } from 'fastify';
import type { ZodError } from 'zod';
import type { AlbumErrorCode } from '../types/errors.js';
import { errorMessage, isAlbumLedgerError } from '../types/errors.js';
import type { ApiError } from './types.js';

const STATUS_BY_CODE: Record<AlbumErrorCode, number> = {
  VALIDATION_ERROR: 400,
  FORMAT_ERROR: 400,
  NOT_FOUND: 404,
  PERSISTENCE_ERROR: 500,
};

/**
 * Set the reply status for a thrown error and build its body.
 *
 * @param action - What was being attempted, used in messages of unexpected errors
 */
export function replyWithError(reply: FastifyReply, err: unknown, action: string): ApiError {
  if (isAlbumLedgerError(err)) {
    reply.status(STATUS_BY_CODE[err.code]);
    return {
      error: err.code,
      message: err.message,
      ...(err.details !== undefined ? { details: err.details } : {}),
    };
  }

  reply.status(500);
  return {
    error: 'INTERNAL_ERROR',
    message: `Failed to ${action}: ${errorMessage(err)}`,
  };
}

/**
 * 400 response for a request that failed zod validation.
 */
export function replyWithBadRequest(reply: FastifyReply, error: ZodError): ApiError {
  reply.status(400);
  return {
    error: 'BAD_REQUEST',
    message: error.issues.map(issue => `${issue.path.map(String).join('.') || 'body'}: ${issue.message}`).join('; '),
    details: error.issues,
  };
}
