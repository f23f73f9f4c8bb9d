/**
 * IngestInput — Classify raw scraper payloads.
 *
 * The scraper emits one of:
 * - `{ type: 'single', url, title?, itemCount?, startDate?, endDate? }`
 * - `{ type: 'bulk', albums: [{ url, title?, itemCount? }] }`
 * - `{ error: string }` when it could not read the page
 *
 * The whole payload is checked before anything is merged, so one malformed
 * element rejects the call.
 */

import { z } from 'zod';
import type { BatchCandidate, IngestInput, SingleCandidate } from '../types/album.js';
import { FormatError, ValidationError, errorMessage } from '../types/errors.js';
import { isRecord } from '../types/common.js';

const itemCountSchema = z
  .union([
    z.number().int().min(0),
    z.string().regex(/^\s*\d+\s*$/, 'Expected a non-negative integer').transform(v => Number.parseInt(v, 10)),
    z.null().transform(() => undefined),
  ])
  .optional();

const optionalText = z.string().nullable().optional();

const batchCandidateSchema = z.object({
  url: optionalText,
  title: optionalText,
  itemCount: itemCountSchema,
});

const singleCandidateSchema = batchCandidateSchema.extend({
  startDate: optionalText,
  endDate: optionalText,
});

const singleInputSchema = singleCandidateSchema.extend({
  type: z.literal('single'),
});

const bulkInputSchema = z.object({
  type: z.literal('bulk'),
  albums: z.array(batchCandidateSchema),
});

const ingestInputSchema = z.discriminatedUnion('type', [singleInputSchema, bulkInputSchema]);

type RawBatchCandidate = z.infer<typeof batchCandidateSchema>;
type RawSingleCandidate = z.infer<typeof singleCandidateSchema>;

function toBatchCandidate(raw: RawBatchCandidate): BatchCandidate {
  return {
    url: raw.url ?? '',
    ...(typeof raw.title === 'string' ? { title: raw.title } : {}),
    ...(raw.itemCount !== undefined ? { itemCount: raw.itemCount } : {}),
  };
}

function toSingleCandidate(raw: RawSingleCandidate): SingleCandidate {
  return {
    ...toBatchCandidate(raw),
    ...(typeof raw.startDate === 'string' ? { startDate: raw.startDate } : {}),
    ...(typeof raw.endDate === 'string' ? { endDate: raw.endDate } : {}),
  };
}

function issuesOf(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map(issue => ({
    path: `/${issue.path.map(String).join('/')}`,
    message: issue.message,
  }));
}

function invalidCandidate(error: z.ZodError): ValidationError {
  const issues = issuesOf(error);
  const summary = issues.map(issue => `${issue.path}: ${issue.message}`).join('; ');
  return new ValidationError(`Invalid album candidate: ${summary}`, { issues });
}

/**
 * Check one single-album candidate handed in directly.
 *
 * @throws ValidationError for a malformed field, e.g. a negative item count
 */
export function parseSingleCandidate(raw: unknown): SingleCandidate {
  const parsed = singleCandidateSchema.safeParse(raw);
  if (!parsed.success) {
    throw invalidCandidate(parsed.error);
  }
  return toSingleCandidate(parsed.data);
}

/**
 * Check a list of album-list candidates handed in directly. One bad element
 * rejects the whole list.
 *
 * @throws ValidationError for a malformed element
 */
export function parseBatchCandidates(raw: unknown): BatchCandidate[] {
  const parsed = z.array(batchCandidateSchema).safeParse(raw);
  if (!parsed.success) {
    throw invalidCandidate(parsed.error);
  }
  return parsed.data.map(toBatchCandidate);
}

/**
 * Classify a parsed scraper payload.
 *
 * @throws FormatError for scraper error objects and unrecognized shapes
 */
export function classifyIngestInput(raw: unknown): IngestInput {
  if (isRecord(raw) && 'error' in raw && !('type' in raw)) {
    throw new FormatError(`Scraper error: ${String(raw.error)}`, { scraperError: raw.error });
  }

  const parsed = ingestInputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new FormatError('Unrecognized ingest payload', { issues: issuesOf(parsed.error) });
  }

  const input = parsed.data;
  if (input.type === 'single') {
    return { kind: 'single', candidate: toSingleCandidate(input) };
  }
  return { kind: 'bulk', candidates: input.albums.map(toBatchCandidate) };
}

/**
 * Parse JSON text from the scraper and classify it.
 */
export function parseIngestText(text: string): IngestInput {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new FormatError(`Invalid JSON: ${errorMessage(err)}`);
  }
  return classifyIngestInput(raw);
}
