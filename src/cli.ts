#!/usr/bin/env node
/**
 * Command line entry point.
 *
 * Usage: album-ledger <command> [...args]
 *
 * Every command prints one JSON document on stdout. Console output from
 * bootstrap and the store goes to stderr.
 */

import { z } from 'zod';
import { initializeApp, startServer } from './server.js';
import type { AlbumService } from './service/AlbumService.js';
import { markdownLink } from './query/formatters.js';
import { errorMessage, isAlbumLedgerError } from './types/errors.js';

export interface CliIO {
  /** Write one line to stdout */
  write(text: string): void;
  /** Read piped input, used by `ingest -` */
  readInput(): Promise<string>;
}

export interface CliOptions {
  /** Suffix stripped from titles in markdown links */
  titleSuffix?: string;
}

export const USAGE = [
  'Usage: album-ledger <command> [...args]',
  '',
  'Commands:',
  '  ingest <json|->                     Merge scraper output',
  '  search [query] [--tag t] [--ids a,b] Search albums',
  '  tags [filter]                       List tags by count',
  '  tag-menu <url> [filter]             Tag menu for one album',
  '  toggle-tag <url> <tag> <add|remove> Add or remove a tag',
  '  edit-title <url> <title>            Replace the title',
  '  edit-count <url> <count>            Replace the item count',
  '  edit-date <url> <date>              Replace the date (YYYY-MM-DD[--YYYY-MM-DD])',
  '  delete <url>                        Delete an album',
  '  stats                               Completeness buckets',
  '  serve                               Start the HTTP server',
].join('\n');

/**
 * Bad command line: unknown command, flag or missing argument.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const VALUE_FLAGS = new Set(['--tag', '--ids']);

interface ParsedArgs {
  positional: string[];
  flags: Map<string, string>;
}

function parseArgs(args: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  const flags = new Map<string, string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    if (arg.startsWith('--')) {
      const value = args[i + 1];
      if (!VALUE_FLAGS.has(arg)) {
        throw new UsageError(`Unknown option: ${arg}`);
      }
      if (value === undefined) {
        throw new UsageError(`Option ${arg} needs a value`);
      }
      flags.set(arg, value);
      i++;
    } else {
      positional.push(arg);
    }
  }

  return { positional, flags };
}

const text = z.string().min(1);

const argSchemas = {
  ingest: z.tuple([text]),
  tagMenu: z.tuple([text], z.string()),
  toggleTag: z.tuple([text, text, z.enum(['add', 'remove'])]),
  edit: z.tuple([text, text], z.string()),
  editCount: z.tuple([text, text]),
  url: z.tuple([text]),
};

function readArgs<T>(schema: z.ZodType<T>, command: string, positional: readonly string[]): T {
  const parsed = schema.safeParse(positional);
  if (!parsed.success) {
    throw new UsageError(`Invalid arguments for ${command}\n\n${USAGE}`);
  }
  return parsed.data;
}

function splitIds(raw: string | undefined): string[] {
  if (raw === undefined) {
    return [];
  }
  return raw.split(',').map(id => id.trim()).filter(id => id !== '');
}

async function execute(
  command: string,
  args: ParsedArgs,
  service: AlbumService,
  io: CliIO,
  options: CliOptions
): Promise<{ output: unknown; ok: boolean }> {
  const { positional, flags } = args;

  switch (command) {
    case 'ingest': {
      const [source] = readArgs(argSchemas.ingest, command, positional);
      const payload = source === '-' ? await io.readInput() : source;
      const report = await service.ingestText(payload);
      return {
        ok: true,
        output: {
          report,
          ...(report.album !== undefined ? { link: markdownLink(report.album, options.titleSuffix) } : {}),
        },
      };
    }

    case 'search': {
      const tag = flags.get('--tag')?.trim();
      const results = await service.search(positional.join(' '), {
        ids: splitIds(flags.get('--ids')),
        ...(tag !== undefined && tag !== '' ? { tag } : {}),
      });
      return { ok: true, output: { results, total: results.length } };
    }

    case 'tags': {
      const filter = positional.join(' ');
      const tags = await service.listTags(filter);
      return { ok: true, output: { tags, total: tags.length } };
    }

    case 'tag-menu': {
      const [url, ...filter] = readArgs(argSchemas.tagMenu, command, positional);
      return { ok: true, output: await service.tagMenu(url, filter.join(' ')) };
    }

    case 'toggle-tag': {
      const [url, tag, action] = readArgs(argSchemas.toggleTag, command, positional);
      const outcome = await service.toggleTag(url, tag, action);
      return { ok: outcome !== 'album-not-found', output: { outcome } };
    }

    case 'edit-title': {
      const [url, first, ...rest] = readArgs(argSchemas.edit, command, positional);
      return { ok: true, output: await service.editTitle(url, [first, ...rest].join(' ')) };
    }

    case 'edit-count': {
      const [url, count] = readArgs(argSchemas.editCount, command, positional);
      return { ok: true, output: await service.editItemCount(url, count) };
    }

    case 'edit-date': {
      const [url, first, ...rest] = readArgs(argSchemas.edit, command, positional);
      return { ok: true, output: await service.editDate(url, [first, ...rest].join(' ')) };
    }

    case 'delete': {
      const [url] = readArgs(argSchemas.url, command, positional);
      return { ok: true, output: { deleted: await service.deleteAlbum(url) } };
    }

    case 'stats':
      return { ok: true, output: await service.stats() };

    default:
      throw new UsageError(`Unknown command: ${command}\n\n${USAGE}`);
  }
}

/**
 * Run one command against a service and print its JSON result.
 *
 * @returns Process exit code
 */
export async function runCommand(
  argv: readonly string[],
  service: AlbumService,
  io: CliIO,
  options: CliOptions = {}
): Promise<number> {
  const [command, ...rest] = argv;
  if (command === undefined) {
    io.write(JSON.stringify({ error: 'USAGE_ERROR', message: USAGE }));
    return 1;
  }

  try {
    const { output, ok } = await execute(command, parseArgs(rest), service, io, options);
    io.write(JSON.stringify(output, null, 2));
    return ok ? 0 : 1;
  } catch (err) {
    if (isAlbumLedgerError(err)) {
      io.write(JSON.stringify({ error: err.code, message: err.message }));
    } else if (err instanceof UsageError) {
      io.write(JSON.stringify({ error: 'USAGE_ERROR', message: err.message }));
    } else {
      io.write(JSON.stringify({ error: 'INTERNAL_ERROR', message: errorMessage(err) }));
    }
    return 1;
  }
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);

  if (argv[0] === 'serve') {
    await startServer();
    return;
  }

  // Redirect console to stderr so stdout carries only the result
  console.log = (...args: unknown[]) => process.stderr.write(args.map(String).join(' ') + '\n');
  console.warn = (...args: unknown[]) => process.stderr.write(args.map(String).join(' ') + '\n');

  const ctx = await initializeApp();
  const code = await runCommand(
    argv,
    ctx.service,
    {
      write: line => process.stdout.write(line + '\n'),
      readInput: readStdin,
    },
    { titleSuffix: ctx.config.albums.titleSuffix }
  );
  process.exitCode = code;
}

const isMain = process.argv[1]?.endsWith('cli.js') ||
               process.argv[1]?.endsWith('cli.ts') ||
               process.argv[1]?.endsWith('album-ledger');

if (isMain) {
  main().catch((err: unknown) => {
    process.stderr.write(`Fatal: ${errorMessage(err)}\n`);
    process.exit(1);
  });
}
