/**
 * Server entry point for the album-ledger API.
 *
 * This module:
 * - Initializes all components (config, validator, store, service)
 * - Creates Fastify server with routes
 * - Provides both programmatic API and CLI usage
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { resolve } from 'node:path';

import { createLocalRepoAdapter } from './repo/LocalRepoAdapter.js';
import type { RepoAdapter } from './repo/types.js';
import { AlbumValidator, createAlbumValidator } from './validation/AlbumValidator.js';
import { AlbumStoreImpl, createAlbumStore } from './store/AlbumStoreImpl.js';
import { DateNormalizer, createDateNormalizer } from './dates/DateNormalizer.js';
import { AlbumService, createAlbumService } from './service/AlbumService.js';
import { loadConfig } from './config/loader.js';
import type { AppConfig, ServerConfig } from './config/types.js';
import { createAlbumHandlers, createTagHandlers } from './api/handlers/index.js';
import { registerRoutes } from './api/routes.js';

/**
 * Application context holding all initialized components.
 */
export interface AppContext {
  config: AppConfig;
  repoAdapter: RepoAdapter;
  validator: AlbumValidator;
  store: AlbumStoreImpl;
  normalizer: DateNormalizer;
  service: AlbumService;
}

/**
 * Options for initializing the application.
 */
export interface InitializeOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string;
  /** Use this configuration instead of loading one */
  config?: AppConfig;
}

/**
 * Initialize all application components.
 */
export async function initializeApp(options: InitializeOptions = {}): Promise<AppContext> {
  const config = options.config
    ?? await loadConfig(options.configPath !== undefined ? { configPath: options.configPath } : {});

  const dataDir = resolve(config.store.dataDir);
  console.log(`Initializing album store in: ${dataDir}`);

  const repoAdapter = createLocalRepoAdapter({ basePath: dataDir });
  await repoAdapter.initialize();
  const validator = createAlbumValidator();
  const store = createAlbumStore(repoAdapter, validator, {
    fileName: config.store.fileName,
    parsePolicy: config.store.parsePolicy,
  });

  const referenceYear = config.albums.referenceYear ?? new Date().getFullYear();
  const normalizer = createDateNormalizer({ referenceYear });

  const service = createAlbumService({
    store,
    normalizer,
    titleSuffix: config.albums.titleSuffix,
  });

  console.log(`Collection file: ${store.fileName} (${store.parsePolicy} parsing)`);
  console.log(`Reference year for undated-year dates: ${referenceYear}`);

  return { config, repoAdapter, validator, store, normalizer, service };
}

/**
 * Create a Fastify server with all routes registered.
 */
export async function createServer(
  ctx: AppContext,
  overrides: Partial<ServerConfig> = {}
): Promise<ReturnType<typeof Fastify>> {
  const opts: ServerConfig = { ...ctx.config.server, ...overrides };

  // Create Fastify instance
  const fastify = Fastify({
    logger: {
      level: opts.logLevel,
    },
  });

  // Register CORS if enabled
  if (opts.cors.enabled) {
    await fastify.register(cors, {
      origin: opts.cors.origins.includes('*') ? true : opts.cors.origins,
      methods: ['GET', 'HEAD', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type'],
    });
  }

  // Create handlers
  const albumHandlers = createAlbumHandlers(ctx.service, {
    titleSuffix: ctx.config.albums.titleSuffix,
  });
  const tagHandlers = createTagHandlers(ctx.service);

  registerRoutes(fastify, {
    albumHandlers,
    tagHandlers,
    albumCount: () => ctx.service.count(),
  });

  return fastify;
}

/**
 * Start the server.
 */
export async function startServer(options: InitializeOptions = {}): Promise<void> {
  try {
    // Initialize app
    const ctx = await initializeApp(options);

    // Create server
    const fastify = await createServer(ctx);
    const { port, host } = ctx.config.server;

    // Start listening
    await fastify.listen({ port, host });

    console.log(`Server listening on http://${host}:${port}`);

    // Handle shutdown
    const shutdown = async (): Promise<void> => {
      console.log('\nShutting down...');
      await fastify.close();
      process.exit(0);
    };
    const onSignal = (): void => {
      shutdown().catch((err: unknown) => {
        console.error('Failed to shut down cleanly:', err);
        process.exit(1);
      });
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);

  } catch (err) {
    console.error('Failed to start server:', err);
    process.exit(1);
  }
}

// Run if executed directly
const isMain = process.argv[1]?.endsWith('server.js') ||
               process.argv[1]?.endsWith('server.ts');

if (isMain) {
  startServer().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
