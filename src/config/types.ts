/**
 * Configuration types for the album-ledger server and CLI.
 *
 * These types define the structure of config.yaml and provide
 * type-safe access to configuration.
 */

import type { ParsePolicy } from '../store/types.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export const PARSE_POLICIES: readonly ParsePolicy[] = ['strict', 'lenient'];

/**
 * Top-level configuration.
 */
export interface AppConfig {
  server: ServerConfig;
  store: StoreConfig;
  albums: AlbumsConfig;
}

/**
 * HTTP server settings.
 */
export interface ServerConfig {
  /** Port to listen on (default: 3001) */
  port: number;
  /** Host to bind to (default: '0.0.0.0') */
  host: string;
  /** Log level (default: 'info') */
  logLevel: LogLevel;
  /** CORS configuration */
  cors: CorsConfig;
}

/**
 * CORS configuration.
 */
export interface CorsConfig {
  /** Whether CORS is enabled (default: true) */
  enabled: boolean;
  /** Allowed origins (default: ['*']) */
  origins: string[];
}

/**
 * Collection file location and parsing.
 */
export interface StoreConfig {
  /** Directory holding the collection file (default: ${ALBUM_DATA_DIR:-./data}) */
  dataDir: string;
  /** Collection file name (default: 'photoAlbums.json') */
  fileName: string;
  /** Handling of unreadable lines (default: 'strict') */
  parsePolicy: ParsePolicy;
}

/**
 * Album display and date settings.
 */
export interface AlbumsConfig {
  /** Suffix stripped from titles (default: ' - Google Photos') */
  titleSuffix: string;
  /** Year for dates written without one (default: current year at startup) */
  referenceYear?: number;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  server: {
    port: 3001,
    host: '0.0.0.0',
    logLevel: 'info',
    cors: {
      enabled: true,
      origins: ['*'],
    },
  },
  store: {
    dataDir: '${ALBUM_DATA_DIR:-./data}',
    fileName: 'photoAlbums.json',
    parsePolicy: 'strict',
  },
  albums: {
    titleSuffix: ' - Google Photos',
  },
};
