/**
 * Configuration loader for album-ledger.
 *
 * Loads config from YAML file with support for:
 * - Environment variable substitution (${VAR_NAME})
 * - Default values
 * - Validation
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { AlbumsConfig, AppConfig, CorsConfig, LogLevel, ServerConfig, StoreConfig } from './types.js';
import { DEFAULT_CONFIG, LOG_LEVELS, PARSE_POLICIES } from './types.js';
import type { ParsePolicy } from '../store/types.js';
import { isRecord } from '../types/common.js';

/**
 * Config loading options.
 */
export interface LoadConfigOptions {
  /** Path to config file (default: process.env.CONFIG_PATH or './config.yaml') */
  configPath?: string;
}

/**
 * Config validation error.
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly value: unknown
  ) {
    super(`Config validation error at '${path}': ${message}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Config as written in the file: every field optional.
 */
export interface PartialAppConfig {
  server?: Partial<Omit<ServerConfig, 'cors'>> & { cors?: Partial<CorsConfig> };
  store?: Partial<StoreConfig>;
  albums?: Partial<AlbumsConfig>;
}

/**
 * Environment variable substitution pattern.
 * Matches ${VAR_NAME} and ${VAR_NAME:-default}
 */
const ENV_VAR_PATTERN = /\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/gi;

/**
 * Substitute environment variables in a string.
 *
 * Supports:
 * - ${VAR_NAME} - Replace with env var value
 * - ${VAR_NAME:-default} - Replace with env var or default
 */
export function substituteEnvVars(value: string): string {
  return value.replace(ENV_VAR_PATTERN, (_match: string, varName: string, defaultValue?: string) => {
    const envValue = process.env[varName];
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    console.warn(`Environment variable ${varName} is not set and has no default`);
    return '';
  });
}

/**
 * Recursively substitute environment variables in a parsed document.
 */
function substituteEnvVarsRecursive(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj);
  }
  if (Array.isArray(obj)) {
    return obj.map(substituteEnvVarsRecursive);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVarsRecursive(value);
    }
    return result;
  }
  return obj;
}

function requireSection(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new ConfigValidationError('must be an object', path, value);
  }
  return value;
}

function optionalString(section: Record<string, unknown>, key: string, path: string): string | undefined {
  const value = section[key];
  if (value === undefined || typeof value === 'string') {
    return value;
  }
  throw new ConfigValidationError(`${key} must be a string`, `${path}.${key}`, value);
}

function optionalInteger(
  section: Record<string, unknown>,
  key: string,
  path: string,
  min: number,
  max: number
): number | undefined {
  const raw = section[key];
  if (raw === undefined) {
    return undefined;
  }
  // Substituted env vars arrive as strings
  const value = typeof raw === 'string' && /^\d+$/.test(raw) ? Number(raw) : raw;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    throw new ConfigValidationError(`${key} must be an integer between ${min} and ${max}`, `${path}.${key}`, raw);
  }
  return value;
}

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function isParsePolicy(value: unknown): value is ParsePolicy {
  return PARSE_POLICIES.some(policy => policy === value);
}

function optionalLogLevel(value: unknown, path: string): LogLevel | undefined {
  if (value === undefined || isLogLevel(value)) {
    return value;
  }
  throw new ConfigValidationError(`logLevel must be one of: ${LOG_LEVELS.join(', ')}`, path, value);
}

function optionalParsePolicy(value: unknown, path: string): ParsePolicy | undefined {
  if (value === undefined || isParsePolicy(value)) {
    return value;
  }
  throw new ConfigValidationError(`parsePolicy must be one of: ${PARSE_POLICIES.join(', ')}`, path, value);
}

/**
 * Validate CORS configuration.
 */
function readCorsConfig(value: unknown, path: string): Partial<CorsConfig> {
  const c = requireSection(value, path);
  const result: Partial<CorsConfig> = {};

  const enabled = c.enabled;
  if (enabled !== undefined) {
    if (typeof enabled !== 'boolean') {
      throw new ConfigValidationError('enabled must be a boolean', `${path}.enabled`, enabled);
    }
    result.enabled = enabled;
  }

  const origins: unknown = c.origins;
  if (origins !== undefined) {
    if (!Array.isArray(origins)) {
      throw new ConfigValidationError('origins must be a list of strings', `${path}.origins`, origins);
    }
    result.origins = origins.map((origin: unknown, index) => {
      if (typeof origin !== 'string') {
        throw new ConfigValidationError('origin must be a string', `${path}.origins[${index}]`, origin);
      }
      return origin;
    });
  }

  return result;
}

/**
 * Validate server configuration.
 */
function readServerConfig(value: unknown, path = 'server'): NonNullable<PartialAppConfig['server']> {
  const c = requireSection(value, path);
  const port = optionalInteger(c, 'port', path, 1, 65535);
  const host = optionalString(c, 'host', path);
  const logLevel = optionalLogLevel(c.logLevel, `${path}.logLevel`);

  return {
    ...(port !== undefined ? { port } : {}),
    ...(host !== undefined ? { host } : {}),
    ...(logLevel !== undefined ? { logLevel } : {}),
    ...(c.cors !== undefined ? { cors: readCorsConfig(c.cors, `${path}.cors`) } : {}),
  };
}

/**
 * Validate store configuration.
 */
function readStoreConfig(value: unknown, path = 'store'): Partial<StoreConfig> {
  const c = requireSection(value, path);
  const dataDir = optionalString(c, 'dataDir', path);
  const fileName = optionalString(c, 'fileName', path);

  if (dataDir !== undefined && dataDir.trim() === '') {
    throw new ConfigValidationError('dataDir must not be empty', `${path}.dataDir`, dataDir);
  }
  if (fileName !== undefined && fileName.trim() === '') {
    throw new ConfigValidationError('fileName must not be empty', `${path}.fileName`, fileName);
  }
  const parsePolicy = optionalParsePolicy(c.parsePolicy, `${path}.parsePolicy`);

  return {
    ...(dataDir !== undefined ? { dataDir } : {}),
    ...(fileName !== undefined ? { fileName } : {}),
    ...(parsePolicy !== undefined ? { parsePolicy } : {}),
  };
}

/**
 * Validate album settings.
 */
function readAlbumsConfig(value: unknown, path = 'albums'): Partial<AlbumsConfig> {
  const c = requireSection(value, path);
  const titleSuffix = optionalString(c, 'titleSuffix', path);
  const referenceYear = optionalInteger(c, 'referenceYear', path, 1, 9999);

  return {
    ...(titleSuffix !== undefined ? { titleSuffix } : {}),
    ...(referenceYear !== undefined ? { referenceYear } : {}),
  };
}

/**
 * Validate the entire configuration.
 */
export function validateConfig(config: unknown): PartialAppConfig {
  // An empty YAML document parses to null
  if (config === null || config === undefined) {
    return {};
  }
  const c = requireSection(config, '');

  return {
    ...(c.server !== undefined && c.server !== null ? { server: readServerConfig(c.server) } : {}),
    ...(c.store !== undefined && c.store !== null ? { store: readStoreConfig(c.store) } : {}),
    ...(c.albums !== undefined && c.albums !== null ? { albums: readAlbumsConfig(c.albums) } : {}),
  };
}

/**
 * Merge a validated partial config over the defaults.
 */
export function mergeWithDefaults(partial: PartialAppConfig): AppConfig {
  const defaults = DEFAULT_CONFIG;
  const serverOverrides: NonNullable<PartialAppConfig['server']> = partial.server ?? {};
  const { cors, ...server } = serverOverrides;

  return {
    server: {
      ...defaults.server,
      ...server,
      cors: { ...defaults.server.cors, ...cors },
    },
    store: {
      ...defaults.store,
      dataDir: substituteEnvVars(defaults.store.dataDir),
      ...partial.store,
    },
    albums: { ...defaults.albums, ...partial.albums },
  };
}

/**
 * Load configuration from a YAML file.
 *
 * @param options - Loading options
 * @returns Loaded and validated configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const configPath = options.configPath
    ?? process.env.CONFIG_PATH
    ?? './config.yaml';

  const absolutePath = resolve(configPath);

  // If config file doesn't exist, return defaults
  if (!existsSync(absolutePath)) {
    console.warn(`Config file not found at ${absolutePath}, using defaults`);
    return mergeWithDefaults({});
  }

  // Read and parse YAML
  const content = await readFile(absolutePath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new Error(`Failed to parse config file: ${err instanceof Error ? err.message : String(err)}`);
  }

  return mergeWithDefaults(validateConfig(substituteEnvVarsRecursive(parsed)));
}
