/**
 * AlbumValidator — Structural validation of stored album lines using Ajv.
 *
 * Ajv is configured and the album schema compiled ONCE at construction.
 * The schema lives in `schema/album.schema.yaml` at the package root.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { Ajv, type AnySchema, type ErrorObject, type ValidateFunction } from 'ajv';
import type { ValidationIssue, ValidationResult } from '../types/common.js';

/**
 * Location of the bundled album schema.
 */
export const DEFAULT_SCHEMA_PATH = fileURLToPath(
  new URL('../../schema/album.schema.yaml', import.meta.url)
);

/**
 * Convert an Ajv ErrorObject to a ValidationIssue.
 */
function convertAjvError(error: ErrorObject): ValidationIssue {
  const path = error.instancePath || '/';
  let message = error.message ?? 'Validation failed';

  switch (error.keyword) {
    case 'required':
      if ('missingProperty' in error.params) {
        message = `Missing required property: ${String(error.params.missingProperty)}`;
      }
      break;
    case 'type':
      if ('type' in error.params) {
        message = `Expected type: ${String(error.params.type)}`;
      }
      break;
    case 'pattern':
      if ('pattern' in error.params) {
        message = `Must match pattern: ${String(error.params.pattern)}`;
      }
      break;
    case 'minimum':
      if ('limit' in error.params) {
        message = `Must be >= ${String(error.params.limit)}`;
      }
      break;
    case 'minLength':
      if ('limit' in error.params) {
        message = `Must be at least ${String(error.params.limit)} characters`;
      }
      break;
  }

  return {
    path,
    message,
    keyword: error.keyword,
    params: { ...error.params },
  };
}

/**
 * Read and parse the album schema from a YAML file.
 */
export function loadAlbumSchema(path: string = DEFAULT_SCHEMA_PATH): AnySchema {
  const schema: AnySchema = parseYaml(readFileSync(path, 'utf-8'));
  if (typeof schema !== 'object' || schema === null) {
    throw new Error(`Album schema at ${path} is not an object`);
  }
  return schema;
}

/**
 * Ajv-based validator bound to the album schema.
 */
export class AlbumValidator {
  private readonly validateFn: ValidateFunction;

  constructor(schema: AnySchema) {
    const ajv = new Ajv({
      strict: true,
      allowUnionTypes: true,
      allErrors: true,
    });
    this.validateFn = ajv.compile(schema);
  }

  /**
   * Validate one parsed line.
   */
  validate(data: unknown): ValidationResult {
    if (this.validateFn(data)) {
      return { valid: true, issues: [] };
    }
    return {
      valid: false,
      issues: (this.validateFn.errors ?? []).map(convertAjvError),
    };
  }
}

/**
 * Create a validator, loading the bundled schema unless one is given.
 */
export function createAlbumValidator(schema: AnySchema = loadAlbumSchema()): AlbumValidator {
  return new AlbumValidator(schema);
}
