/**
 * Common type definitions shared across modules.
 */

/**
 * Structural validation problem with JSON pointer path.
 */
export interface ValidationIssue {
  /** JSON pointer path to the problem (e.g., "/itemCount") */
  path: string;
  /** Error message */
  message: string;
  /** Schema keyword that failed (e.g., "required", "type") */
  keyword: string;
  /** Additional parameters from the validation */
  params?: Record<string, unknown>;
}

/**
 * Result of structural validation via Ajv.
 */
export interface ValidationResult {
  /** Whether validation passed */
  valid: boolean;
  /** List of problems (empty if valid) */
  issues: ValidationIssue[];
}

/**
 * Narrow an unknown value to a plain object.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
