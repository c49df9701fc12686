/**
 * Shared validation helpers for accumulate-errors validators.
 *
 * Used by the marketplace config resolver. Each check function pushes
 * errors onto a shared array so callers can report all problems at once.
 *
 * @module
 */

// ============================================================================
// Result type
// ============================================================================

/** Outcome of an accumulate-errors validation pass. */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/** Build a {@link ValidationResult} from an error list. */
export function validationResult(errors: string[]): ValidationResult {
  return { valid: errors.length === 0, errors };
}

// ============================================================================
// Field checks
// ============================================================================

/** Push an error if `value` is not a non-empty string. */
export function requireNonEmptyString(
  value: unknown,
  field: string,
  errors: string[],
): void {
  if (typeof value !== "string" || value.trim().length === 0) {
    errors.push(`${field} must be a non-empty string`);
  }
}

/** Push an error if `value` is not an integer in [min, max]. */
export function requireIntRange(
  value: unknown,
  field: string,
  min: number,
  max: number,
  errors: string[],
): void {
  if (
    typeof value !== "number" ||
    !Number.isInteger(value) ||
    value < min ||
    value > max
  ) {
    errors.push(`${field} must be an integer between ${min} and ${max}`);
  }
}

/** Push an error if `value` is not a positive safe integer. */
export function requirePositiveInteger(
  value: unknown,
  field: string,
  errors: string[],
): void {
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 1) {
    errors.push(`${field} must be a positive integer`);
  }
}

/**
 * Parse an optional integer environment variable.
 *
 * Returns `undefined` when unset or blank; pushes an error and returns
 * `undefined` when the value is not an integer.
 */
export function parseIntegerEnv(
  raw: string | undefined,
  field: string,
  errors: string[],
): number | undefined {
  if (raw === undefined || raw.trim().length === 0) return undefined;
  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    errors.push(`${field} must be an integer (got "${raw}")`);
    return undefined;
  }
  return Number.parseInt(trimmed, 10);
}
