/**
 * Modweave Kernel — Validation Result Types
 *
 * Shared by the manifest validator, the patch-file parser and the operation
 * shape check. Expected, per-item failures are values; only fatal
 * conditions are thrown.
 */

/** A single validation failure. */
export interface ValidationError {
  readonly message: string;
  /** Where the failure was found, e.g. a field name or file path. */
  readonly context?: string | undefined;
}

/**
 * Generic validation result type.
 *
 * - `ValidationResult<void>`: success has no value (structural validation only)
 * - `ValidationResult<T>`: success carries a typed value
 */
export type ValidationResult<T = void> =
  | (T extends void ? { readonly ok: true } : { readonly ok: true; readonly value: T })
  | { readonly ok: false; readonly errors: ReadonlyArray<ValidationError> };
