/**
 * hpikit Engine: Validation Result Types
 *
 * Validators return a discriminated union rather than throwing, so callers
 * can report every problem at once.
 */

export interface ValidationError {
  readonly message: string;
  /** Where the problem is, e.g. `dependencies.jenkinsPlugins[2]`. */
  readonly context?: string | undefined;
}

/**
 * - `ValidationResult<void>`: success has no value
 * - `ValidationResult<T>`: success carries a typed value
 */
export type ValidationResult<T = void> =
  | (T extends void ? { readonly ok: true } : { readonly ok: true; readonly value: T })
  | { readonly ok: false; readonly errors: ReadonlyArray<ValidationError> };
