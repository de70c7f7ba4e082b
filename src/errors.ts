/**
 * Error types for trust rule storage and validation.
 *
 * Neither is fatal. Store operations hand these back inside a Result instead
 * of throwing, so callers decide whether to warn, retry or carry on.
 */

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Reading or writing a persisted trust configuration failed.
 */
export class StoreError extends Error {
  override readonly name = "StoreError";

  constructor(
    message: string,
    /** Scope label, e.g. `profile "default"` or `global`. */
    readonly scope: string,
    /** File the operation touched, when there is one. */
    readonly filePath?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type ValidationErrorCode =
  | "empty_pattern"
  | "misplaced_wildcard"
  | "too_broad"
  | "dangerous_pattern"
  | "tool_not_trustable";

/**
 * A rule was refused before anything was stored.
 */
export class ValidationError extends Error {
  override readonly name = "ValidationError";

  constructor(
    readonly code: ValidationErrorCode,
    message: string,
  ) {
    super(message);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
