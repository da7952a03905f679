// packages/sigcheck-runtime/result.ts
// Result type for non-throwing validation

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const Result = {
  /**
   * Create a successful Result with a value.
   */
  ok<T, E = never>(value: T): Result<T, E> {
    return { ok: true, value };
  },

  /**
   * Create a failed Result with an error.
   */
  err<T = never, E = unknown>(error: E): Result<T, E> {
    return { ok: false, error };
  },
};
