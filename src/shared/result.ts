/**
 * src/shared/result.ts
 *
 * WHY:
 * - Core operations (token decode, refresh rotation, request authentication,
 *   two-factor checks) report expected failures as values, not exceptions.
 * - Controllers decide how a failure maps to HTTP (AppError); the core stays
 *   transport-agnostic and every failure code is visible in the type.
 *
 * RULES:
 * - Use for EXPECTED failures only. Infrastructure faults (DB down, Redis down)
 *   still throw and end up as 500s in the error handler.
 */

export type Result<TValue, TError> =
  | { readonly ok: true; readonly value: TValue }
  | { readonly ok: false; readonly error: TError };

export const ok = <TValue>(value: TValue): Result<TValue, never> => ({ ok: true as const, value });

// Failure codes are string literals; the constraint keeps them from widening to `string`.
export const err = <TError extends string>(error: TError): Result<never, TError> => ({
  ok: false as const,
  error,
});
