/**
 * Explicit step outcomes for the screening stages.
 *
 * DATA_UNAVAILABLE  provider returned nothing usable for a ticker
 * COMPUTATION       a ratio could not be derived (missing row, zero divisor, NaN)
 * PROVIDER          network / provider failure for a call or a whole batch
 * PERSISTENCE       cache file could not be read or written
 */
export type ErrorKind = 'DATA_UNAVAILABLE' | 'COMPUTATION' | 'PROVIDER' | 'PERSISTENCE';

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; kind: ErrorKind; message: string };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });

export const err = <T = never>(kind: ErrorKind, message: string): Result<T> => ({
  ok: false,
  kind,
  message,
});

export const unwrapOr = <T>(result: Result<T>, fallback: T): T =>
  result.ok ? result.value : fallback;

// Finite-number guard used by every ratio step.
export const finite = (value: number, label: string): Result<number> =>
  Number.isFinite(value) ? ok(value) : err('COMPUTATION', `${label} is not finite`);
