import type { EngineValue } from '../engine/engineTypes.js';

/**
 * A host-side implementation function.
 *
 * Called as `(scope?, state?, ...params)`: the execution scope first when the
 * signature uses it, then the state value, then the converted arguments.
 */
export type NativeFn = (...args: never[]) => unknown;

/** Return value of fallible implementations (`Result<T, E>`). */
export type Result<T, E = unknown> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function isResult(v: unknown): v is Result<unknown> {
  if (v === null || typeof v !== 'object' || !('ok' in v)) return false;
  return v.ok === true ? 'value' in v : v.ok === false && 'error' in v;
}

/** `error.message` for Error instances, `String(error)` otherwise. */
export function stringifyError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Outcome of one per-call step: a value, or an exception for the scope. */
export type Step<T = unknown> = { ok: true; value: T } | { ok: false; exception: EngineValue };
