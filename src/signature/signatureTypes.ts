/**
 * Structured description of a declared type.
 *
 * - `path`: `f64`, `String`, `Option<T>`, `js::Local<js::Function>`, `Rc<Counter>`
 * - `reference`: `&T` / `&mut T`
 * - `unit`: `()`
 * - `other`: shapes kept verbatim (tuples, arrays, slices, fn pointers)
 */
export type TypeDesc =
  | { kind: 'path'; segments: string[]; args: TypeDesc[] }
  | { kind: 'reference'; mutable: boolean; inner: TypeDesc }
  | { kind: 'unit' }
  | { kind: 'other'; text: string };

export type FunctionParam = {
  name: string;
  type: TypeDesc;
};

export type SignatureFlags = {
  /** The implementation takes the execution scope as its first argument. */
  usesScope: boolean;
  /** The implementation takes shared state (after the scope, if any). */
  usesState: boolean;
  /** Results are surfaced through a deferred (promise) instead of `rv`. */
  asyncWrapped: boolean;
  fastRequested: boolean;
};

export type FunctionSignature = {
  name: string;
  /** Script-facing name; defaults to `name`. */
  jsName?: string;
  /** Positional parameters only; scope and state are not listed here. */
  params: FunctionParam[];
  returns: TypeDesc;
  flags: SignatureFlags;
  stateType?: TypeDesc;
  /** 1-based line in the declaration source, when parsed from one. */
  sourceLine?: number;
};

/** Build-time failure: bad options, missing state type, unsupported state mode. */
export class ConfigurationError extends Error {
  override name = 'ConfigurationError';
}
