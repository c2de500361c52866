import type { TypeDesc } from '../signature/signatureTypes.js';

/**
 * - `shared-slot`: state lives in a per-context slot shared by every
 *   callable bound to that context.
 * - `pinned-capsule`: state is pinned at registration and reaches one
 *   callable through its associated data (and the fast-call options).
 */
export type StateMode = 'shared-slot' | 'pinned-capsule';

export type StateSpec = {
  /** As declared, e.g. `Rc<Counter>`; used in error messages. */
  declared: TypeDesc;
  /** Unwrapped type, e.g. `Counter`. */
  inner: TypeDesc;
  /** Slot key: the formatted inner type. */
  slotKey: string;
  mode: StateMode;
};

export class StateError extends Error {
  override name = 'StateError';
}

/** A capsule was borrowed after its owner dropped the state. */
export class StateReleasedError extends StateError {
  override name = 'StateReleasedError';
}

/** `release()` called more times than the state has owners. */
export class InvalidReleaseError extends StateError {
  override name = 'InvalidReleaseError';
}
