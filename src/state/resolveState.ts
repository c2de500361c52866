import { classifyStateType } from '../classify/typeClass.js';
import { ConfigurationError } from '../signature/signatureTypes.js';
import type { FunctionSignature } from '../signature/signatureTypes.js';
import { formatTypeDesc } from '../signature/typeDesc.js';
import type { StateMode, StateSpec } from './stateTypes.js';

/**
 * Decides how state reaches the callback.
 *
 * `pinned` is set when the function gets a fast path: the direct-call
 * protocol has no context to read a slot from, so state must travel as a
 * capsule, and only a shared-ownership type (`Rc<T>`, `Arc<T>`) can be
 * pinned and borrowed from.
 */
export function resolveStateSpec(
  sig: FunctionSignature,
  pinned: boolean,
): StateSpec | undefined {
  if (!sig.flags.usesState) return undefined;

  if (!sig.stateType) {
    throw new ConfigurationError(
      `Function ${sig.name} has a 'state' parameter but no state type specified. Use #[method(state = YourStateType)]`,
    );
  }

  const info = classifyStateType(sig.stateType);
  const mode: StateMode = pinned ? 'pinned-capsule' : 'shared-slot';

  if (mode === 'pinned-capsule' && !info.sharedOwnership) {
    const declared = formatTypeDesc(info.declared);
    throw new ConfigurationError(
      `Function ${sig.name}: fast path with state needs a shared-ownership state type to pin (e.g. Rc<${declared}>), got ${declared}`,
    );
  }

  return {
    declared: info.declared,
    inner: info.inner,
    slotKey: formatTypeDesc(info.inner),
    mode,
  };
}
