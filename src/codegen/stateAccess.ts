import type {
  CallbackArguments,
  EngineValue,
  ExecutionScope,
} from '../engine/engineTypes.js';
import { formatTypeDesc } from '../signature/typeDesc.js';
import { StateCapsule } from '../state/sharedState.js';
import { StateError, type StateSpec } from '../state/stateTypes.js';
import type { Step } from './codegenTypes.js';

export type StateAccessor = (scope: ExecutionScope, args: CallbackArguments) => Step;

/** Reads the capsule out of an external's payload, if that is what it holds. */
export function capsuleFrom(data: EngineValue): StateCapsule<unknown> | undefined {
  if (data === null || typeof data !== 'object' || !('value' in data)) return undefined;
  return StateCapsule.isStateCapsule(data.value) ? data.value : undefined;
}

function slotAccessor(spec: StateSpec): StateAccessor {
  const { slotKey } = spec;
  const message = `internal error: state not found for ${formatTypeDesc(spec.declared)}`;
  return (scope) => {
    const context = scope.currentContext();
    if (!context.hasSlot(slotKey)) {
      return { ok: false, exception: scope.error(message) };
    }
    return { ok: true, value: context.getSlot(slotKey) };
  };
}

function capsuleAccessor(spec: StateSpec): StateAccessor {
  const message = capsuleMissingMessage(spec);
  return (scope, args) => {
    const data = args.data();
    const capsule = scope.isExternal(data) ? capsuleFrom(data) : undefined;
    if (!capsule) return { ok: false, exception: scope.error(message) };
    return { ok: true, value: capsule.borrow() };
  };
}

export function capsuleMissingMessage(spec: StateSpec): string {
  return `internal error: state data not set for ${formatTypeDesc(spec.declared)}`;
}

/**
 * Slow-path state lookup: the context slot for `shared-slot`, the
 * callable's associated data for `pinned-capsule`.
 */
export function buildStateAccessor(spec: StateSpec): StateAccessor {
  return spec.mode === 'shared-slot' ? slotAccessor(spec) : capsuleAccessor(spec);
}

/**
 * Fast-path state lookup from the per-call options. There is no scope to
 * throw into, so a missing capsule raises a StateError directly.
 */
export function buildFastStateReader(spec: StateSpec): (options: EngineValue) => unknown {
  const message = capsuleMissingMessage(spec);
  return (options) => {
    const data =
      options !== null && typeof options === 'object' && 'data' in options
        ? options.data
        : undefined;
    const capsule = capsuleFrom(data);
    if (!capsule) throw new StateError(message);
    return capsule.borrow();
  };
}
