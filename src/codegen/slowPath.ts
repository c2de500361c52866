import type {
  CallbackArguments,
  ExecutionScope,
  FunctionCallback,
} from '../engine/engineTypes.js';
import type { GenerationPlan } from '../plan/planTypes.js';
import { buildArgExtractor } from './argExtraction.js';
import { buildCompletion } from './callReturn.js';
import type { NativeFn, Step } from './codegenTypes.js';
import { buildStateAccessor } from './stateAccess.js';

type Invoker = (scope: ExecutionScope, state: unknown, values: unknown[]) => unknown;

const NO_STATE: Step = { ok: true, value: undefined };

/** Fixes the implementation's leading arguments once, from the flags. */
function buildInvoker(plan: GenerationPlan, impl: NativeFn): Invoker {
  const { usesScope, usesState } = plan.signature.flags;
  if (usesScope && usesState) {
    return (scope, state, values) => Reflect.apply(impl, undefined, [scope, state, ...values]);
  }
  if (usesScope) {
    return (scope, _state, values) => Reflect.apply(impl, undefined, [scope, ...values]);
  }
  if (usesState) {
    return (_scope, state, values) => Reflect.apply(impl, undefined, [state, ...values]);
  }
  return (_scope, _state, values) => Reflect.apply(impl, undefined, values);
}

/**
 * Builds the interpreted-call wrapper `(scope, args, rv)`.
 *
 * State is looked up first, then arguments are extracted in declaration
 * order; the first failure throws into the scope and aborts before the
 * call, leaving `rv` untouched.
 */
export function buildSlowPath(plan: GenerationPlan, impl: NativeFn): FunctionCallback {
  const extractors = plan.params.map(buildArgExtractor);
  const readState: (scope: ExecutionScope, args: CallbackArguments) => Step = plan.state
    ? buildStateAccessor(plan.state)
    : () => NO_STATE;
  const invoke = buildInvoker(plan, impl);
  const complete = buildCompletion(plan);

  return (scope, args, rv) => {
    const state = readState(scope, args);
    if (!state.ok) {
      scope.throwException(state.exception);
      return;
    }

    const values: unknown[] = [];
    for (const extract of extractors) {
      const step = extract(scope, args);
      if (!step.ok) {
        scope.throwException(step.exception);
        return;
      }
      values.push(step.value);
    }

    complete(scope, rv, () => invoke(scope, state.value, values));
  };
}
