import { ConversionError } from '../convert/convertTypes.js';
import { serialize } from '../convert/serialize.js';
import { warn } from '../dx/warnings.js';
import type { ExecutionScope, ReturnValue } from '../engine/engineTypes.js';
import type { GenerationPlan } from '../plan/planTypes.js';
import { formatTypeDesc } from '../signature/typeDesc.js';
import { isResult, stringifyError } from './codegenTypes.js';

/** Runs the implementation and routes its result into `rv` or a deferred. */
export type Completion = (
  scope: ExecutionScope,
  rv: ReturnValue,
  invoke: () => unknown,
) => void;

type Converted = { ok: true; value: unknown } | { ok: false };

function buildConverter(plan: GenerationPlan): (value: unknown) => Converted {
  const type = plan.returns.value.type;
  const label = `${plan.signature.name}: return value`;
  return (value) => {
    try {
      return { ok: true, value: serialize(value, type) };
    } catch (err) {
      if (!(err instanceof ConversionError)) throw err;
      warn({
        code: 'RETURN_VALUE_DROPPED',
        message: `${label} not converted to ${formatTypeDesc(type)}: ${err.message}`,
      });
      return { ok: false };
    }
  };
}

function notAResult(plan: GenerationPlan, got: unknown): Converted {
  warn({
    code: 'RETURN_VALUE_DROPPED',
    message: `${plan.signature.name}: expected a Result, got ${typeof got}`,
    hint: 'fallible implementations return ok(value) or err(error)',
  });
  return { ok: false };
}

/**
 * Picks the completion for the plan's call mode. Conversion failures leave
 * `rv` unset (the deferred pending) and are reported as warnings.
 */
export function buildCompletion(plan: GenerationPlan): Completion {
  const convert = buildConverter(plan);

  switch (plan.callMode) {
    case 'async-fallible':
      return (scope, rv, invoke) => {
        const deferred = scope.createDeferred();
        rv.set(deferred.promise);
        const result = invoke();
        if (!isResult(result)) {
          notAResult(plan, result);
          return;
        }
        if (!result.ok) {
          deferred.reject(scope.error(stringifyError(result.error)));
          return;
        }
        const converted = convert(result.value);
        if (converted.ok) deferred.resolve(converted.value);
      };

    case 'async-value':
      return (scope, rv, invoke) => {
        const deferred = scope.createDeferred();
        rv.set(deferred.promise);
        const converted = convert(invoke());
        if (converted.ok) deferred.resolve(converted.value);
      };

    case 'async-void':
      return (scope, rv, invoke) => {
        const deferred = scope.createDeferred();
        rv.set(deferred.promise);
        invoke();
        deferred.resolve(undefined);
      };

    case 'fallible':
      return (scope, rv, invoke) => {
        const result = invoke();
        if (!isResult(result)) {
          notAResult(plan, result);
          return;
        }
        if (!result.ok) {
          scope.throwException(scope.error(stringifyError(result.error)));
          return;
        }
        const converted = convert(result.value);
        if (converted.ok) rv.set(converted.value);
      };

    case 'value':
      return (_scope, rv, invoke) => {
        const converted = convert(invoke());
        if (converted.ok) rv.set(converted.value);
      };

    case 'void':
      return (_scope, _rv, invoke) => {
        invoke();
      };
  }
}
