import {
  describeTypeClass,
  isFastEligible,
  type PrimitiveKind,
  type ReturnShape,
} from '../classify/typeClass.js';
import type { SignatureFlags } from '../signature/signatureTypes.js';
import type { ClassifiedParam, FastFallback, Verdict } from './planTypes.js';

function slowOnly(fallback: FastFallback): Verdict {
  return { kind: 'slow-only', fallback };
}

/**
 * Fast-path gates, first failure wins:
 * (a) every parameter is a fast primitive, (b) so is the return (or void),
 * (c) the scope is not consumed, (d) the result is not promise-wrapped.
 */
export function evaluateFastEligibility(
  params: readonly ClassifiedParam[],
  returns: ReturnShape,
  flags: SignatureFlags,
): Verdict {
  if (!flags.fastRequested) return { kind: 'slow-only' };

  const fastParams: Array<Exclude<PrimitiveKind, 'void'>> = [];
  for (const p of params) {
    const c = p.class;
    if (!isFastEligible(c) || c.kind === 'void') {
      return slowOnly({
        gate: 'param-not-primitive',
        reason: `parameter \`${p.name}\` (argument ${p.index}) is ${describeTypeClass(c)}, not a fast-path primitive`,
      });
    }
    fastParams.push(c.kind);
  }

  if (returns.fallible) {
    return slowOnly({
      gate: 'return-not-primitive',
      reason: `return type is fallible (Result<${describeTypeClass(returns.value)}, _>)`,
    });
  }
  if (!isFastEligible(returns.value)) {
    return slowOnly({
      gate: 'return-not-primitive',
      reason: `return type is ${describeTypeClass(returns.value)}, not a fast-path primitive`,
    });
  }

  if (flags.usesScope) {
    return slowOnly({
      gate: 'uses-scope',
      reason: 'function uses the execution scope, which the direct-call path cannot provide',
    });
  }

  if (flags.asyncWrapped) {
    return slowOnly({
      gate: 'promise-wrapped',
      reason: 'promise-wrapped results need the execution scope to create the deferred',
    });
  }

  return {
    kind: 'dual-path',
    fast: { params: fastParams, returns: returns.value.kind },
  };
}
