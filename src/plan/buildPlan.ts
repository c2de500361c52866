import {
  classifyReturn,
  classifyType,
  hasValue,
  type ReturnShape,
} from '../classify/typeClass.js';
import { traceInfo } from '../dx/trace.js';
import { warn } from '../dx/warnings.js';
import type { FunctionSignature } from '../signature/signatureTypes.js';
import { resolveStateSpec } from '../state/resolveState.js';
import { evaluateFastEligibility } from './eligibility.js';
import type {
  ArtifactNames,
  CallMode,
  ClassifiedParam,
  GenerationPlan,
} from './planTypes.js';

export function callModeOf(returns: ReturnShape, asyncWrapped: boolean): CallMode {
  const valued = hasValue(returns.value);
  if (asyncWrapped) {
    if (returns.fallible) return 'async-fallible';
    return valued ? 'async-value' : 'async-void';
  }
  if (returns.fallible) return 'fallible';
  return valued ? 'value' : 'void';
}

/** `parse_number` → `parseNumber`; names without underscores are kept. */
function camelCase(name: string): string {
  return name.replace(/_+([a-zA-Z0-9])/g, (_m, c: string) => c.toUpperCase());
}

function screamingCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/_+/g, '_')
    .toUpperCase();
}

export function artifactNames(name: string): ArtifactNames {
  const base = camelCase(name);
  const upper = screamingCase(name);
  return {
    callback: `${base}Callback`,
    fast: `${base}Fast`,
    cfunctionInfo: `${upper}_FAST_CALL_INFO`,
    cfunction: `${upper}_FAST_CALL`,
    template: `${base}Template`,
  };
}

/**
 * Classifies a signature and settles every generation decision up front:
 * call mode, state strategy and fast-path verdict.
 *
 * Throws ConfigurationError for state misconfiguration.
 */
export function buildPlan(signature: FunctionSignature): GenerationPlan {
  const params: ClassifiedParam[] = signature.params.map((p, index) => ({
    name: p.name,
    index,
    type: p.type,
    class: classifyType(p.type),
  }));
  const returns = classifyReturn(signature.returns);
  const callMode = callModeOf(returns, signature.flags.asyncWrapped);

  const verdict = evaluateFastEligibility(params, returns, signature.flags);
  const state = resolveStateSpec(signature, verdict.kind === 'dual-path');

  if (verdict.kind === 'slow-only' && verdict.fallback) {
    warn({
      code: 'FAST_PATH_FALLBACK',
      message: `${signature.name}: ${verdict.fallback.reason}`,
      hint: 'only the slow path is generated for this function',
    });
  }

  const plan: GenerationPlan = {
    signature,
    jsName: signature.jsName ?? signature.name,
    params,
    returns,
    callMode,
    verdict,
    names: artifactNames(signature.name),
  };
  if (state) plan.state = state;

  traceInfo('plan.built', {
    name: signature.name,
    callMode,
    verdict: verdict.kind,
    gate: verdict.kind === 'slow-only' ? verdict.fallback?.gate : undefined,
    state: state?.mode,
  });
  return plan;
}
