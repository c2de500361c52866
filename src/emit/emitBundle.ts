import { buildFastPath, type FastArtifacts } from '../codegen/fastPath.js';
import type { NativeFn } from '../codegen/codegenTypes.js';
import {
  buildTemplateHelper,
  type PinnedRegistration,
  type PlainRegistration,
  type TemplateHelper,
} from '../codegen/registration.js';
import { buildSlowPath } from '../codegen/slowPath.js';
import { traceInfo } from '../dx/trace.js';
import type { FunctionCallback } from '../engine/engineTypes.js';
import { buildPlan } from '../plan/buildPlan.js';
import type { GenerationPlan } from '../plan/planTypes.js';
import { ConfigurationError, type FunctionSignature } from '../signature/signatureTypes.js';

export type ArtifactBundle = {
  /** Native function name. */
  name: string;
  jsName: string;
  plan: GenerationPlan;
  /** The implementation, unchanged. */
  original: NativeFn;
  callback: FunctionCallback;
  /** Present only for dual-path plans. */
  fast?: FastArtifacts;
  template: TemplateHelper;
};

/** Generates every artifact for an already-built plan. */
export function emitPlan(plan: GenerationPlan, impl: NativeFn): ArtifactBundle {
  const callback = buildSlowPath(plan, impl);
  const fast = buildFastPath(plan, impl);
  const template = buildTemplateHelper(plan, callback, fast?.cfunction);

  const bundle: ArtifactBundle = {
    name: plan.signature.name,
    jsName: plan.jsName,
    plan,
    original: impl,
    callback,
    template,
  };
  if (fast) bundle.fast = fast;

  traceInfo('emit.bundle', {
    name: bundle.name,
    jsName: bundle.jsName,
    fast: fast ? fast.abi.prototype : null,
    template: template.mode,
  });
  return bundle;
}

/**
 * Plans and generates the glue for one function.
 *
 * Build-time problems (missing state type, fast + state without a
 * shared-ownership type, bad options) throw ConfigurationError here, never
 * at call time.
 */
export function emitBindings(signature: FunctionSignature, impl: NativeFn): ArtifactBundle {
  return emitPlan(buildPlan(signature), impl);
}

export function requireFastPath(bundle: ArtifactBundle): FastArtifacts {
  if (!bundle.fast) {
    const { verdict } = bundle.plan;
    const reason = verdict.kind === 'slow-only' && verdict.fallback ? `: ${verdict.fallback.reason}` : '';
    throw new ConfigurationError(`${bundle.name} has no fast path${reason}`);
  }
  return bundle.fast;
}

export function plainRegistration(bundle: ArtifactBundle): PlainRegistration {
  const { template } = bundle;
  if (template.mode !== 'plain') {
    throw new ConfigurationError(`${bundle.name} pins its state; register it with pinnedRegistration`);
  }
  return template.register;
}

export function pinnedRegistration(bundle: ArtifactBundle): PinnedRegistration {
  const { template } = bundle;
  if (template.mode !== 'pinned') {
    throw new ConfigurationError(`${bundle.name} does not pin state; register it with plainRegistration`);
  }
  return template.register;
}
