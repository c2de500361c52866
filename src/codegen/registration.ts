import type {
  CFunction,
  EngineValue,
  ExecutionScope,
  FunctionCallback,
  FunctionTemplate,
} from '../engine/engineTypes.js';
import type { GenerationPlan } from '../plan/planTypes.js';
import type { SharedState } from '../state/sharedState.js';

export type PlainRegistration = (scope: ExecutionScope, data?: EngineValue) => FunctionTemplate;

/**
 * The caller keeps `owner` alive for as long as the callable is
 * registered; the template only borrows from it.
 */
export type PinnedRegistration = (
  scope: ExecutionScope,
  owner: SharedState<unknown>,
) => FunctionTemplate;

export type TemplateHelper =
  | { mode: 'plain'; register: PlainRegistration }
  | { mode: 'pinned'; register: PinnedRegistration };

/**
 * Registration helper: builds the function template, dual-path when a fast
 * overload exists. Pinned-capsule state is attached as the template's data.
 */
export function buildTemplateHelper(
  plan: GenerationPlan,
  callback: FunctionCallback,
  cfunction: CFunction | undefined,
): TemplateHelper {
  const overloads = cfunction ? [cfunction] : [];

  if (plan.state?.mode === 'pinned-capsule') {
    return {
      mode: 'pinned',
      register: (scope, owner) => {
        const data = scope.newExternal(owner.capsule());
        return scope.functionTemplate(callback).data(data).buildFast(scope, overloads);
      },
    };
  }

  return {
    mode: 'plain',
    register: (scope, data) => {
      let builder = scope.functionTemplate(callback);
      if (data !== undefined) builder = builder.data(data);
      return overloads.length ? builder.buildFast(scope, overloads) : builder.build(scope);
    },
  };
}
