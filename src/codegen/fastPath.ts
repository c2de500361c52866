import type { PrimitiveKind } from '../classify/typeClass.js';
import { ConversionError } from '../convert/convertTypes.js';
import { serialize } from '../convert/serialize.js';
import { warn } from '../dx/warnings.js';
import type {
  CFunction,
  CFunctionInfo,
  FastFunction,
  FastScalar,
  FastType,
} from '../engine/engineTypes.js';
import { abiLayout, FAST_TYPES, type AbiLayout } from '../ffi/abiTypes.js';
import type { FastSignature, GenerationPlan } from '../plan/planTypes.js';
import { formatTypeDesc } from '../signature/typeDesc.js';
import type { StateSpec } from '../state/stateTypes.js';
import type { NativeFn } from './codegenTypes.js';
import { buildFastStateReader } from './stateAccess.js';

export type FastArtifacts = {
  fn: FastFunction;
  info: CFunctionInfo;
  cfunction: CFunction;
  abi: AbiLayout;
};

function isFastScalar(v: unknown): v is FastScalar {
  return typeof v === 'boolean' || typeof v === 'number' || typeof v === 'bigint';
}

/**
 * Result leaves through the same conversion as the slow path's; a value
 * that does not convert is dropped with the same warning.
 */
function buildFastReturn(
  kind: PrimitiveKind,
  plan: GenerationPlan,
): (value: unknown) => FastScalar | undefined {
  if (kind === 'void') return () => undefined;
  const type = plan.returns.value.type;
  const label = `${plan.signature.name}: return value`;
  return (value) => {
    try {
      const out = serialize(value, type);
      return isFastScalar(out) ? out : undefined;
    } catch (err) {
      if (!(err instanceof ConversionError)) throw err;
      warn({
        code: 'RETURN_VALUE_DROPPED',
        message: `${label} not converted to ${formatTypeDesc(type)}: ${err.message}`,
      });
      return undefined;
    }
  };
}

export function buildCFunctionInfo(fast: FastSignature, state: StateSpec | undefined): CFunctionInfo {
  const argTypes: FastType[] = ['receiver', ...fast.params.map((k) => FAST_TYPES[k])];
  if (state) argTypes.push('callbackOptions');
  return {
    returnType: FAST_TYPES[fast.returns],
    argTypes,
    int64Representation: 'bigint',
  };
}

/**
 * Direct-call function `(receiver, ...primitives[, options])`.
 *
 * Arguments arrive already marshalled to the ABI, so they are handed to the
 * implementation as-is. With state, the capsule travels in `options.data`.
 */
export function buildFastFunction(
  plan: GenerationPlan,
  fast: FastSignature,
  impl: NativeFn,
): FastFunction {
  const arity = fast.params.length;
  const toReturn = buildFastReturn(fast.returns, plan);

  if (!plan.state) {
    return (_receiver, ...rest) =>
      toReturn(Reflect.apply(impl, undefined, rest.slice(0, arity)));
  }

  const readState = buildFastStateReader(plan.state);
  return (_receiver, ...rest) => {
    const state = readState(rest[arity]);
    return toReturn(Reflect.apply(impl, undefined, [state, ...rest.slice(0, arity)]));
  };
}

/** The fast pair for a dual-path plan; undefined for slow-only plans. */
export function buildFastPath(plan: GenerationPlan, impl: NativeFn): FastArtifacts | undefined {
  const { verdict } = plan;
  if (verdict.kind !== 'dual-path') return undefined;

  const fn = buildFastFunction(plan, verdict.fast, impl);
  const info = buildCFunctionInfo(verdict.fast, plan.state);
  return {
    fn,
    info,
    cfunction: { fn, info },
    abi: abiLayout(plan.names.fast, info),
  };
}
