import type {
  PrimitiveKind,
  ReturnShape,
  TypeClass,
} from '../classify/typeClass.js';
import type { FunctionSignature, TypeDesc } from '../signature/signatureTypes.js';
import type { StateSpec } from '../state/stateTypes.js';

/**
 * The six call/return shapes, in precedence order:
 * async+fallible, async+value, async+void, fallible, value, void.
 */
export type CallMode =
  | 'async-fallible'
  | 'async-value'
  | 'async-void'
  | 'fallible'
  | 'value'
  | 'void';

export type ClassifiedParam = {
  name: string;
  /** Call-site argument index. */
  index: number;
  type: TypeDesc;
  class: TypeClass;
};

export type FastGate =
  | 'param-not-primitive'
  | 'return-not-primitive'
  | 'uses-scope'
  | 'promise-wrapped';

export type FastFallback = {
  gate: FastGate;
  reason: string;
};

export type FastSignature = {
  params: Array<Exclude<PrimitiveKind, 'void'>>;
  returns: PrimitiveKind;
};

export type Verdict =
  | { kind: 'dual-path'; fast: FastSignature }
  | {
      kind: 'slow-only';
      /** Present when fast was requested and a gate failed. */
      fallback?: FastFallback;
    };

export type ArtifactNames = {
  callback: string;
  fast: string;
  cfunctionInfo: string;
  cfunction: string;
  template: string;
};

export type GenerationPlan = {
  signature: FunctionSignature;
  jsName: string;
  params: ClassifiedParam[];
  returns: ReturnShape;
  callMode: CallMode;
  state?: StateSpec;
  verdict: Verdict;
  names: ArtifactNames;
};
