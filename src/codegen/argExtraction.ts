import type { HandleKind, TypeClass } from '../classify/typeClass.js';
import { ConversionError } from '../convert/convertTypes.js';
import { deserialize } from '../convert/deserialize.js';
import type { CallbackArguments, EngineValue, ExecutionScope } from '../engine/engineTypes.js';
import type { ClassifiedParam } from '../plan/planTypes.js';
import type { TypeDesc } from '../signature/signatureTypes.js';
import { formatTypeDesc } from '../signature/typeDesc.js';
import type { Step } from './codegenTypes.js';

export type ArgExtractor = (scope: ExecutionScope, args: CallbackArguments) => Step;

type ValueExtractor = (scope: ExecutionScope, value: EngineValue) => Step;

const HANDLE_PREDICATES: Readonly<Record<Exclude<HandleKind, 'Value'>, (v: unknown) => boolean>> = {
  Function: (v) => typeof v === 'function',
  Object: (v) => (typeof v === 'object' && v !== null) || typeof v === 'function',
  Array: (v) => Array.isArray(v),
  Uint8Array: (v) => v instanceof Uint8Array,
  ArrayBuffer: (v) => v instanceof ArrayBuffer,
  String: (v) => typeof v === 'string',
  Number: (v) => typeof v === 'number',
};

/** Runtime check for a handle kind; `Value` has none. */
export function handlePredicate(kind: HandleKind): ((v: unknown) => boolean) | undefined {
  return kind === 'Value' ? undefined : HANDLE_PREDICATES[kind];
}

function pass(value: EngineValue): Step {
  return { ok: true, value };
}

function handleExtractor(
  index: number,
  c: Extract<TypeClass, { tag: 'handle' }>,
): ValueExtractor {
  if (c.kind === null) {
    const { handleName } = c;
    const message = `argument ${index}: expected ${formatTypeDesc(c.type)}`;
    return (scope, value) =>
      scope.isInstanceOf(value, handleName)
        ? pass(value)
        : { ok: false, exception: scope.typeError(message) };
  }

  const predicate = handlePredicate(c.kind);
  if (!predicate) return (_scope, value) => pass(value);

  const message = `argument ${index} must be a ${c.kind}`;
  return (scope, value) =>
    predicate(value) ? pass(value) : { ok: false, exception: scope.typeError(message) };
}

function deserializingExtractor(index: number, type: TypeDesc): ValueExtractor {
  const expected = formatTypeDesc(type);
  return (scope, value) => {
    try {
      return pass(deserialize(value, type));
    } catch (err) {
      if (!(err instanceof ConversionError)) throw err;
      return {
        ok: false,
        exception: scope.typeError(`argument ${index}: expected ${expected}: ${err.message}`),
      };
    }
  };
}

function leafExtractor(index: number, c: TypeClass): ValueExtractor {
  switch (c.tag) {
    case 'handle':
      return handleExtractor(index, c);
    case 'optional': {
      const inner = leafExtractor(index, c.inner);
      return (scope, value) =>
        value === undefined || value === null ? pass(null) : inner(scope, value);
    }
    case 'primitive':
    case 'opaque':
      return deserializingExtractor(index, c.type);
  }
}

/**
 * Builds the per-call extraction step for one parameter. An omitted
 * argument reads as `undefined`, so it binds `null` for optionals and
 * fails the check for everything else.
 */
export function buildArgExtractor(param: ClassifiedParam): ArgExtractor {
  const { index } = param;
  const extract = leafExtractor(index, param.class);
  return (scope, args) => extract(scope, args.get(index));
}
