import type { TypeDesc } from '../signature/signatureTypes.js';
import {
  formatTypeDesc,
  lastSegment,
  stripReferences,
  unwrapGeneric,
} from '../signature/typeDesc.js';

export type PrimitiveKind =
  | 'bool'
  | 'i32'
  | 'u32'
  | 'i64'
  | 'u64'
  | 'f32'
  | 'f64'
  | 'void';

/**
 * Engine value categories a handle parameter can be checked against.
 * `Uint8Array` is the typed buffer, `ArrayBuffer` the raw buffer and
 * `Value` accepts anything.
 */
export type HandleKind =
  | 'Function'
  | 'Object'
  | 'Array'
  | 'Uint8Array'
  | 'ArrayBuffer'
  | 'String'
  | 'Number'
  | 'Value';

export type TypeClass =
  | { tag: 'primitive'; kind: PrimitiveKind; type: TypeDesc }
  | { tag: 'optional'; inner: TypeClass; type: TypeDesc }
  | {
      tag: 'handle';
      /** null when the inner name is not a known kind (checked at run time by name). */
      kind: HandleKind | null;
      handleName: string;
      type: TypeDesc;
    }
  | { tag: 'opaque'; type: TypeDesc };

export type PrimitiveClass = Extract<TypeClass, { tag: 'primitive' }>;

export type ReturnShape = {
  /** `Result<T, E>`: failures surface as engine errors / rejections. */
  fallible: boolean;
  value: TypeClass;
};

const HANDLE_KINDS: ReadonlySet<string> = new Set<HandleKind>([
  'Function',
  'Object',
  'Array',
  'Uint8Array',
  'ArrayBuffer',
  'String',
  'Number',
  'Value',
]);

const PRIMITIVES: ReadonlyMap<string, PrimitiveKind> = new Map<string, PrimitiveKind>([
  ['bool', 'bool'],
  ['i32', 'i32'],
  ['u32', 'u32'],
  ['i64', 'i64'],
  ['u64', 'u64'],
  ['f32', 'f32'],
  ['f64', 'f64'],
]);

/** Namespaces accepted in front of `Local`: `Local<T>` and `js::Local<T>`. */
const HANDLE_NAMESPACES = ['js'];

const SHARED_OWNERSHIP = ['Rc', 'Arc'];

function isHandleKind(name: string): name is HandleKind {
  return HANDLE_KINDS.has(name);
}

function matchHandle(desc: TypeDesc): TypeClass | undefined {
  if (desc.kind !== 'path' || lastSegment(desc) !== 'Local') return undefined;

  const { segments } = desc;
  const qualified =
    segments.length === 1 ||
    (segments.length === 2 && HANDLE_NAMESPACES.includes(segments[0] ?? ''));
  if (!qualified) return undefined;

  const inner = desc.args[0];
  const handleName = inner ? lastSegment(inner) : undefined;
  if (!handleName) return undefined;

  return {
    tag: 'handle',
    kind: isHandleKind(handleName) ? handleName : null,
    handleName,
    type: desc,
  };
}

function matchPrimitive(desc: TypeDesc): TypeClass | undefined {
  if (desc.kind === 'unit') return { tag: 'primitive', kind: 'void', type: desc };
  if (desc.kind !== 'path' || desc.segments.length !== 1 || desc.args.length) {
    return undefined;
  }
  const kind = PRIMITIVES.get(desc.segments[0] ?? '');
  return kind ? { tag: 'primitive', kind, type: desc } : undefined;
}

function classifyLeaf(desc: TypeDesc): TypeClass {
  return matchHandle(desc) ?? matchPrimitive(desc) ?? { tag: 'opaque', type: desc };
}

/**
 * Classifies a parameter or return type.
 *
 * Order: one level of `Option<T>`, then engine handles, then fast-eligible
 * primitives, then opaque. `Option<Option<T>>` classifies its inner
 * `Option<T>` as opaque.
 */
export function classifyType(desc: TypeDesc): TypeClass {
  const optionInner = unwrapGeneric(desc, ['Option']);
  if (optionInner) {
    return { tag: 'optional', inner: classifyLeaf(optionInner), type: desc };
  }
  return classifyLeaf(desc);
}

export function classifyReturn(desc: TypeDesc): ReturnShape {
  const okType = unwrapGeneric(desc, ['Result']);
  if (okType) return { fallible: true, value: classifyType(okType) };
  return { fallible: false, value: classifyType(desc) };
}

export function isFastEligible(c: TypeClass): c is PrimitiveClass {
  return c.tag === 'primitive';
}

export function hasValue(c: TypeClass): boolean {
  return !(c.tag === 'primitive' && c.kind === 'void');
}

export type StateTypeInfo = {
  declared: TypeDesc;
  /** `Counter` for `Rc<Counter>`; the declared type itself otherwise. */
  inner: TypeDesc;
  sharedOwnership: boolean;
};

/** Unwraps one level of `Rc<T>` / `Arc<T>` (after any `&`). */
export function classifyStateType(declared: TypeDesc): StateTypeInfo {
  const bare = stripReferences(declared);
  const inner = unwrapGeneric(bare, SHARED_OWNERSHIP);
  return inner
    ? { declared, inner, sharedOwnership: true }
    : { declared, inner: bare, sharedOwnership: false };
}

export function describeTypeClass(c: TypeClass): string {
  switch (c.tag) {
    case 'primitive':
      return c.kind;
    case 'optional':
      return `Option<${describeTypeClass(c.inner)}>`;
    case 'handle':
      return `Local<${c.handleName}>`;
    case 'opaque':
      return formatTypeDesc(c.type);
  }
}
