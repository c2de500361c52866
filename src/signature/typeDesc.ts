import type { TypeDesc } from './signatureTypes.js';

function path(name: string, ...args: TypeDesc[]): TypeDesc {
  return { kind: 'path', segments: name.split('::'), args };
}

/**
 * Builders for programmatic signatures.
 *
 * Example: t.result(t.f64, t.string) describes `Result<f64, String>`.
 */
export const t = {
  path,
  bool: path('bool'),
  i32: path('i32'),
  u32: path('u32'),
  i64: path('i64'),
  u64: path('u64'),
  f32: path('f32'),
  f64: path('f64'),
  string: path('String'),
  unit: { kind: 'unit' } as const satisfies TypeDesc,
  option: (inner: TypeDesc) => path('Option', inner),
  result: (ok: TypeDesc, err: TypeDesc) => path('Result', ok, err),
  vec: (inner: TypeDesc) => path('Vec', inner),
  map: (key: TypeDesc, value: TypeDesc) => path('HashMap', key, value),
  rc: (inner: TypeDesc) => path('Rc', inner),
  arc: (inner: TypeDesc) => path('Arc', inner),
  local: (handle: string) => path('Local', path(handle)),
  ref: (inner: TypeDesc, mutable = false): TypeDesc => ({
    kind: 'reference',
    mutable,
    inner,
  }),
};

export function formatTypeDesc(desc: TypeDesc): string {
  switch (desc.kind) {
    case 'unit':
      return '()';
    case 'other':
      return desc.text;
    case 'reference':
      return `&${desc.mutable ? 'mut ' : ''}${formatTypeDesc(desc.inner)}`;
    case 'path': {
      const head = desc.segments.join('::');
      if (!desc.args.length) return head;
      return `${head}<${desc.args.map(formatTypeDesc).join(', ')}>`;
    }
  }
}

export function lastSegment(desc: TypeDesc): string | undefined {
  if (desc.kind !== 'path') return undefined;
  return desc.segments[desc.segments.length - 1];
}

/**
 * Returns the first generic argument when `desc` is a path whose last
 * segment is one of `names` (e.g. `Option`, `std::rc::Rc`).
 */
export function unwrapGeneric(
  desc: TypeDesc,
  names: readonly string[],
): TypeDesc | undefined {
  if (desc.kind !== 'path') return undefined;
  const last = lastSegment(desc);
  if (last === undefined || !names.includes(last)) return undefined;
  return desc.args[0];
}

/** Drops `&` / `&mut` layers: `&Rc<Counter>` → `Rc<Counter>`. */
export function stripReferences(desc: TypeDesc): TypeDesc {
  let cur = desc;
  while (cur.kind === 'reference') cur = cur.inner;
  return cur;
}

export function isTypeDesc(v: unknown): v is TypeDesc {
  if (!v || typeof v !== 'object' || !('kind' in v)) return false;
  switch (v.kind) {
    case 'unit':
      return true;
    case 'other':
      return 'text' in v && typeof v.text === 'string';
    case 'reference':
      return 'inner' in v && isTypeDesc(v.inner);
    case 'path':
      return (
        'segments' in v &&
        Array.isArray(v.segments) &&
        v.segments.every((s) => typeof s === 'string') &&
        'args' in v &&
        Array.isArray(v.args) &&
        v.args.every(isTypeDesc)
      );
    default:
      return false;
  }
}
