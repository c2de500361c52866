export class ConversionError extends Error {
  override name = 'ConversionError';
}

/** Short value description for conversion messages: `string`, `number 1.5`, `null`. */
export function describeValue(v: unknown): string {
  if (v === null) return 'null';
  if (Array.isArray(v)) return 'array';
  switch (typeof v) {
    case 'number':
    case 'bigint':
    case 'boolean':
      return `${typeof v} ${String(v)}`;
    case 'string':
      return 'string';
    default:
      return typeof v;
  }
}

export type IntRange = { min: bigint; max: bigint; wide: boolean };

/** Integer widths; `wide` types cross the boundary as bigint. */
export const INT_RANGES: ReadonlyMap<string, IntRange> = new Map([
  ['i8', { min: -(2n ** 7n), max: 2n ** 7n - 1n, wide: false }],
  ['u8', { min: 0n, max: 2n ** 8n - 1n, wide: false }],
  ['i16', { min: -(2n ** 15n), max: 2n ** 15n - 1n, wide: false }],
  ['u16', { min: 0n, max: 2n ** 16n - 1n, wide: false }],
  ['i32', { min: -(2n ** 31n), max: 2n ** 31n - 1n, wide: false }],
  ['u32', { min: 0n, max: 2n ** 32n - 1n, wide: false }],
  ['i64', { min: -(2n ** 63n), max: 2n ** 63n - 1n, wide: true }],
  ['u64', { min: 0n, max: 2n ** 64n - 1n, wide: true }],
  ['isize', { min: -(2n ** 63n), max: 2n ** 63n - 1n, wide: true }],
  ['usize', { min: 0n, max: 2n ** 64n - 1n, wide: true }],
]);

export const FLOAT_TYPES: ReadonlySet<string> = new Set(['f32', 'f64']);
export const STRING_TYPES: ReadonlySet<string> = new Set(['String', 'str', 'char']);
export const SEQUENCE_TYPES: ReadonlySet<string> = new Set(['Vec', 'VecDeque', 'HashSet', 'BTreeSet']);
export const MAP_TYPES: ReadonlySet<string> = new Set(['HashMap', 'BTreeMap']);
export const TRANSPARENT_TYPES: ReadonlySet<string> = new Set(['Box']);

/**
 * Reads an integer of the given range from a number or bigint.
 * Returns undefined when the value is not an in-range integer.
 */
export function toIntegerInRange(v: unknown, range: IntRange): bigint | undefined {
  let n: bigint;
  if (typeof v === 'bigint') n = v;
  else if (typeof v === 'number' && Number.isSafeInteger(v)) n = BigInt(v);
  else return undefined;
  return n >= range.min && n <= range.max ? n : undefined;
}

/**
 * Walks a value and throws when it holds something the engine value model
 * cannot carry across the boundary (functions, symbols, cycles).
 */
export function assertSerializable(v: unknown, seen: Set<object> = new Set()): void {
  if (typeof v === 'function' || typeof v === 'symbol') {
    throw new ConversionError(`cannot serialize ${typeof v}`);
  }
  if (v === null || typeof v !== 'object') return;
  if (ArrayBuffer.isView(v) || v instanceof ArrayBuffer) return;
  if (seen.has(v)) throw new ConversionError('cannot serialize a cyclic structure');
  seen.add(v);
  const entries = v instanceof Map ? [...v.values()] : Object.values(v);
  for (const item of entries) assertSerializable(item, seen);
  seen.delete(v);
}
