import type { TypeDesc } from '../signature/signatureTypes.js';
import { lastSegment } from '../signature/typeDesc.js';
import {
  ConversionError,
  FLOAT_TYPES,
  INT_RANGES,
  MAP_TYPES,
  SEQUENCE_TYPES,
  STRING_TYPES,
  TRANSPARENT_TYPES,
  assertSerializable,
  describeValue,
  toIntegerInRange,
} from './convertTypes.js';

function unrepresentable(expected: string, got: unknown): ConversionError {
  return new ConversionError(`cannot represent ${describeValue(got)} as ${expected}`);
}

/**
 * Generic native-value → engine-value conversion for results.
 *
 * The inverse of `deserialize`: 64-bit integers leave as bigint, `Map` and
 * `Set` leave as plain objects and arrays. Engine handles (`Local<T>`) are
 * already engine values and pass through.
 */
export function serialize(value: unknown, desc: TypeDesc): unknown {
  switch (desc.kind) {
    case 'unit':
      return undefined;
    case 'reference':
      return serialize(value, desc.inner);
    case 'other':
      assertSerializable(value);
      return value;
    case 'path':
      break;
  }

  const name = lastSegment(desc) ?? '';
  const [first, second] = desc.args;

  if (name === 'Local') return value;

  if (name === 'bool') {
    if (typeof value !== 'boolean') throw unrepresentable('bool', value);
    return value;
  }

  const range = INT_RANGES.get(name);
  if (range) {
    const n = toIntegerInRange(value, range);
    if (n === undefined) throw unrepresentable(name, value);
    return range.wide ? n : Number(n);
  }

  if (FLOAT_TYPES.has(name)) {
    if (typeof value !== 'number') throw unrepresentable(name, value);
    return name === 'f32' ? Math.fround(value) : value;
  }

  if (STRING_TYPES.has(name)) {
    if (typeof value !== 'string') throw unrepresentable(name, value);
    return value;
  }

  if (name === 'Option') {
    if (value === undefined || value === null) return null;
    return first ? serialize(value, first) : value;
  }

  if (TRANSPARENT_TYPES.has(name) && first) return serialize(value, first);

  if (SEQUENCE_TYPES.has(name)) {
    const items = value instanceof Set ? [...value] : value;
    if (!Array.isArray(items)) throw unrepresentable('array', value);
    return items.map((item: unknown) => (first ? serialize(item, first) : item));
  }

  if (MAP_TYPES.has(name)) {
    const entries =
      value instanceof Map
        ? [...value.entries()]
        : value !== null && typeof value === 'object' && !Array.isArray(value)
          ? Object.entries(value)
          : undefined;
    if (!entries) throw unrepresentable('object', value);
    const out: Record<string, unknown> = {};
    for (const [k, v] of entries) {
      out[String(k)] = second ? serialize(v, second) : v;
    }
    return out;
  }

  assertSerializable(value);
  return value;
}
