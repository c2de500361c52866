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

function mismatch(expected: string, got: unknown): ConversionError {
  return new ConversionError(`expected ${expected}, got ${describeValue(got)}`);
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  if (v === null || typeof v !== 'object' || Array.isArray(v)) return false;
  const proto: unknown = Object.getPrototypeOf(v);
  return proto === Object.prototype || proto === null;
}

function withContext(label: string, fn: () => unknown): unknown {
  try {
    return fn();
  } catch (err) {
    if (err instanceof ConversionError) {
      throw new ConversionError(`${label}: ${err.message}`);
    }
    throw err;
  }
}

function deserializeKey(key: string, desc: TypeDesc | undefined): unknown {
  if (!desc) return key;
  const name = lastSegment(desc);
  if (name && (INT_RANGES.has(name) || FLOAT_TYPES.has(name))) {
    const n = Number(key);
    if (key.trim() === '' || Number.isNaN(n)) throw mismatch(`numeric key`, key);
    return deserialize(n, desc);
  }
  return deserialize(key, desc);
}

/**
 * Generic engine-value → native-value conversion, driven by the declared type.
 *
 * Integers of 64 bits come back as bigint; maps come back as `Map`.
 * Unknown named types (user structs, `serde_json::Value`) pass through once
 * they are known to hold only serializable data.
 */
export function deserialize(value: unknown, desc: TypeDesc): unknown {
  switch (desc.kind) {
    case 'unit':
      if (value === undefined || value === null) return undefined;
      throw mismatch('()', value);
    case 'reference':
      return deserialize(value, desc.inner);
    case 'other':
      assertSerializable(value);
      return value;
    case 'path':
      break;
  }

  const name = lastSegment(desc) ?? '';
  const [first, second] = desc.args;

  if (name === 'bool') {
    if (typeof value !== 'boolean') throw mismatch('boolean', value);
    return value;
  }

  const range = INT_RANGES.get(name);
  if (range) {
    const n = toIntegerInRange(value, range);
    if (n === undefined) throw mismatch(`${name} integer`, value);
    return range.wide ? n : Number(n);
  }

  if (FLOAT_TYPES.has(name)) {
    if (typeof value !== 'number') throw mismatch('number', value);
    return name === 'f32' ? Math.fround(value) : value;
  }

  if (STRING_TYPES.has(name)) {
    if (typeof value !== 'string') throw mismatch('string', value);
    if (name === 'char' && [...value].length !== 1) {
      throw mismatch('a single character', value);
    }
    return value;
  }

  if (name === 'Option') {
    if (value === undefined || value === null) return null;
    return first ? deserialize(value, first) : value;
  }

  if (TRANSPARENT_TYPES.has(name) && first) return deserialize(value, first);

  if (SEQUENCE_TYPES.has(name)) {
    if (!Array.isArray(value)) throw mismatch('array', value);
    const items = value.map((item: unknown, i) =>
      first ? withContext(`[${i}]`, () => deserialize(item, first)) : item,
    );
    return name === 'HashSet' || name === 'BTreeSet' ? new Set(items) : items;
  }

  if (MAP_TYPES.has(name)) {
    if (!isPlainObject(value)) throw mismatch('object', value);
    const out = new Map<unknown, unknown>();
    for (const [k, v] of Object.entries(value)) {
      const key = withContext(`key ${JSON.stringify(k)}`, () => deserializeKey(k, first));
      out.set(key, second ? withContext(`.${k}`, () => deserialize(v, second)) : v);
    }
    return out;
  }

  assertSerializable(value);
  return value;
}
