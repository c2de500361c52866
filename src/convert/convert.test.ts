import { describe, it, expect } from 'vitest';

import { t } from '../signature/typeDesc.js';
import { ConversionError, describeValue } from './convertTypes.js';
import { deserialize } from './deserialize.js';
import { serialize } from './serialize.js';

describe('deserialize', () => {
  it('reads integers by width, 64-bit ones as bigint', () => {
    expect(deserialize(5, t.i32)).toBe(5);
    expect(deserialize(5n, t.i32)).toBe(5);
    expect(deserialize(7, t.i64)).toBe(7n);
    expect(() => deserialize(2 ** 31, t.i32)).toThrow('expected i32 integer, got number 2147483648');
    expect(() => deserialize(-1, t.u32)).toThrow('expected u32 integer, got number -1');
  });

  it('rounds f32 and rejects non-numbers', () => {
    expect(deserialize(0.1, t.f32)).toBe(Math.fround(0.1));
    expect(deserialize(0.1, t.f64)).toBe(0.1);
    expect(() => deserialize('x', t.f64)).toThrow('expected number, got string');
  });

  it('checks strings and chars', () => {
    expect(deserialize('hi', t.string)).toBe('hi');
    expect(() => deserialize('ab', t.path('char'))).toThrow('expected a single character, got string');
    expect(() => deserialize(1, t.string)).toThrow('expected string, got number 1');
  });

  it('binds null for absent options', () => {
    expect(deserialize(undefined, t.option(t.i32))).toBe(null);
    expect(deserialize(null, t.option(t.i32))).toBe(null);
    expect(deserialize(3, t.option(t.i32))).toBe(3);
  });

  it('prefixes element positions in sequence errors', () => {
    expect(() => deserialize([1, 'a'], t.vec(t.i32))).toThrow('[1]: expected i32 integer, got string');
    expect(deserialize([1, 1, 2], t.path('HashSet', t.i32))).toEqual(new Set([1, 2]));
  });

  it('reads maps from plain objects, numeric keys included', () => {
    expect(deserialize({ '1': 'a' }, t.map(t.i32, t.string))).toEqual(new Map([[1, 'a']]));
    expect(() => deserialize({ x: 'a' }, t.map(t.i32, t.string))).toThrow(
      'key "x": expected numeric key, got string',
    );
  });

  it('passes serializable data for unknown named types', () => {
    expect(deserialize({ x: 1, y: [2] }, t.path('Point'))).toEqual({ x: 1, y: [2] });
    expect(() => deserialize(() => 1, t.path('Point'))).toThrow('cannot serialize function');

    const cyclic: Record<string, unknown> = {};
    cyclic.self = cyclic;
    expect(() => deserialize(cyclic, t.path('Point'))).toThrow(ConversionError);
  });
});

describe('serialize', () => {
  it('range-checks integers and widens 64-bit ones', () => {
    expect(serialize(5, t.u64)).toBe(5n);
    expect(() => serialize(3.7, t.i32)).toThrow('cannot represent number 3.7 as i32');
  });

  it('flattens sets and maps', () => {
    expect(serialize(new Set([1, 2]), t.vec(t.i32))).toEqual([1, 2]);
    expect(serialize(new Map([[1, 'a']]), t.map(t.i32, t.string))).toEqual({ '1': 'a' });
  });

  it('passes handles through and drops unit', () => {
    const fn = () => 1;
    expect(serialize(fn, t.local('Function'))).toBe(fn);
    expect(serialize('ignored', t.unit)).toBeUndefined();
  });
});

describe('describeValue', () => {
  it('names the value kind', () => {
    expect(describeValue(1.5)).toBe('number 1.5');
    expect(describeValue(10n)).toBe('bigint 10');
    expect(describeValue([])).toBe('array');
    expect(describeValue(null)).toBe('null');
    expect(describeValue(undefined)).toBe('undefined');
  });
});
