import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';

import { err, ok, type Result } from './codegen/codegenTypes.js';
import { emitBindings, pinnedRegistration, plainRegistration } from './emit/emitBundle.js';
import { InProcessHost } from './engine/inProcessEngine.js';
import { parseDeclarationFile } from './parser/index.js';
import type { FunctionSignature } from './signature/signatureTypes.js';
import { SharedState } from './state/sharedState.js';
import { StateReleasedError } from './state/stateTypes.js';

type Counter = { value: number };

const declarations = parseDeclarationFile(
  fileURLToPath(new URL('../examples/math.rs', import.meta.url)),
);

function declared(name: string): FunctionSignature {
  const sig = declarations.find((s) => s.name === name);
  if (!sig) throw new Error(`missing declaration ${name}`);
  return sig;
}

const impls = {
  add: (a: number, b: number) => a + b,
  greet: (name: string, title: string | null) => (title === null ? name : `${title} ${name}`),
  parse_number: (text: string): Result<number, string> => {
    const trimmed = text.trim();
    const n = Number(trimmed);
    return trimmed !== '' && !Number.isNaN(n) ? ok(n) : err('invalid float literal');
  },
  async_divide: (a: number, b: number): Result<number, string> =>
    b === 0 ? err('Division by zero') : ok(a / b),
  increment: (state: Counter, amount: number) => {
    state.value += amount;
    return state.value;
  },
  bump_counter: (state: Counter, amount: number) => {
    state.value += amount;
    return state.value;
  },
};

function install(host: InProcessHost, name: keyof typeof impls) {
  const bundle = emitBindings(declared(name), impls[name]);
  return { bundle, fn: host.install(plainRegistration(bundle)(host.scope())) };
}

describe('generated bindings', () => {
  it('add: slow and fast paths agree', () => {
    const host = new InProcessHost({ fastCallThreshold: 1 });
    const { bundle, fn } = install(host, 'add');
    expect(fn(2, 3)).toBe(5);
    expect(fn(2, 3)).toBe(5);
    expect(host.statsOf(fn)).toEqual({ slow: 1, fast: 1 });
    expect(bundle.fast?.fn(undefined, 2, 3)).toBe(5);
  });

  it('greet: absent optionals read as none', () => {
    const { fn } = install(new InProcessHost(), 'greet');
    expect(fn('Alice', 'Dr.')).toBe('Dr. Alice');
    expect(fn('Alice', undefined)).toBe('Alice');
    expect(fn('Alice', null)).toBe('Alice');
    expect(fn('Alice')).toBe('Alice');
  });

  it('parse_number: failures surface as thrown errors', () => {
    const { fn } = install(new InProcessHost(), 'parse_number');
    expect(fn('42.5')).toBe(42.5);
    expect(() => fn('abc')).toThrow(new Error('invalid float literal'));
  });

  it('async_divide: resolves and rejects the returned promise', async () => {
    const { fn } = install(new InProcessHost(), 'async_divide');
    await expect(fn(10, 2)).resolves.toBe(5);
    await expect(fn(1, 0)).rejects.toThrow('Division by zero');
  });

  it('increment: slot state persists across calls', () => {
    const host = new InProcessHost();
    host.context.setSlot('Counter', { value: 10 });
    const { fn } = install(host, 'increment');
    expect(fn(5)).toBe(15);
    expect(fn(7)).toBe(22);
  });

  it('bump: pinned state persists across slow and fast calls', () => {
    const host = new InProcessHost({ fastCallThreshold: 1 });
    const owner = SharedState.create<Counter>({ value: 10 }, { label: 'Counter' });
    const bundle = emitBindings(declared('bump_counter'), impls.bump_counter);
    expect(bundle.jsName).toBe('bump');

    const fn = host.install(pinnedRegistration(bundle)(host.scope(), owner));
    expect(fn(5)).toBe(15);
    expect(fn(7)).toBe(22);
    expect(host.statsOf(fn)).toEqual({ slow: 1, fast: 1 });
    expect(owner.strongCount).toBe(1);

    owner.release();
    expect(() => fn(1)).toThrow(StateReleasedError);
  });

  it('fast and slow agree for every primitive kind', () => {
    const host = new InProcessHost({ fastCallThreshold: 1 });
    const sig: FunctionSignature = {
      name: 'mix',
      params: [
        { name: 'a', type: { kind: 'path', segments: ['bool'], args: [] } },
        { name: 'b', type: { kind: 'path', segments: ['i32'], args: [] } },
        { name: 'c', type: { kind: 'path', segments: ['u32'], args: [] } },
        { name: 'd', type: { kind: 'path', segments: ['i64'], args: [] } },
        { name: 'e', type: { kind: 'path', segments: ['u64'], args: [] } },
        { name: 'f', type: { kind: 'path', segments: ['f32'], args: [] } },
        { name: 'g', type: { kind: 'path', segments: ['f64'], args: [] } },
      ],
      returns: { kind: 'path', segments: ['f64'], args: [] },
      flags: { usesScope: false, usesState: false, asyncWrapped: false, fastRequested: true },
    };
    const mix = (a: boolean, b: number, c: number, d: bigint, e: bigint, f: number, g: number) =>
      (a ? 1 : 0) + b + c + Number(d) + Number(e) + f + g;
    const fn = host.install(plainRegistration(emitBindings(sig, mix))(host.scope()));

    const args = [true, -2, 3, 4n, 5n, 0.5, 0.25];
    expect(fn(...args)).toBe(11.75);
    expect(fn(...args)).toBe(11.75);
    expect(host.statsOf(fn)).toEqual({ slow: 1, fast: 1 });
  });
});
