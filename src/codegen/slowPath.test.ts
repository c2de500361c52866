import { describe, it, expect, afterEach, vi } from 'vitest';

import { setDebugEnabled } from '../dx/logger.js';
import { InProcessDeferred, InProcessHost } from '../engine/inProcessEngine.js';
import type { EngineFunction, ExecutionScope } from '../engine/engineTypes.js';
import { buildPlan } from '../plan/buildPlan.js';
import { describeFunction, type FunctionDescription } from '../signature/describeFunction.js';
import { t } from '../signature/typeDesc.js';
import { SharedState } from '../state/sharedState.js';
import { err, ok, type NativeFn } from './codegenTypes.js';
import { buildSlowPath } from './slowPath.js';

function slowCallable(
  name: string,
  desc: FunctionDescription,
  impl: NativeFn,
  options: Record<string, unknown> = {},
  host = new InProcessHost(),
): EngineFunction {
  const callback = buildSlowPath(buildPlan(describeFunction(name, desc, options)), impl);
  const scope = host.scope();
  return host.install(scope.functionTemplate(callback).build(scope));
}

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (e) {
    return e;
  }
  throw new Error('expected a throw');
}

describe('slow path argument checks', () => {
  it('checks handle kinds by predicate', () => {
    const call = slowCallable('run', { params: [['cb', t.local('Function')]] }, () => {});
    const e = thrown(() => call(5));
    expect(e).toBeInstanceOf(TypeError);
    expect(e).toHaveProperty('message', 'argument 0 must be a Function');

    const size = slowCallable('size', { params: [['buf', t.local('Uint8Array')]], returns: t.u32 }, (buf: Uint8Array) => buf.length);
    expect(size(new Uint8Array(2))).toBe(2);
    expect(() => size([1, 2])).toThrow('argument 0 must be a Uint8Array');
  });

  it('never checks Local<Value>', () => {
    const echo = slowCallable('echo', { params: [['v', t.local('Value')]], returns: t.local('Value') }, (v: unknown) => v);
    const sym = Symbol('x');
    expect(echo(sym)).toBe(sym);
  });

  it('checks unknown handle names with the host', () => {
    const host = new InProcessHost({ types: { Point: (v) => typeof v === 'object' && v !== null && 'x' in v } });
    const take = slowCallable('take', { params: [['p', t.local('Point')], ['q', t.local('Promise')]] }, () => {}, {}, host);
    expect(() => take({ y: 1 }, Promise.resolve())).toThrow('argument 0: expected Local<Point>');
    expect(() => take({ x: 1 }, {})).toThrow('argument 1: expected Local<Promise>');
    expect(take({ x: 1 }, Promise.resolve())).toBeUndefined();
  });

  it('reports deserialization failures with the declared type', () => {
    const impl = vi.fn((a: number, b: number) => a + b);
    const add = slowCallable('add', { params: [['a', t.f64], ['b', t.f64]], returns: t.f64 }, impl);
    expect(() => add('x', 1)).toThrow('argument 0: expected f64: expected number, got string');
    expect(() => add(1)).toThrow('argument 1: expected f64: expected number, got undefined');
    expect(impl).not.toHaveBeenCalled();
  });

  it('binds null for absent optionals and checks present ones', () => {
    const show = slowCallable(
      'show',
      { params: [['n', t.option(t.i32)]], returns: t.string },
      (n: number | null) => (n === null ? 'none' : `n=${n}`),
    );
    expect(show()).toBe('none');
    expect(show(null)).toBe('none');
    expect(show(4)).toBe('n=4');
    expect(() => show('4')).toThrow('argument 0: expected i32: expected i32 integer, got string');
  });
});

describe('slow path call/return handling', () => {
  afterEach(() => {
    setDebugEnabled(false);
    vi.restoreAllMocks();
  });

  it('leaves the return value undefined for void functions', () => {
    const impl = vi.fn(() => 42);
    const tick = slowCallable('tick', {}, impl);
    expect(tick()).toBeUndefined();
    expect(impl).toHaveBeenCalledTimes(1);
  });

  it('throws a plain Error for failed results', () => {
    const check = slowCallable(
      'check',
      { params: [['v', t.i32]], returns: t.result(t.i32, t.string) },
      (v: number) => (v > 0 ? ok(v * 2) : err(new RangeError('must be positive'))),
    );
    expect(check(2)).toBe(4);
    const e = thrown(() => check(0));
    expect(e).not.toBeInstanceOf(TypeError);
    expect(e).not.toBeInstanceOf(RangeError);
    expect(e).toHaveProperty('message', 'must be positive');
  });

  it('settles deferreds for the three async shapes', async () => {
    const later = slowCallable('later', { returns: t.i64 }, () => 9, { promise: true });
    await expect(later()).resolves.toBe(9n);

    const fire = slowCallable('fire', {}, () => 'ignored', { promise: true });
    await expect(fire()).resolves.toBeUndefined();

    const fetchish = slowCallable('fetchish', { returns: t.result(t.string, t.string) }, () => err('offline'), {
      promise: true,
    });
    await expect(fetchish()).rejects.toThrow('offline');
  });

  it('leaves rv unset and warns when the result does not convert', () => {
    setDebugEnabled(true);
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const bad = slowCallable('bad', { returns: t.i32 }, () => 'oops');
    expect(bad()).toBeUndefined();
    expect(spy).toHaveBeenCalledWith(
      '[enginebind]',
      'warning(RETURN_VALUE_DROPPED): bad: return value not converted to i32: cannot represent string as i32',
    );
  });

  it('keeps the deferred pending when an async result does not convert', () => {
    const host = new InProcessHost();
    const bad = slowCallable('bad', { returns: t.u32 }, () => -1, { promise: true }, host);
    expect(bad()).toBeInstanceOf(Promise);
    expect(host.lastDeferreds().map((d) => d.state)).toEqual(['pending']);
  });

  it('treats a non-Result from a fallible function as a dropped value', () => {
    const loose = slowCallable('loose', { returns: t.result(t.i32, t.string) }, () => 3);
    expect(loose()).toBeUndefined();
  });

  it('hands back the pending promise before the implementation runs', async () => {
    const host = new InProcessHost();
    const scope = host.scope();
    const created = vi.spyOn(scope, 'createDeferred');
    const sets: unknown[] = [];
    const seen: Array<{ sets: number; promise: boolean; state: string | undefined }> = [];

    const plan = buildPlan(
      describeFunction('fetch_count', { returns: t.result(t.u32, t.string), scope: true }, { promise: true }),
    );
    const callback = buildSlowPath(plan, (_scope: ExecutionScope) => {
      const pending = created.mock.results[0]?.value;
      seen.push({
        sets: sets.length,
        promise: sets[0] instanceof Promise,
        state: pending instanceof InProcessDeferred ? pending.state : undefined,
      });
      return ok(7);
    });

    callback(scope, { length: 0, get: () => undefined, data: () => undefined }, { set: (v) => sets.push(v) });

    expect(seen).toEqual([{ sets: 1, promise: true, state: 'pending' }]);
    expect(created).toHaveBeenCalledTimes(1);
    expect(sets).toHaveLength(1);
    await expect(sets[0]).resolves.toBe(7);

    const deferred = created.mock.results[0]?.value;
    if (!(deferred instanceof InProcessDeferred)) throw new Error('expected an in-process deferred');
    expect(deferred.state).toBe('resolved');
    expect(deferred.resolve(8)).toBe(false);
    expect(deferred.reject(new Error('late'))).toBe(false);
    expect(deferred.state).toBe('resolved');
  });

  it('passes the scope first when the function uses it', () => {
    const seen: ExecutionScope[] = [];
    const peek = slowCallable(
      'peek',
      { params: [['n', t.i32]], returns: t.i32, scope: true },
      (scope: ExecutionScope, n: number) => {
        seen.push(scope);
        return n + 1;
      },
    );
    expect(peek(1)).toBe(2);
    expect(typeof seen[0]?.createDeferred).toBe('function');
  });
});

describe('slow path state', () => {
  type Counter = { value: number };
  const counter = t.path('Counter');

  it('fails with an internal error when the slot is empty', () => {
    const inc = slowCallable(
      'increment',
      { params: [['n', t.i32]], returns: t.i32, state: true },
      (s: Counter, n: number) => (s.value += n),
      { state: t.rc(counter) },
    );
    const e = thrown(() => inc(1));
    expect(e).not.toBeInstanceOf(TypeError);
    expect(e).toHaveProperty('message', 'internal error: state not found for Rc<Counter>');
  });

  it('looks up state before checking arguments', () => {
    const impl = vi.fn((s: Counter, n: number) => (s.value += n));
    const inc = slowCallable(
      'increment',
      { params: [['n', t.i32]], returns: t.i32, state: true },
      impl,
      { state: t.rc(counter) },
    );
    const e = thrown(() => inc('x'));
    expect(e).not.toBeInstanceOf(TypeError);
    expect(e).toHaveProperty('message', 'internal error: state not found for Rc<Counter>');
    expect(impl).not.toHaveBeenCalled();
  });

  it('checks arguments once state is found', () => {
    const host = new InProcessHost();
    host.context.setSlot('Counter', { value: 0 });
    const inc = slowCallable(
      'increment',
      { params: [['n', t.i32]], returns: t.i32, state: true },
      (s: Counter, n: number) => (s.value += n),
      { state: counter },
      host,
    );
    expect(() => inc('x')).toThrow('argument 0: expected i32: expected i32 integer, got string');
    expect(inc(2)).toBe(2);
  });

  it('reads a pinned capsule from the callable data', () => {
    const host = new InProcessHost();
    const plan = buildPlan(
      describeFunction(
        'bump',
        { params: [['n', t.i32]], returns: t.i32, state: true },
        { state: t.rc(counter), fast: true },
      ),
    );
    const callback = buildSlowPath(plan, (s: Counter, n: number) => (s.value += n));
    const scope = host.scope();

    const unpinned = host.install(scope.functionTemplate(callback).build(scope));
    expect(() => unpinned(1)).toThrow('internal error: state data not set for Rc<Counter>');

    const owner = SharedState.create<Counter>({ value: 1 }, { label: 'Counter' });
    const pinned = host.install(
      scope.functionTemplate(callback).data(scope.newExternal(owner.capsule())).build(scope),
    );
    expect(pinned(2)).toBe(3);
    expect(owner.value.value).toBe(3);
  });
});
