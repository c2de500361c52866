import { describe, it, expect } from 'vitest';

import { t } from '../signature/typeDesc.js';
import {
  classifyReturn,
  classifyStateType,
  classifyType,
  describeTypeClass,
  isFastEligible,
} from './typeClass.js';

describe('classifyType', () => {
  it('maps the fast-eligible primitives and unit', () => {
    expect(classifyType(t.f64)).toEqual({ tag: 'primitive', kind: 'f64', type: t.f64 });
    expect(classifyType(t.u64)).toEqual({ tag: 'primitive', kind: 'u64', type: t.u64 });
    expect(classifyType(t.unit)).toEqual({ tag: 'primitive', kind: 'void', type: t.unit });
  });

  it('treats other integer widths and named types as opaque', () => {
    expect(classifyType(t.path('i8')).tag).toBe('opaque');
    expect(classifyType(t.path('usize')).tag).toBe('opaque');
    expect(classifyType(t.string).tag).toBe('opaque');
    expect(classifyType(t.path('constructor')).tag).toBe('opaque');
  });

  it('unwraps exactly one level of Option', () => {
    expect(classifyType(t.option(t.string))).toEqual({
      tag: 'optional',
      inner: { tag: 'opaque', type: t.string },
      type: t.option(t.string),
    });
    const nested = classifyType(t.option(t.option(t.i32)));
    expect(nested.tag).toBe('optional');
    expect(nested.tag === 'optional' && nested.inner.tag).toBe('opaque');
  });

  it('recognizes Local and js::Local handles', () => {
    expect(classifyType(t.local('Function'))).toEqual({
      tag: 'handle',
      kind: 'Function',
      handleName: 'Function',
      type: t.local('Function'),
    });
    const qualified = classifyType(t.path('js::Local', t.path('js::Uint8Array')));
    expect(qualified.tag === 'handle' && qualified.kind).toBe('Uint8Array');
  });

  it('keeps unknown handle names for a run-time check', () => {
    const c = classifyType(t.local('Promise'));
    expect(c).toMatchObject({ tag: 'handle', kind: null, handleName: 'Promise' });
  });

  it('does not treat Local under a foreign namespace as a handle', () => {
    expect(classifyType(t.path('v8::Local', t.path('Function'))).tag).toBe('opaque');
  });

  it('only primitives are fast-eligible', () => {
    expect(isFastEligible(classifyType(t.i32))).toBe(true);
    expect(isFastEligible(classifyType(t.option(t.i32)))).toBe(false);
    expect(isFastEligible(classifyType(t.local('Number')))).toBe(false);
    expect(isFastEligible(classifyType(t.vec(t.i32)))).toBe(false);
  });

  it('describes classes for diagnostics', () => {
    expect(describeTypeClass(classifyType(t.option(t.local('Function'))))).toBe(
      'Option<Local<Function>>',
    );
    expect(describeTypeClass(classifyType(t.map(t.string, t.i32)))).toBe('HashMap<String, i32>');
  });
});

describe('classifyReturn', () => {
  it('unwraps Result into a fallible shape', () => {
    expect(classifyReturn(t.result(t.f64, t.string))).toEqual({
      fallible: true,
      value: { tag: 'primitive', kind: 'f64', type: t.f64 },
    });
    expect(classifyReturn(t.unit)).toEqual({
      fallible: false,
      value: { tag: 'primitive', kind: 'void', type: t.unit },
    });
  });
});

describe('classifyStateType', () => {
  const counter = t.path('Counter');

  it('unwraps one shared-ownership wrapper, after references', () => {
    expect(classifyStateType(t.rc(counter))).toEqual({
      declared: t.rc(counter),
      inner: counter,
      sharedOwnership: true,
    });
    expect(classifyStateType(t.ref(t.path('std::sync::Arc', counter))).inner).toEqual(counter);
  });

  it('keeps plain types as they are', () => {
    expect(classifyStateType(t.ref(counter, true))).toEqual({
      declared: t.ref(counter, true),
      inner: counter,
      sharedOwnership: false,
    });
  });
});
