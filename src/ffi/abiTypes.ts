import koffi from 'koffi';

import type { PrimitiveKind } from '../classify/typeClass.js';
import type { CFunctionInfo, FastType } from '../engine/engineTypes.js';

export const FAST_TYPES: Readonly<Record<PrimitiveKind, FastType>> = {
  bool: 'bool',
  i32: 'int32',
  u32: 'uint32',
  i64: 'int64',
  u64: 'uint64',
  f32: 'float32',
  f64: 'float64',
  void: 'void',
};

/** Native C type of each direct-call slot. */
export const C_TYPES: Readonly<Record<FastType, string>> = {
  void: 'void',
  bool: 'bool',
  int32: 'int32_t',
  uint32: 'uint32_t',
  int64: 'int64_t',
  uint64: 'uint64_t',
  float32: 'float',
  float64: 'double',
  receiver: 'void *',
  callbackOptions: 'void *',
};

export type AbiSlot = {
  fastType: FastType;
  cType: string;
  size: number;
  align: number;
};

export type AbiLayout = {
  returns: AbiSlot;
  args: AbiSlot[];
  /** C declaration of the direct-call entry point. */
  prototype: string;
};

export function describeAbiSlot(fastType: FastType): AbiSlot {
  const cType = C_TYPES[fastType];
  if (fastType === 'void') return { fastType, cType, size: 0, align: 0 };
  return { fastType, cType, size: koffi.sizeof(cType), align: koffi.alignof(cType) };
}

export function renderCPrototype(name: string, info: CFunctionInfo): string {
  const args = info.argTypes.map((t, i) => {
    const cType = C_TYPES[t];
    const argName = t === 'receiver' ? 'receiver' : t === 'callbackOptions' ? 'options' : `a${i}`;
    return cType.endsWith('*') ? `${cType}${argName}` : `${cType} ${argName}`;
  });
  return `${C_TYPES[info.returnType]} ${name}(${args.join(', ')})`;
}

// koffi registers prototypes by name; validate each distinct shape once.
const validated = new Map<string, number>();

/**
 * Checks the descriptor against koffi's C declaration parser and returns
 * its slot layout.
 */
export function abiLayout(name: string, info: CFunctionInfo): AbiLayout {
  const prototype = renderCPrototype(name, info);
  const shape = renderCPrototype('', info);
  if (!validated.has(shape)) {
    const id = validated.size + 1;
    koffi.proto(renderCPrototype(`enginebind_fast_${id}`, info));
    validated.set(shape, id);
  }
  return {
    returns: describeAbiSlot(info.returnType),
    args: info.argTypes.map(describeAbiSlot),
    prototype,
  };
}
