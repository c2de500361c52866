import { parseMethodOptions } from './methodOptions.js';
import type { FunctionSignature, TypeDesc } from './signatureTypes.js';
import { formatTypeDesc } from './typeDesc.js';

export type FunctionDescription = {
  /** Positional parameters in call-site order. */
  params?: Array<readonly [name: string, type: TypeDesc]>;
  /** Defaults to `()`. */
  returns?: TypeDesc;
  /** The implementation takes the execution scope first. */
  scope?: boolean;
  /** The implementation takes shared state (after the scope). */
  state?: boolean;
};

/**
 * Programmatic counterpart of a `#[method(...)]` declaration.
 *
 * ```ts
 * describeFunction('add', { params: [['a', t.f64], ['b', t.f64]], returns: t.f64 }, { fast: true });
 * ```
 */
export function describeFunction(
  name: string,
  desc: FunctionDescription,
  options: Record<string, unknown> = {},
): FunctionSignature {
  const opts = parseMethodOptions(options, name);

  return {
    name,
    jsName: opts.name,
    params: (desc.params ?? []).map(([pname, type]) => ({ name: pname, type })),
    returns: desc.returns ?? { kind: 'unit' },
    flags: {
      usesScope: desc.scope ?? false,
      usesState: desc.state ?? false,
      asyncWrapped: opts.promise ?? false,
      fastRequested: opts.fast ?? false,
    },
    stateType: opts.state,
  };
}

/** One-line rendering: `add(a: f64, b: f64) -> f64`. */
export function formatSignature(sig: FunctionSignature): string {
  const params = sig.params.map((p) => `${p.name}: ${formatTypeDesc(p.type)}`);
  if (sig.flags.usesState && sig.stateType) {
    params.unshift(`state: ${formatTypeDesc(sig.stateType)}`);
  }
  if (sig.flags.usesScope) params.unshift('scope');
  const ret = sig.returns.kind === 'unit' ? '' : ` -> ${formatTypeDesc(sig.returns)}`;
  return `${sig.name}(${params.join(', ')})${ret}`;
}
