import type {
  CallbackArguments,
  CFunction,
  CFunctionInfo,
  Deferred,
  EngineFunction,
  EngineValue,
  ExecutionContext,
  ExecutionScope,
  External,
  FastScalar,
  FastType,
  FunctionCallback,
  FunctionTemplate,
  FunctionTemplateBuilder,
} from './engineTypes.js';

export type HostOptions = {
  /**
   * Interpreted calls a callable makes before its fast overload is tried.
   * Default 1: the first call always takes the slow path.
   */
  fastCallThreshold?: number;
  /** Named-type checks for generic handles (`Local<Promise>`). */
  types?: Record<string, (value: unknown) => boolean>;
};

export type CallStats = {
  slow: number;
  fast: number;
};

export type DeferredState = 'pending' | 'resolved' | 'rejected';

export class InProcessContext implements ExecutionContext {
  private readonly slots = new Map<string, unknown>();

  getSlot(key: string): unknown {
    return this.slots.get(key);
  }

  setSlot(key: string, value: unknown): void {
    this.slots.set(key, value);
  }

  hasSlot(key: string): boolean {
    return this.slots.has(key);
  }
}

class InProcessExternal implements External {
  constructor(readonly value: unknown) {}
}

export class InProcessDeferred implements Deferred {
  readonly promise: Promise<unknown>;
  private settle: { resolve(v: unknown): void; reject(r: unknown): void } = {
    resolve: () => {},
    reject: () => {},
  };
  private current: DeferredState = 'pending';

  constructor() {
    this.promise = new Promise<unknown>((resolve, reject) => {
      this.settle = { resolve, reject };
    });
  }

  get state(): DeferredState {
    return this.current;
  }

  resolve(value: EngineValue): boolean {
    if (this.current !== 'pending') return false;
    this.current = 'resolved';
    this.settle.resolve(value);
    return true;
  }

  reject(reason: EngineValue): boolean {
    if (this.current !== 'pending') return false;
    this.current = 'rejected';
    this.settle.reject(reason);
    return true;
  }
}

type PendingException = { value: EngineValue };

class InProcessScope implements ExecutionScope {
  pending: PendingException | undefined;
  readonly deferreds: InProcessDeferred[] = [];

  constructor(private readonly host: InProcessHost) {}

  currentContext(): ExecutionContext {
    return this.host.context;
  }

  throwException(exception: EngineValue): void {
    // Only the first scheduled exception survives, as in the engine.
    this.pending ??= { value: exception };
  }

  typeError(message: string): EngineValue {
    return new TypeError(message);
  }

  error(message: string): EngineValue {
    return new Error(message);
  }

  createDeferred(): Deferred {
    const deferred = new InProcessDeferred();
    this.deferreds.push(deferred);
    return deferred;
  }

  newExternal(value: unknown): External {
    return new InProcessExternal(value);
  }

  isExternal(value: EngineValue): value is External {
    return value instanceof InProcessExternal;
  }

  isInstanceOf(value: EngineValue, typeName: string): boolean {
    return this.host.isInstanceOf(value, typeName);
  }

  functionTemplate(callback: FunctionCallback): FunctionTemplateBuilder {
    return new InProcessTemplateBuilder(this.host, callback);
  }
}

class InProcessTemplateBuilder implements FunctionTemplateBuilder {
  private associated: EngineValue = undefined;

  constructor(
    private readonly host: InProcessHost,
    private readonly callback: FunctionCallback,
  ) {}

  data(value: EngineValue): FunctionTemplateBuilder {
    this.associated = value;
    return this;
  }

  build(_scope: ExecutionScope): FunctionTemplate {
    return new InProcessTemplate(this.host, this.callback, this.associated, []);
  }

  buildFast(_scope: ExecutionScope, overloads: readonly CFunction[]): FunctionTemplate {
    return new InProcessTemplate(this.host, this.callback, this.associated, overloads);
  }
}

class InProcessTemplate implements FunctionTemplate {
  constructor(
    private readonly host: InProcessHost,
    readonly callback: FunctionCallback,
    readonly associated: EngineValue,
    readonly overloads: readonly CFunction[],
  ) {}

  getFunction(_scope: ExecutionScope): EngineFunction {
    return this.host.instantiate(this.callback, this.associated, this.overloads);
  }
}

const INT32 = { min: -(2 ** 31), max: 2 ** 31 - 1 };
const UINT32 = { min: 0, max: 2 ** 32 - 1 };
const INT64 = { min: -(2n ** 63n), max: 2n ** 63n - 1n };
const UINT64 = { min: 0n, max: 2n ** 64n - 1n };

function inRange(v: number, r: { min: number; max: number }): boolean {
  return Number.isInteger(v) && v >= r.min && v <= r.max;
}

function marshalWide(
  v: unknown,
  r: { min: bigint; max: bigint },
  representation: CFunctionInfo['int64Representation'],
): FastScalar | undefined {
  if (representation === 'bigint') {
    return typeof v === 'bigint' && v >= r.min && v <= r.max ? v : undefined;
  }
  if (typeof v !== 'number' || !Number.isSafeInteger(v)) return undefined;
  const n = BigInt(v);
  return n >= r.min && n <= r.max ? v : undefined;
}

/** Converts one argument to its ABI slot; undefined when it does not match exactly. */
function marshalArg(
  type: FastType,
  v: unknown,
  representation: CFunctionInfo['int64Representation'],
): FastScalar | undefined {
  switch (type) {
    case 'bool':
      return typeof v === 'boolean' ? v : undefined;
    case 'int32':
      return typeof v === 'number' && inRange(v, INT32) ? v : undefined;
    case 'uint32':
      return typeof v === 'number' && inRange(v, UINT32) ? v : undefined;
    case 'int64':
      return marshalWide(v, INT64, representation);
    case 'uint64':
      return marshalWide(v, UINT64, representation);
    case 'float32':
      return typeof v === 'number' ? Math.fround(v) : undefined;
    case 'float64':
      return typeof v === 'number' ? v : undefined;
    case 'void':
    case 'receiver':
    case 'callbackOptions':
      return undefined;
  }
}

function marshalFastCall(info: CFunctionInfo, args: readonly unknown[]): FastScalar[] | undefined {
  const slots = info.argTypes.filter((t) => t !== 'receiver' && t !== 'callbackOptions');
  if (slots.length !== args.length) return undefined;
  const out: FastScalar[] = [];
  for (let i = 0; i < slots.length; i++) {
    const slot = slots[i];
    const v = slot === undefined ? undefined : marshalArg(slot, args[i], info.int64Representation);
    if (v === undefined) return undefined;
    out.push(v);
  }
  return out;
}

/**
 * In-process stand-in for the host engine's callback contract.
 *
 * Callables run their interpreted callback until `fastCallThreshold` calls
 * have been made, then use the first fast overload whose ABI every argument
 * matches exactly; any other call falls back to the callback. A scheduled
 * exception is rethrown to the caller once the callback returns.
 */
export class InProcessHost {
  readonly context = new InProcessContext();
  private readonly threshold: number;
  private readonly types: Map<string, (value: unknown) => boolean>;
  private readonly stats = new WeakMap<EngineFunction, CallStats>();
  private readonly root: InProcessScope;
  private lastScope: InProcessScope | undefined;

  constructor(opts: HostOptions = {}) {
    this.threshold = opts.fastCallThreshold ?? 1;
    this.types = new Map(Object.entries(opts.types ?? {}));
    this.root = new InProcessScope(this);
  }

  /** Scope for registration work outside any call. */
  scope(): ExecutionScope {
    return this.root;
  }

  /** Deferreds created during the most recent interpreted call. */
  lastDeferreds(): readonly InProcessDeferred[] {
    return this.lastScope?.deferreds ?? [];
  }

  statsOf(fn: EngineFunction): CallStats | undefined {
    const s = this.stats.get(fn);
    return s ? { ...s } : undefined;
  }

  isInstanceOf(value: unknown, typeName: string): boolean {
    const check = this.types.get(typeName);
    if (check) return check(value);
    const ctor: unknown = Reflect.get(globalThis, typeName);
    return typeof ctor === 'function' && value instanceof ctor;
  }

  /** Shorthand for `template.getFunction(host.scope())`. */
  install(template: FunctionTemplate): EngineFunction {
    return template.getFunction(this.root);
  }

  /** Creates a callable for a built template; used by `getFunction`. */
  instantiate(
    callback: FunctionCallback,
    associated: EngineValue,
    overloads: readonly CFunction[],
  ): EngineFunction {
    const counters: CallStats = { slow: 0, fast: 0 };
    const options = { data: associated };
    let calls = 0;

    const callSlow = (args: unknown[]): unknown => {
      const scope = new InProcessScope(this);
      this.lastScope = scope;
      const callbackArgs: CallbackArguments = {
        length: args.length,
        get: (i) => args[i],
        data: () => associated,
      };
      let result: unknown = undefined;
      callback(scope, callbackArgs, {
        set: (v) => {
          result = v;
        },
      });
      if (scope.pending) throw scope.pending.value;
      return result;
    };

    const fn: EngineFunction = (...args) => {
      calls++;
      if (calls > this.threshold) {
        for (const overload of overloads) {
          const marshalled = marshalFastCall(overload.info, args);
          if (!marshalled) continue;
          counters.fast++;
          const withOptions = overload.info.argTypes.includes('callbackOptions');
          return withOptions
            ? overload.fn(undefined, ...marshalled, options)
            : overload.fn(undefined, ...marshalled);
        }
      }
      counters.slow++;
      return callSlow(args);
    };

    this.stats.set(fn, counters);
    return fn;
  }
}
