/**
 * The host script engine's native-callback contract.
 *
 * Only the surface generated glue touches is modeled here. Values are the
 * engine's own JS values, so no separate handle wrapper type exists.
 */

export type EngineValue = unknown;

export type ExecutionContext = {
  /** Per-context extension slot, keyed by the state's type name. */
  getSlot(key: string): unknown;
  setSlot(key: string, value: unknown): void;
  hasSlot(key: string): boolean;
};

/** One-shot asynchronous result placeholder. */
export type Deferred = {
  readonly promise: Promise<unknown>;
  /** Returns false when the deferred had already settled. */
  resolve(value: EngineValue): boolean;
  reject(reason: EngineValue): boolean;
};

/** Opaque pointer capsule carried as callable data or fast-call options data. */
export type External = {
  readonly value: unknown;
};

export type CallbackArguments = {
  readonly length: number;
  /** Missing positions read as `undefined`. */
  get(index: number): EngineValue;
  /** Per-registration associated data (the template's `data`). */
  data(): EngineValue;
};

export type ReturnValue = {
  set(value: EngineValue): void;
};

export type FunctionCallback = (
  scope: ExecutionScope,
  args: CallbackArguments,
  rv: ReturnValue,
) => void;

/** Native primitive slots of the direct-call ABI. */
export type FastType =
  | 'void'
  | 'bool'
  | 'int32'
  | 'uint32'
  | 'int64'
  | 'uint64'
  | 'float32'
  | 'float64'
  | 'receiver'
  | 'callbackOptions';

export type FastScalar = boolean | number | bigint;

export type FastCallOptions = {
  readonly data: EngineValue;
};

/** `(receiver, ...primitives[, options])` → primitive. */
export type FastFunction = (
  receiver: EngineValue,
  ...rest: Array<FastScalar | FastCallOptions>
) => FastScalar | undefined;

export type CFunctionInfo = {
  readonly returnType: FastType;
  /** Starts with `receiver`; ends with `callbackOptions` when state is passed. */
  readonly argTypes: readonly FastType[];
  readonly int64Representation: 'bigint' | 'number';
};

export type CFunction = {
  readonly fn: FastFunction;
  readonly info: CFunctionInfo;
};

export type EngineFunction = (...args: unknown[]) => unknown;

export type FunctionTemplate = {
  getFunction(scope: ExecutionScope): EngineFunction;
};

export type FunctionTemplateBuilder = {
  data(value: EngineValue): FunctionTemplateBuilder;
  build(scope: ExecutionScope): FunctionTemplate;
  /** Dual-path template: interpreted callback plus direct-call overloads. */
  buildFast(scope: ExecutionScope, overloads: readonly CFunction[]): FunctionTemplate;
};

/** Per-call handle the engine passes into every callback. */
export type ExecutionScope = {
  currentContext(): ExecutionContext;
  /** Schedules `exception`; it is thrown once the callback returns. */
  throwException(exception: EngineValue): void;
  typeError(message: string): EngineValue;
  error(message: string): EngineValue;
  createDeferred(): Deferred;
  newExternal(value: unknown): External;
  isExternal(value: EngineValue): value is External;
  /** Runtime check for handle names without a fixed kind (`Local<Promise>`). */
  isInstanceOf(value: EngineValue, typeName: string): boolean;
  functionTemplate(callback: FunctionCallback): FunctionTemplateBuilder;
};
