export { t, formatTypeDesc } from './signature/typeDesc.js';
export { describeFunction, formatSignature } from './signature/describeFunction.js';
export type { FunctionDescription } from './signature/describeFunction.js';
export { parseMethodOptions } from './signature/methodOptions.js';
export type { MethodOptions } from './signature/methodOptions.js';
export { ConfigurationError } from './signature/signatureTypes.js';
export type {
  FunctionParam,
  FunctionSignature,
  SignatureFlags,
  TypeDesc,
} from './signature/signatureTypes.js';

export {
  classifyReturn,
  classifyStateType,
  classifyType,
  describeTypeClass,
  isFastEligible,
} from './classify/typeClass.js';
export type { HandleKind, PrimitiveKind, ReturnShape, TypeClass } from './classify/typeClass.js';

export { buildPlan } from './plan/buildPlan.js';
export type { CallMode, GenerationPlan, Verdict } from './plan/planTypes.js';

export { SharedState, StateCapsule } from './state/sharedState.js';
export { StateError, StateReleasedError, InvalidReleaseError } from './state/stateTypes.js';
export type { StateMode, StateSpec } from './state/stateTypes.js';

export { ConversionError } from './convert/convertTypes.js';
export { deserialize } from './convert/deserialize.js';
export { serialize } from './convert/serialize.js';

export { err, isResult, ok } from './codegen/codegenTypes.js';
export type { NativeFn, Result } from './codegen/codegenTypes.js';
export type { FastArtifacts } from './codegen/fastPath.js';
export type { TemplateHelper } from './codegen/registration.js';

export {
  emitBindings,
  emitPlan,
  pinnedRegistration,
  plainRegistration,
  requireFastPath,
} from './emit/emitBundle.js';
export type { ArtifactBundle } from './emit/emitBundle.js';
export { renderBindingModule } from './emit/renderModule.js';
export type { RenderOptions } from './emit/renderModule.js';

export { abiLayout, renderCPrototype } from './ffi/abiTypes.js';
export type { AbiLayout, AbiSlot } from './ffi/abiTypes.js';

export { parseDeclarationFile, parseDeclarations, parseTypeText } from './parser/index.js';

export { InProcessHost } from './engine/inProcessEngine.js';
export type { CallStats, HostOptions } from './engine/inProcessEngine.js';
export type * from './engine/engineTypes.js';

export { isDebugEnabled, setDebugEnabled } from './dx/logger.js';
export { loadOptionalConfig } from './dx/config.js';
export type { BindingConfig } from './dx/config.js';
