export * from "./cdp/types";
export { CdpConnection, type TargetInfo } from "./cdp/connection";
export {
  setDebugOptions,
  getDebugOptions,
  type RuntimeDebugOptions,
} from "./debug/options";
export {
  RuntimeHandleError,
  EvaluationFailedError,
  CrossContextHandleError,
  DisposedHandleUseError,
  PrototypeNotObjectError,
  ProtocolError,
  TransportClosedError,
  type RuntimeHandleErrorContext,
} from "./error";
export {
  ExecutionContext,
  type ExecutionContextInfo,
  type PageFunction,
} from "./runtime/execution-context";
export {
  ExecutionContextRegistry,
  type ExecutionContextRegistryOptions,
  type WorldFilter,
} from "./runtime/execution-context-registry";
export { JSHandle, type HandleKind } from "./runtime/js-handle";
export { ElementHandle } from "./runtime/element-handle";
export { createJSHandle, type HandleFactory } from "./runtime/handle-factory";
export {
  classifyRemoteObject,
  getExceptionMessage,
  valueFromRemoteObject,
  type ExceptionDetails,
  type RemoteObject,
  type RemoteValue,
  type UnserializableSentinel,
} from "./runtime/remote-object";
export {
  resolveRuntimeBridgeConfig,
  type RuntimeBridgeOptions,
  type RuntimeBridgeConfig,
} from "./types/config";
export { connectRuntimeBridge, type RuntimeBridge } from "./bridge";
