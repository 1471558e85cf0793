// Runtime bindings: proxies, dispatchers, the object server and signal
// streams.

export {
  ExtensionKey,
  Extensions,
  type ClientContext,
  type CallRequest,
  type CallOutcome,
  type RejectionCode,
  type Rejection,
  RejectionError,
  type ClientMiddleware,
} from "./middleware.ts";

export { type CallerRequest, type Caller, TransportCaller, MiddlewareCaller } from "./caller.ts";

export { log, type LoggingOptions, loggingMiddleware } from "./logging.ts";

export {
  type SignalIdentity,
  matchesSignal,
  signalMatchRule,
  type SignalDecodeErrorKind,
  SignalDecodeError,
  type DecodeResult,
  type ReceivedSignalState,
  ReceivedSignal,
  SignalMatcher,
  type SignalStreamState,
  SignalStream,
} from "./signal.ts";

export {
  type ProxyOptions,
  defaultProxyOptions,
  type PropertyChange,
  ProxyBase,
  createProxy,
} from "./proxy.ts";

export {
  type SignalContext,
  type MethodContext,
  type MethodHandler,
  type PropertyHandler,
  type DispatcherHandlers,
  type MethodRoute,
  type InterfaceDispatcher,
  createDispatcher,
} from "./dispatcher.ts";

export {
  type ObjectServerOptions,
  defaultObjectServerOptions,
  type ServeHandle,
  ObjectServer,
} from "./object_server.ts";

export {
  IntrospectableSpec,
  PropertiesSpec,
  PeerSpec,
  ObjectManagerSpec,
  IntrospectableProxy,
  PropertiesProxy,
  PeerProxy,
  type ManagedObjects,
  ObjectManagerProxy,
} from "./standard.ts";
