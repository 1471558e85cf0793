// D-Bus wire-level types: messages, match rules, errors and the transport
// contract shared by every other busbind package.

export {
  MessageType,
  MessageFlags,
  type MethodCallMessage,
  type MethodReturnMessage,
  type ErrorMessage,
  type SignalMessage,
  type BusMessage,
  type ReplyMessage,
  methodCall,
  methodReturn,
  errorReply,
  signalMessage,
  expectsReply,
} from "./types.ts";

export { type MatchRule, matchRuleToString, matchesRule } from "./match.ts";

export {
  BusErrorName,
  BusError,
  CallError,
  type CallErrorKind,
  type ErrorVariant,
  type ErrorDomain,
  errorDomain,
} from "./errors.ts";

export { type BusTransport, type CallOptions, type MessageStream } from "./transport.ts";

export { type MessageQueue, createMessageQueue } from "./stream.ts";

export { STANDARD_INTERFACE_PREFIX, StandardInterface, isStandardInterface, isValidBusName } from "./names.ts";
