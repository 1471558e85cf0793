// D-Bus message shapes for TypeScript.
//
// Bodies are arrays of native values (see @busbind/signature); the byte-level
// encoding belongs to the transport.

// ============================================================================
// Message Types
// ============================================================================

export const MessageType = {
  MethodCall: "method_call",
  MethodReturn: "method_return",
  Error: "error",
  Signal: "signal",
} as const;
export type MessageType = (typeof MessageType)[keyof typeof MessageType];

/** Header flags. */
export const MessageFlags = {
  NONE: 0,
  /** The caller does not want a reply. */
  NO_REPLY_EXPECTED: 0x1,
  /** The bus must not launch an owner for the destination name. */
  NO_AUTO_START: 0x2,
} as const;

interface MessageBase {
  /** Assigned by the transport when the message is sent. */
  serial?: number;
  sender?: string;
  destination?: string;
  /** Body signature text. */
  signature: string;
  body: readonly unknown[];
  flags?: number;
}

export interface MethodCallMessage extends MessageBase {
  type: "method_call";
  path: string;
  interface?: string;
  member: string;
}

export interface MethodReturnMessage extends MessageBase {
  type: "method_return";
  replySerial: number;
}

export interface ErrorMessage extends MessageBase {
  type: "error";
  replySerial: number;
  errorName: string;
}

export interface SignalMessage extends MessageBase {
  type: "signal";
  path: string;
  interface: string;
  member: string;
}

export type BusMessage = MethodCallMessage | MethodReturnMessage | ErrorMessage | SignalMessage;

/** Reply to a method call. */
export type ReplyMessage = MethodReturnMessage | ErrorMessage;

// ============================================================================
// Factory Functions
// ============================================================================

export function methodCall(fields: {
  destination?: string;
  path: string;
  interface?: string;
  member: string;
  signature?: string;
  body?: readonly unknown[];
  flags?: number;
}): MethodCallMessage {
  return {
    type: MessageType.MethodCall,
    destination: fields.destination,
    path: fields.path,
    interface: fields.interface,
    member: fields.member,
    signature: fields.signature ?? "",
    body: fields.body ?? [],
    flags: fields.flags ?? MessageFlags.NONE,
  };
}

function replySerialOf(call: MethodCallMessage): number {
  if (call.serial === undefined) {
    throw new Error(`cannot reply to ${call.member}: the call carries no serial`);
  }
  return call.serial;
}

export function methodReturn(
  call: MethodCallMessage,
  signature = "",
  body: readonly unknown[] = [],
): MethodReturnMessage {
  return {
    type: MessageType.MethodReturn,
    replySerial: replySerialOf(call),
    destination: call.sender,
    signature,
    body,
  };
}

export function errorReply(
  call: MethodCallMessage,
  errorName: string,
  text?: string,
): ErrorMessage {
  return {
    type: MessageType.Error,
    replySerial: replySerialOf(call),
    destination: call.sender,
    errorName,
    signature: text === undefined ? "" : "s",
    body: text === undefined ? [] : [text],
  };
}

export function signalMessage(fields: {
  path: string;
  interface: string;
  member: string;
  destination?: string;
  signature?: string;
  body?: readonly unknown[];
}): SignalMessage {
  return {
    type: MessageType.Signal,
    path: fields.path,
    interface: fields.interface,
    member: fields.member,
    destination: fields.destination,
    signature: fields.signature ?? "",
    body: fields.body ?? [],
  };
}

/** Whether the sender of a call waits for a reply. */
export function expectsReply(call: MethodCallMessage): boolean {
  return ((call.flags ?? 0) & MessageFlags.NO_REPLY_EXPECTED) === 0;
}
