// dbus-next transport for busbind.
//
// dbus-next owns the socket, authentication and marshalling. This adapter
// converts messages both ways, adds match rules on the bus for signal
// subscriptions and bounds every call with a timeout.

import * as dbus from "dbus-next";
import type { Message, MessageBus } from "dbus-next";
import createDebug from "debug";
import {
  type BusMessage,
  type BusTransport,
  type CallOptions,
  CallError,
  type ErrorMessage,
  type MatchRule,
  type MessageQueue,
  type MessageStream,
  type MethodCallMessage,
  type ReplyMessage,
  createMessageQueue,
  matchRuleToString,
  matchesRule,
} from "@busbind/wire";
import { bodyFromDbusNext, bodyToDbusNext } from "./values.ts";

const log = createDebug("busbind:dbus-next");

const DbusMessageType = {
  MethodCall: 1,
  MethodReturn: 2,
  Error: 3,
  Signal: 4,
} as const;

const BUS_DESTINATION = "org.freedesktop.DBus";
const BUS_PATH = "/org/freedesktop/DBus";

/** The parts of a dbus-next MessageBus the transport uses. */
export interface DbusNextBus {
  readonly name: string | null;
  call(message: Message): Promise<Message | null>;
  send(message: Message): void;
  on(event: "message", listener: (message: Message) => void): unknown;
  removeListener(event: "message", listener: (message: Message) => void): unknown;
  addMethodHandler(handler: (message: Message) => boolean): void;
  removeMethodHandler(handler: (message: Message) => boolean): void;
}

export interface DbusNextTransportOptions {
  /** Default reply timeout in milliseconds. */
  callTimeoutMs?: number;
}

export function defaultDbusNextTransportOptions(): Required<DbusNextTransportOptions> {
  return {
    callTimeoutMs: 25_000,
  };
}

// ============================================================================
// Message Conversion
// ============================================================================

/** Build the dbus-next message for a busbind message. */
export function toDbusNextMessage(message: BusMessage): Message {
  const body = bodyToDbusNext(message.signature, message.body);
  const common = {
    destination: message.destination,
    signature: message.signature,
    body,
    flags: message.flags ?? 0,
  };
  switch (message.type) {
    case "method_call":
      return new dbus.Message({
        ...common,
        type: DbusMessageType.MethodCall,
        path: message.path,
        interface: message.interface,
        member: message.member,
      });
    case "method_return":
      return new dbus.Message({ ...common, type: DbusMessageType.MethodReturn, replySerial: message.replySerial });
    case "error":
      return new dbus.Message({
        ...common,
        type: DbusMessageType.Error,
        replySerial: message.replySerial,
        errorName: message.errorName,
      });
    case "signal":
      return new dbus.Message({
        ...common,
        type: DbusMessageType.Signal,
        path: message.path,
        interface: message.interface,
        member: message.member,
      });
  }
}

/**
 * Convert a dbus-next message.
 *
 * @throws SignatureError when the message carries a malformed signature
 */
export function fromDbusNextMessage(raw: Message): BusMessage {
  const signature = raw.signature || "";
  const common = {
    serial: raw.serial ?? undefined,
    sender: raw.sender || undefined,
    destination: raw.destination || undefined,
    signature,
    body: bodyFromDbusNext(signature, raw.body ?? []),
    flags: raw.flags || 0,
  };
  switch (raw.type) {
    case DbusMessageType.MethodCall:
      return {
        ...common,
        type: "method_call",
        path: raw.path,
        interface: raw.interface || undefined,
        member: raw.member,
      };
    case DbusMessageType.MethodReturn:
      return { ...common, type: "method_return", replySerial: raw.replySerial };
    case DbusMessageType.Error:
      return { ...common, type: "error", replySerial: raw.replySerial, errorName: raw.errorName };
    default:
      return { ...common, type: "signal", path: raw.path, interface: raw.interface, member: raw.member };
  }
}

function errorReplyOf(error: dbus.DBusError): ErrorMessage {
  const reply: unknown = error.reply;
  if (reply instanceof dbus.Message) {
    const converted = fromDbusNextMessage(reply);
    if (converted.type === "error") return converted;
  }
  return {
    type: "error",
    replySerial: 0,
    errorName: error.type,
    signature: "s",
    body: [error.text],
  };
}

// ============================================================================
// Transport
// ============================================================================

interface Subscription {
  rule: MatchRule;
  queue: MessageQueue;
}

/**
 * BusTransport over a dbus-next connection.
 *
 * The transport borrows the connection: close() detaches it, and the
 * connection's owner disconnects it.
 */
export class DbusNextTransport implements BusTransport {
  private readonly callTimeoutMs: number;
  private readonly subscriptions = new Set<Subscription>();
  private closed = false;

  constructor(
    private readonly bus: DbusNextBus,
    options: DbusNextTransportOptions = {},
  ) {
    const config = { ...defaultDbusNextTransportOptions(), ...options };
    this.callTimeoutMs = config.callTimeoutMs;
    bus.on("message", this.onMessage);
    bus.addMethodHandler(this.onMethodCall);
  }

  get uniqueName(): string | undefined {
    return this.bus.name ?? undefined;
  }

  async send(message: BusMessage): Promise<void> {
    this.ensureOpen();
    this.bus.send(toDbusNextMessage(message));
  }

  async call(message: MethodCallMessage, options: CallOptions = {}): Promise<ReplyMessage> {
    this.ensureOpen();
    const timeoutMs = options.timeoutMs ?? this.callTimeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(CallError.timeout(message.member, timeoutMs)), timeoutMs);
    });
    try {
      return await Promise.race([this.exchange(message), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  async subscribe(rule: MatchRule): Promise<MessageStream> {
    this.ensureOpen();
    // Calls addressed to this connection arrive without a match rule
    const busRule = rule.type === "method_call" ? undefined : matchRuleToString(rule);
    if (busRule !== undefined) {
      await this.callBus("AddMatch", busRule);
    }

    const subscription: Subscription = {
      rule,
      queue: createMessageQueue(() => {
        this.subscriptions.delete(subscription);
        if (busRule !== undefined && !this.closed) {
          this.callBus("RemoveMatch", busRule).catch((e: unknown) => {
            log("RemoveMatch %s failed: %O", busRule, e);
          });
        }
      }),
    };
    this.subscriptions.add(subscription);
    return subscription.queue.stream;
  }

  /** Detach from the connection and end every subscription. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.bus.removeListener("message", this.onMessage);
    this.bus.removeMethodHandler(this.onMethodCall);
    for (const subscription of [...this.subscriptions]) {
      subscription.queue.stream.close();
    }
  }

  private async exchange(message: MethodCallMessage): Promise<ReplyMessage> {
    let raw: Message | null;
    try {
      raw = await this.bus.call(toDbusNextMessage(message));
    } catch (e) {
      if (e instanceof dbus.DBusError) return errorReplyOf(e);
      throw e;
    }
    if (raw === null) {
      throw new Error(`${message.member}: no reply was sent`);
    }
    const reply = fromDbusNextMessage(raw);
    if (reply.type !== "method_return" && reply.type !== "error") {
      throw new Error(`${message.member}: unexpected ${reply.type} in reply`);
    }
    return reply;
  }

  private async callBus(member: "AddMatch" | "RemoveMatch", rule: string): Promise<void> {
    const reply = await this.exchange({
      type: "method_call",
      destination: BUS_DESTINATION,
      path: BUS_PATH,
      interface: BUS_DESTINATION,
      member,
      signature: "s",
      body: [rule],
    });
    if (reply.type === "error") {
      throw CallError.remote(reply.errorName, `${member} failed for ${rule}`);
    }
  }

  private deliver(message: BusMessage): boolean {
    let taken = false;
    for (const subscription of this.subscriptions) {
      if (matchesRule(subscription.rule, message)) {
        taken = subscription.queue.push(message) || taken;
      }
    }
    return taken;
  }

  private readonly onMessage = (raw: Message): void => {
    if (raw.type !== DbusMessageType.Signal) return;
    try {
      this.deliver(fromDbusNextMessage(raw));
    } catch (e) {
      log("dropped %s.%s: %O", raw.interface, raw.member, e);
    }
  };

  private readonly onMethodCall = (raw: Message): boolean => {
    try {
      return this.deliver(fromDbusNextMessage(raw));
    } catch (e) {
      log("dropped call %s.%s: %O", raw.interface, raw.member, e);
      return false;
    }
  };

  private ensureOpen(): void {
    if (this.closed) {
      throw new Error("transport is closed");
    }
  }
}

// ============================================================================
// Connecting
// ============================================================================

/** A transport together with the connection it runs on. */
export interface DbusNextConnection {
  readonly transport: DbusNextTransport;
  /** Close the transport and the connection. */
  disconnect(): void;
}

function connection(bus: MessageBus, options: DbusNextTransportOptions): DbusNextConnection {
  const transport = new DbusNextTransport(bus, options);
  return {
    transport,
    disconnect() {
      transport.close();
      bus.disconnect();
    },
  };
}

export function connectSystemBus(options: DbusNextTransportOptions = {}): DbusNextConnection {
  return connection(dbus.systemBus(), options);
}

export function connectSessionBus(options: DbusNextTransportOptions = {}): DbusNextConnection {
  return connection(dbus.sessionBus(), options);
}

/** Connect to the bus at a D-Bus address, e.g. `unix:path=/run/user/1000/bus`. */
export function connectAddress(address: string, options: DbusNextTransportOptions = {}): DbusNextConnection {
  return connection(dbus.sessionBus({ busAddress: address }), options);
}
