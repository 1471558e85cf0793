// In-process message bus.
//
// Routes messages between MemoryConnections the way a bus daemon would:
// unique names, well-known name ownership, method calls to their
// destination, replies correlated by serial, signals fanned out by match
// rule. No sockets and no byte encoding.

import createDebug from "debug";
import {
  BusErrorName,
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
  expectsReply,
  matchRuleToString,
  matchesRule,
} from "@busbind/wire";

const log = createDebug("busbind:memory");

/** Name the bus itself uses as a sender. */
export const BUS_NAME = "org.freedesktop.DBus";

export interface MemoryBusOptions {
  /** Default reply timeout for calls, in milliseconds. */
  callTimeoutMs?: number;
}

export function defaultMemoryBusOptions(): Required<MemoryBusOptions> {
  return {
    callTimeoutMs: 25_000,
  };
}

/** Outcome of a name request. */
export type RequestNameReply = "primaryOwner" | "exists" | "alreadyOwner";

/** Error from a connection that can no longer be used. */
export class ConnectionError extends Error {
  constructor(
    public readonly kind: "closed",
    message: string,
  ) {
    super(message);
    this.name = "ConnectionError";
  }

  static closed(uniqueName: string): ConnectionError {
    return new ConnectionError("closed", `connection ${uniqueName} is closed`);
  }
}

export class MemoryBus {
  readonly callTimeoutMs: number;
  private nextId = 1;
  private readonly connections = new Map<string, MemoryConnection>();
  private readonly owners = new Map<string, string>();

  constructor(options: MemoryBusOptions = {}) {
    const config = { ...defaultMemoryBusOptions(), ...options };
    this.callTimeoutMs = config.callTimeoutMs;
  }

  /** Open a new connection with a fresh unique name. */
  connect(): MemoryConnection {
    const uniqueName = `:1.${this.nextId++}`;
    const connection = new MemoryConnection(this, uniqueName);
    this.connections.set(uniqueName, connection);
    log("%s connected", uniqueName);
    return connection;
  }

  /** Unique name currently owning a bus name. */
  ownerOf(name: string): string | undefined {
    if (name.startsWith(":")) {
      return this.connections.has(name) ? name : undefined;
    }
    return this.owners.get(name);
  }

  /** @internal */
  requestName(connection: MemoryConnection, name: string): RequestNameReply {
    const owner = this.owners.get(name);
    if (owner === connection.uniqueName) return "alreadyOwner";
    if (owner !== undefined) return "exists";
    this.owners.set(name, connection.uniqueName);
    log("%s owns %s", connection.uniqueName, name);
    return "primaryOwner";
  }

  /** @internal */
  releaseName(connection: MemoryConnection, name: string): boolean {
    if (this.owners.get(name) !== connection.uniqueName) return false;
    this.owners.delete(name);
    return true;
  }

  /** @internal */
  disconnect(connection: MemoryConnection): void {
    this.connections.delete(connection.uniqueName);
    for (const [name, owner] of this.owners) {
      if (owner === connection.uniqueName) this.owners.delete(name);
    }
    log("%s disconnected", connection.uniqueName);
  }

  /** @internal */
  route(from: MemoryConnection, message: BusMessage): void {
    switch (message.type) {
      case "method_return":
      case "error": {
        const target = message.destination === undefined ? undefined : this.resolve(message.destination);
        target?.receiveReply(message);
        return;
      }

      case "method_call": {
        const target = message.destination === undefined ? undefined : this.resolve(message.destination);
        if (target === undefined) {
          this.replyFromBus(from, message, BusErrorName.ServiceUnknown, `The name ${message.destination ?? "(none)"} is not owned`);
          return;
        }
        if (!target.deliver(message)) {
          this.replyFromBus(from, message, BusErrorName.UnknownObject, `No object at ${message.path}`);
        }
        return;
      }

      case "signal": {
        if (message.destination !== undefined) {
          this.resolve(message.destination)?.deliver(message);
          return;
        }
        for (const connection of this.connections.values()) {
          connection.deliver(message);
        }
        return;
      }
    }
  }

  private resolve(name: string): MemoryConnection | undefined {
    const unique = this.ownerOf(name);
    return unique === undefined ? undefined : this.connections.get(unique);
  }

  private replyFromBus(to: MemoryConnection, call: MethodCallMessage, errorName: string, text: string): void {
    if (!expectsReply(call) || call.serial === undefined) return;
    log("%s → %s: %s", BUS_NAME, to.uniqueName, errorName);
    to.receiveReply({
      type: "error",
      serial: 0,
      sender: BUS_NAME,
      destination: to.uniqueName,
      replySerial: call.serial,
      errorName,
      signature: "s",
      body: [text],
    });
  }
}

interface Subscription {
  rule: MatchRule;
  queue: MessageQueue;
}

interface PendingCall {
  resolve: (reply: ReplyMessage) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

/** One client's connection to a MemoryBus. */
export class MemoryConnection implements BusTransport {
  private nextSerial = 1;
  private closed = false;
  private readonly pendingCalls = new Map<number, PendingCall>();
  private readonly subscriptions = new Set<Subscription>();

  constructor(
    private readonly bus: MemoryBus,
    readonly uniqueName: string,
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  async send(message: BusMessage): Promise<void> {
    this.stampAndRoute(message);
  }

  async call(message: MethodCallMessage, options: CallOptions = {}): Promise<ReplyMessage> {
    const timeoutMs = options.timeoutMs ?? this.bus.callTimeoutMs;
    const serial = this.nextSerial;

    const reply = new Promise<ReplyMessage>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingCalls.delete(serial);
        reject(CallError.timeout(message.member, timeoutMs));
      }, timeoutMs);
      this.pendingCalls.set(serial, { resolve, reject, timer });
    });

    try {
      this.stampAndRoute(message);
    } catch (e) {
      const pending = this.pendingCalls.get(serial);
      if (pending) {
        clearTimeout(pending.timer);
        this.pendingCalls.delete(serial);
      }
      throw e;
    }
    return reply;
  }

  async subscribe(rule: MatchRule): Promise<MessageStream> {
    if (this.closed) throw ConnectionError.closed(this.uniqueName);
    const subscription: Subscription = {
      rule,
      queue: createMessageQueue(() => {
        this.subscriptions.delete(subscription);
        log("%s removed match %s", this.uniqueName, matchRuleToString(rule));
      }),
    };
    this.subscriptions.add(subscription);
    log("%s added match %s", this.uniqueName, matchRuleToString(rule));
    return subscription.queue.stream;
  }

  async requestName(name: string): Promise<RequestNameReply> {
    if (this.closed) throw ConnectionError.closed(this.uniqueName);
    return this.bus.requestName(this, name);
  }

  async releaseName(name: string): Promise<boolean> {
    return this.bus.releaseName(this, name);
  }

  /** Disconnect. Pending calls fail and subscriptions end. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const [, pending] of this.pendingCalls) {
      clearTimeout(pending.timer);
      pending.reject(CallError.transport(ConnectionError.closed(this.uniqueName)));
    }
    this.pendingCalls.clear();
    for (const subscription of [...this.subscriptions]) {
      subscription.queue.stream.close();
    }
    this.bus.disconnect(this);
  }

  /**
   * Hand an inbound message to every matching subscription.
   *
   * @internal
   * @returns whether any subscription took it
   */
  deliver(message: BusMessage): boolean {
    let taken = false;
    for (const subscription of this.subscriptions) {
      if (matchesRule(subscription.rule, message)) {
        taken = subscription.queue.push(message) || taken;
      }
    }
    return taken;
  }

  /** @internal */
  receiveReply(reply: ReplyMessage | ErrorMessage): void {
    const pending = this.pendingCalls.get(reply.replySerial);
    if (pending === undefined) {
      log("%s dropped reply to serial %d", this.uniqueName, reply.replySerial);
      return;
    }
    clearTimeout(pending.timer);
    this.pendingCalls.delete(reply.replySerial);
    pending.resolve(reply);
  }

  private stampAndRoute(message: BusMessage): void {
    if (this.closed) throw ConnectionError.closed(this.uniqueName);
    const stamped: BusMessage = { ...message, serial: this.nextSerial++, sender: this.uniqueName };
    this.bus.route(this, stamped);
  }
}
