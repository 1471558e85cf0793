/**
 * Bus transport abstraction.
 *
 * The transport owns authentication, sockets and the byte-level codec.
 * Proxies, dispatchers and the object server only ever see this interface
 * and never create or close a transport themselves.
 *
 * Implementations:
 * - MemoryConnection (@busbind/memory) for in-process buses
 * - DbusNextTransport (@busbind/dbus-next) for system and session buses
 */

import type { MatchRule } from "./match.ts";
import type { BusMessage, MethodCallMessage, ReplyMessage } from "./types.ts";

/** Options for a single call. */
export interface CallOptions {
  /** Reply timeout in milliseconds. */
  timeoutMs?: number;
}

/**
 * An unbounded, cancelable sequence of inbound messages.
 *
 * Closing drops the subscription and any buffered messages.
 */
export interface MessageStream extends AsyncIterable<BusMessage> {
  /** Receive the next message, or null once the stream is closed. */
  recv(): Promise<BusMessage | null>;
  close(): void;
  readonly closed: boolean;
}

export interface BusTransport {
  /** Unique bus name of this connection, once known. */
  readonly uniqueName: string | undefined;

  /** Send a message without waiting for anything back. */
  send(message: BusMessage): Promise<void>;

  /**
   * Send a method call and wait for its reply.
   *
   * Replies are correlated by serial; concurrent calls may complete in any
   * order. Resolves with error replies too: only transport failures reject.
   */
  call(message: MethodCallMessage, options?: CallOptions): Promise<ReplyMessage>;

  /** Start receiving inbound messages that match `rule`. */
  subscribe(rule: MatchRule): Promise<MessageStream>;
}
