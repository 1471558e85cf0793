// Unbounded message queue backing a MessageStream.

import type { MessageStream } from "./transport.ts";
import type { BusMessage } from "./types.ts";

/** Producer side of a message stream. */
export interface MessageQueue {
  readonly stream: MessageStream;
  /** Deliver a message. Returns false once the stream is closed. */
  push(message: BusMessage): boolean;
}

/**
 * Create a message queue.
 *
 * @param onClose - Called once when the consumer closes the stream
 */
export function createMessageQueue(onClose?: () => void): MessageQueue {
  let buffer: BusMessage[] = [];
  let waiters: Array<(message: BusMessage | null) => void> = [];
  let closed = false;

  const stream: MessageStream = {
    recv(): Promise<BusMessage | null> {
      const next = buffer.shift();
      if (next !== undefined) {
        return Promise.resolve(next);
      }
      if (closed) {
        return Promise.resolve(null);
      }
      return new Promise((resolve) => {
        waiters.push(resolve);
      });
    },

    close(): void {
      if (closed) return;
      closed = true;
      buffer = [];
      // Wake all waiters with null
      for (const waiter of waiters) {
        waiter(null);
      }
      waiters = [];
      onClose?.();
    },

    get closed(): boolean {
      return closed;
    },

    async *[Symbol.asyncIterator](): AsyncIterator<BusMessage> {
      try {
        while (true) {
          const message = await stream.recv();
          if (message === null) {
            return;
          }
          yield message;
        }
      } finally {
        stream.close();
      }
    },
  };

  return {
    stream,
    push(message: BusMessage): boolean {
      if (closed) {
        return false;
      }
      // If there's a waiter, deliver directly
      const waiter = waiters.shift();
      if (waiter) {
        waiter(message);
      } else {
        buffer.push(message);
      }
      return true;
    },
  };
}
