// Signal matching and lazy decoding.
//
// Matching compares header fields only and never fails. Decoding happens on
// demand, so a message can match a signal's identity and still fail to
// decode: "not our signal" and "our signal, bad payload" stay distinct.

import {
  type TypeSignature,
  checkBody,
  formatMismatch,
  isBodyOf,
  parseSignature,
  signatureToString,
} from "@busbind/signature";
import {
  type BusMessage,
  type BusTransport,
  type MatchRule,
  type MessageStream,
  type SignalMessage,
} from "@busbind/wire";
import { log } from "./logging.ts";

/** The header fields that identify a signal. */
export interface SignalIdentity {
  interface: string;
  member: string;
  /** When set, only signals from this object path match. */
  path?: string;
}

/** Check whether a message is an instance of a signal. Never reads the body. */
export function matchesSignal(message: BusMessage, identity: SignalIdentity): message is SignalMessage {
  return (
    message.type === "signal" &&
    message.interface === identity.interface &&
    message.member === identity.member &&
    (identity.path === undefined || message.path === identity.path)
  );
}

export function signalMatchRule(identity: SignalIdentity): MatchRule {
  return {
    type: "signal",
    interface: identity.interface,
    member: identity.member,
    path: identity.path,
  };
}

// ============================================================================
// Decoding
// ============================================================================

export type SignalDecodeErrorKind = "signatureMismatch" | "valueMismatch";

/** A matched signal whose body does not fit the declared arguments. */
export class SignalDecodeError extends Error {
  constructor(
    public readonly kind: SignalDecodeErrorKind,
    public readonly member: string,
    public readonly expected: string,
    public readonly actual: string,
    detail: string,
  ) {
    super(`${member}: ${detail}`);
    this.name = "SignalDecodeError";
  }
}

export type DecodeResult<T> = { ok: true; value: T } | { ok: false; error: SignalDecodeError };

export type ReceivedSignalState = "pending" | "decoded" | "decodeFailed";

/**
 * A signal message that matched a signal's identity. Its arguments are
 * decoded the first time they are asked for.
 */
export class ReceivedSignal<T extends readonly unknown[] = readonly unknown[]> {
  private result: DecodeResult<T> | undefined;

  constructor(
    public readonly message: SignalMessage,
    private readonly argTypes: TypeSignature,
    private readonly argNames: readonly (string | undefined)[] = [],
  ) {}

  get state(): ReceivedSignalState {
    if (this.result === undefined) return "pending";
    return this.result.ok ? "decoded" : "decodeFailed";
  }

  /** Decode the body against the declared argument types. Memoised. */
  args(): DecodeResult<T> {
    this.result ??= this.decode();
    return this.result;
  }

  /** Decoded arguments by declared name. Unnamed arguments are left out. */
  namedArgs(): DecodeResult<Readonly<Record<string, unknown>>> {
    const result = this.args();
    if (!result.ok) return result;
    const named: Record<string, unknown> = {};
    result.value.forEach((value, i) => {
      const name = this.argNames[i];
      if (name !== undefined) named[name] = value;
    });
    return { ok: true, value: named };
  }

  private decode(): DecodeResult<T> {
    const { member, signature, body } = this.message;
    const expected = signatureToString(this.argTypes);
    if (signature !== expected) {
      return {
        ok: false,
        error: new SignalDecodeError(
          "signatureMismatch",
          member,
          expected,
          signature,
          `body signature '${signature}' does not match expected '${expected}'`,
        ),
      };
    }
    if (isBodyOf<T>(this.argTypes, body)) {
      return { ok: true, value: body };
    }
    const mismatch = checkBody(this.argTypes, body);
    const detail = mismatch ? formatMismatch(mismatch) : "body does not match";
    return {
      ok: false,
      error: new SignalDecodeError("valueMismatch", member, expected, signature, detail),
    };
  }
}

/** Matches inbound messages against one signal declaration. */
export class SignalMatcher<T extends readonly unknown[] = readonly unknown[]> {
  private readonly argTypes: TypeSignature;

  /**
   * @param argNames - Declared argument names, by position, for
   * `ReceivedSignal.namedArgs()`
   */
  constructor(
    public readonly identity: SignalIdentity,
    argSignature: string,
    private readonly argNames: readonly (string | undefined)[] = [],
  ) {
    this.argTypes = parseSignature(argSignature);
  }

  /** The matched signal, or null when the message is not an instance of it. */
  fromMessage(message: BusMessage): ReceivedSignal<T> | null {
    if (!matchesSignal(message, this.identity)) return null;
    return new ReceivedSignal<T>(message, this.argTypes, this.argNames);
  }
}

// ============================================================================
// Streams
// ============================================================================

export type SignalStreamState = "unsubscribed" | "subscribed" | "closed";

/**
 * Lazy, restartable sequence of received signals.
 *
 * Nothing is subscribed until iteration starts; each iteration opens a fresh
 * subscription of its own, so concurrent loops each see every signal.
 * Leaving a loop drops its subscription together with any buffered messages.
 * close() drops all of them. A decode failure never ends a loop.
 *
 * @example
 * ```typescript
 * for await (const signal of proxy.receiveChanged()) {
 *   const args = signal.args();
 *   if (args.ok) console.log(args.value);
 * }
 * ```
 */
export class SignalStream<T extends readonly unknown[] = readonly unknown[]> implements AsyncIterable<ReceivedSignal<T>> {
  /** Opened by subscribe(), taken by the next iteration. */
  private pending: Promise<MessageStream | null> | undefined;
  private readonly open = new Set<MessageStream>();
  /** Bumped by close(); subscriptions opened under an older epoch are dropped. */
  private epoch = 0;
  private _state: SignalStreamState = "unsubscribed";

  constructor(
    private readonly transport: BusTransport,
    public readonly matcher: SignalMatcher<T>,
  ) {}

  get state(): SignalStreamState {
    return this._state;
  }

  /** Subscribe now instead of on first iteration. Repeated calls share one subscription. */
  async subscribe(): Promise<void> {
    this.pending ??= this.openSubscription();
    await this.pending;
  }

  /** Drop every subscription. A later iteration subscribes again. */
  close(): void {
    this.epoch++;
    this.pending = undefined;
    for (const stream of this.open) {
      stream.close();
    }
    this.open.clear();
    if (this._state === "subscribed") {
      this._state = "closed";
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<ReceivedSignal<T>> {
    const claimed = this.pending;
    this.pending = undefined;
    const stream = await (claimed ?? this.openSubscription());
    if (stream === null) return;
    try {
      while (true) {
        const message = await stream.recv();
        if (message === null) return;
        const signal = this.matcher.fromMessage(message);
        if (signal) yield signal;
      }
    } finally {
      this.release(stream);
    }
  }

  private async openSubscription(): Promise<MessageStream | null> {
    const epoch = this.epoch;
    const stream = await this.transport.subscribe(signalMatchRule(this.matcher.identity));
    if (epoch !== this.epoch) {
      stream.close();
      return null;
    }
    this.open.add(stream);
    this._state = "subscribed";
    log.signal("subscribed to %s.%s", this.matcher.identity.interface, this.matcher.identity.member);
    return stream;
  }

  private release(stream: MessageStream): void {
    stream.close();
    this.open.delete(stream);
    if (this.open.size === 0 && this.pending === undefined && this._state === "subscribed") {
      this._state = "closed";
    }
  }

  /** Iterate decode results instead of raw signals. */
  async *decoded(): AsyncGenerator<DecodeResult<T>> {
    for await (const signal of this) {
      const result = signal.args();
      if (!result.ok) {
        log.signal("decode failed: %s", result.error.message);
      }
      yield result;
    }
  }
}
