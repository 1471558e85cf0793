// Tests for signal matching, decoding and streams

import { describe, it, expect, afterEach } from "vitest";
import { methodCall, signalMessage } from "@busbind/wire";
import { MemoryBus, type MemoryConnection } from "@busbind/memory";
import { SignalDecodeError, SignalMatcher, SignalStream, matchesSignal, signalMatchRule } from "./index.ts";

const IDENTITY = { interface: "org.example.Light", member: "Changed", path: "/light" };

function changed(signature: string, body: unknown[], path = "/light") {
  return signalMessage({ path, interface: "org.example.Light", member: "Changed", signature, body });
}

const connections: MemoryConnection[] = [];

afterEach(() => {
  for (const connection of connections.splice(0)) {
    connection.close();
  }
});

describe("matchesSignal", () => {
  it("compares interface, member and path", () => {
    expect(matchesSignal(changed("b", [true]), IDENTITY)).toBe(true);
    expect(matchesSignal(changed("b", [true], "/other"), IDENTITY)).toBe(false);
    expect(matchesSignal(changed("b", [true], "/other"), { ...IDENTITY, path: undefined })).toBe(true);
    expect(
      matchesSignal(
        signalMessage({ path: "/light", interface: "org.example.Light", member: "Removed" }),
        IDENTITY,
      ),
    ).toBe(false);
  });

  it("never matches method calls", () => {
    const call = methodCall({ path: "/light", interface: "org.example.Light", member: "Changed" });
    expect(matchesSignal(call, IDENTITY)).toBe(false);
  });

  it("builds the bus match rule", () => {
    expect(signalMatchRule(IDENTITY)).toEqual({
      type: "signal",
      interface: "org.example.Light",
      member: "Changed",
      path: "/light",
    });
  });
});

describe("SignalMatcher", () => {
  const matcher = new SignalMatcher<[boolean, number]>(IDENTITY, "bu");

  it("returns null for messages of other signals", () => {
    expect(matcher.fromMessage(changed("bu", [true, 1], "/other"))).toBeNull();
  });

  it("decodes matching bodies on demand", () => {
    const signal = matcher.fromMessage(changed("bu", [true, 1]));
    expect(signal?.state).toBe("pending");
    expect(signal?.args()).toEqual({ ok: true, value: [true, 1] });
    expect(signal?.state).toBe("decoded");
  });

  it("matches but fails to decode a body with another signature", () => {
    const signal = matcher.fromMessage(changed("s", ["on"]));
    const result = signal?.args();
    expect(signal?.state).toBe("decodeFailed");
    expect(result?.ok).toBe(false);
    if (result && !result.ok) {
      expect(result.error).toBeInstanceOf(SignalDecodeError);
      expect(result.error.kind).toBe("signatureMismatch");
      expect(result.error.message).toBe("Changed: body signature 's' does not match expected 'bu'");
    }
  });

  it("fails to decode values that do not fit the signature", () => {
    const result = matcher.fromMessage(changed("bu", [true, -1]))?.args();
    if (result === undefined || result.ok) {
      throw new Error("expected a decode failure");
    }
    expect(result.error.kind).toBe("valueMismatch");
    expect(result.error.message).toBe("Changed: [1]: -1 is out of range (expected 'u')");
  });

  it("gives decoded arguments by name", () => {
    const named = new SignalMatcher<[boolean, number]>(IDENTITY, "bu", ["on", undefined]);
    expect(named.fromMessage(changed("bu", [true, 4]))?.namedArgs()).toEqual({ ok: true, value: { on: true } });
    expect(named.fromMessage(changed("s", ["on"]))?.namedArgs().ok).toBe(false);
  });

  it("decodes once", () => {
    const signal = matcher.fromMessage(changed("bu", [false, 2]));
    expect(signal?.args()).toBe(signal?.args());
  });
});

describe("SignalStream", () => {
  function setup() {
    const bus = new MemoryBus();
    const emitter = bus.connect();
    const listener = bus.connect();
    connections.push(emitter, listener);
    const stream = new SignalStream<[boolean]>(listener, new SignalMatcher<[boolean]>(IDENTITY, "b"));
    return { emitter, listener, stream };
  }

  function settle(): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, 0));
  }

  it("subscribes lazily", async () => {
    const { emitter, stream } = setup();
    expect(stream.state).toBe("unsubscribed");

    // Sent before anyone subscribed: never seen
    await emitter.send(changed("b", [false]));
    await stream.subscribe();
    await emitter.send(changed("b", [true]));

    for await (const signal of stream) {
      expect(signal.args()).toEqual({ ok: true, value: [true] });
      break;
    }
  });

  it("resubscribes on each iteration and drops buffered signals on close", async () => {
    const { emitter, stream } = setup();
    await stream.subscribe();
    await emitter.send(changed("b", [true]));
    await emitter.send(changed("b", [false]));

    for await (const signal of stream) {
      expect(signal.args()).toEqual({ ok: true, value: [true] });
      break;
    }
    expect(stream.state).toBe("closed");

    await stream.subscribe();
    expect(stream.state).toBe("subscribed");
    await emitter.send(changed("b", [true]));
    for await (const signal of stream) {
      expect(signal.args()).toEqual({ ok: true, value: [true] });
      break;
    }
  });

  it("keeps going after a decode failure", async () => {
    const { emitter, stream } = setup();
    await stream.subscribe();
    await emitter.send(changed("s", ["on"]));
    await emitter.send(changed("b", [true]));

    const results = [];
    for await (const result of stream.decoded()) {
      results.push(result);
      if (results.length === 2) break;
    }
    expect(results[0].ok).toBe(false);
    expect(results[1]).toEqual({ ok: true, value: [true] });
  });

  it("yields nothing for other members or paths of the same interface", async () => {
    const { emitter, stream } = setup();
    await stream.subscribe();
    await emitter.send(signalMessage({ path: "/light", interface: "org.example.Light", member: "Removed" }));
    await emitter.send(changed("b", [false], "/other"));
    await emitter.send(changed("b", [true]));

    const seen = [];
    for await (const signal of stream) {
      seen.push(signal);
      break;
    }
    expect(seen).toHaveLength(1);
    expect(seen[0].message.member).toBe("Changed");
    expect(seen[0].message.path).toBe("/light");
    expect(seen[0].args()).toEqual({ ok: true, value: [true] });
  });

  it("opens one subscription for concurrent subscribe calls and drops it on close", async () => {
    const { listener, stream } = setup();
    await Promise.all([stream.subscribe(), stream.subscribe()]);
    expect(stream.state).toBe("subscribed");

    stream.close();
    expect(stream.state).toBe("closed");
    expect(listener.deliver(changed("b", [true]))).toBe(false);
  });

  it("drops a subscription that completes after close", async () => {
    const { listener, stream } = setup();
    const subscribing = stream.subscribe();
    stream.close();
    await subscribing;
    expect(listener.deliver(changed("b", [true]))).toBe(false);
  });

  it("gives concurrent iterations their own subscriptions", async () => {
    const { emitter, stream } = setup();
    const first = stream[Symbol.asyncIterator]();
    const second = stream[Symbol.asyncIterator]();
    const firstNext = first.next();
    const secondNext = second.next();
    await settle();

    await emitter.send(changed("b", [true]));
    expect((await firstNext).value?.args()).toEqual({ ok: true, value: [true] });
    expect((await secondNext).value?.args()).toEqual({ ok: true, value: [true] });

    await first.return?.();
    expect(stream.state).toBe("subscribed");

    await emitter.send(changed("b", [false]));
    expect((await second.next()).value?.args()).toEqual({ ok: true, value: [false] });
    await second.return?.();
    expect(stream.state).toBe("closed");
  });
});
