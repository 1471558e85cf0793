// Tests for the logging middleware

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import createDebug from "debug";
import { CallError, methodCall } from "@busbind/wire";
import { type Caller, type CallerRequest, type ClientMiddleware, MiddlewareCaller, loggingMiddleware } from "./index.ts";

const NAMESPACE = "busbind:test";

let lines: unknown[][] = [];
const originalLog = createDebug.log;

beforeEach(() => {
  lines = [];
  createDebug.log = (...args: unknown[]) => {
    lines.push(args);
  };
  createDebug.enable(NAMESPACE);
});

afterEach(() => {
  createDebug.disable();
  createDebug.log = originalLog;
});

function request(body: unknown[] = [1]): CallerRequest {
  return {
    message: methodCall({
      destination: "org.example.Service",
      path: "/a",
      interface: "org.example.A",
      member: "B",
      signature: "u".repeat(body.length),
      body,
    }),
    replySignature: "s",
  };
}

function callerWith(middleware: ClientMiddleware, reply: () => Promise<readonly unknown[]>): Caller {
  const inner: Caller = {
    call: reply,
    with: (mw) => new MiddlewareCaller(inner, [mw]),
  };
  return inner.with(middleware);
}

describe("loggingMiddleware", () => {
  it("logs the call and its reply", async () => {
    const caller = callerWith(loggingMiddleware({ namespace: NAMESPACE }), async () => ["done"]);
    await caller.call(request());

    expect(lines).toHaveLength(2);
    expect(String(lines[0][0])).toContain("→ org.example.A.B");
    expect(lines[0][1]).toEqual({
      type: "request",
      method: "org.example.A.B",
      path: "/a",
      destination: "org.example.Service",
      args: [1],
    });
    expect(String(lines[1][0])).toContain("← org.example.A.B: ✓");
    expect(lines[1][1]).toEqual({
      type: "response",
      method: "org.example.A.B",
      duration: expect.stringMatching(/^\d+\.\d{2}ms$/),
      ok: true,
      result: ["done"],
    });
  });

  it("logs failures with their kind and error name", async () => {
    const caller = callerWith(loggingMiddleware({ namespace: NAMESPACE }), async () => {
      throw CallError.remote("org.example.Error.Nope", "no");
    });
    await expect(caller.call(request())).rejects.toThrow("no");

    expect(String(lines[1][0])).toContain("← org.example.A.B: ✗");
    expect(lines[1][1]).toEqual({
      type: "response",
      method: "org.example.A.B",
      duration: expect.stringMatching(/ms$/),
      ok: false,
      errorKind: "remote",
      errorName: "org.example.Error.Nope",
      error: { name: "CallError", message: "no" },
    });
  });

  it("leaves out arguments and results when asked", async () => {
    const caller = callerWith(
      loggingMiddleware({ namespace: NAMESPACE, logArgs: false, logResults: false }),
      async () => ["done"],
    );
    await caller.call(request());
    expect(lines[0][1]).not.toHaveProperty("args");
    expect(lines[1][1]).not.toHaveProperty("result");
  });

  it("skips replies faster than minDuration", async () => {
    const caller = callerWith(loggingMiddleware({ namespace: NAMESPACE, minDuration: 60_000 }), async () => []);
    await caller.call(request());
    expect(lines).toHaveLength(1);
  });

  it("logs nothing when the namespace is disabled", async () => {
    const caller = callerWith(loggingMiddleware({ namespace: "busbind:quiet" }), async () => []);
    await caller.call(request());
    expect(lines).toHaveLength(0);
  });
});
