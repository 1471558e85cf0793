// Tests for callers and client middleware

import { describe, it, expect } from "vitest";
import {
  type BusTransport,
  CallError,
  type ReplyMessage,
  createMessageQueue,
  methodCall,
} from "@busbind/wire";
import {
  type Caller,
  type CallerRequest,
  type ClientMiddleware,
  ExtensionKey,
  MiddlewareCaller,
  RejectionError,
  TransportCaller,
  type CallOutcome,
} from "./index.ts";

function fakeTransport(reply: ReplyMessage | Error): BusTransport {
  return {
    uniqueName: ":1.1",
    send: async () => undefined,
    call: async () => {
      if (reply instanceof Error) throw reply;
      return reply;
    },
    subscribe: async () => createMessageQueue().stream,
  };
}

function request(replySignature = "", body: unknown[] = []): CallerRequest {
  return {
    message: methodCall({
      destination: "org.example.Service",
      path: "/a",
      interface: "org.example.A",
      member: "B",
      signature: body.length > 0 ? "u" : "",
      body,
    }),
    replySignature,
  };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (e: unknown) => e,
  );
}

class StubCaller implements Caller {
  readonly requests: CallerRequest[] = [];

  constructor(private readonly reply: () => Promise<readonly unknown[]>) {}

  call(req: CallerRequest): Promise<readonly unknown[]> {
    this.requests.push(req);
    return this.reply();
  }

  with(middleware: ClientMiddleware): Caller {
    return new MiddlewareCaller(this, [middleware]);
  }
}

describe("TransportCaller", () => {
  it("returns the reply body", async () => {
    const caller = new TransportCaller(
      fakeTransport({ type: "method_return", replySerial: 1, signature: "u", body: [5] }),
    );
    expect(await caller.call(request("u"))).toEqual([5]);
  });

  it("turns error replies into remote errors", async () => {
    const caller = new TransportCaller(
      fakeTransport({
        type: "error",
        replySerial: 1,
        errorName: "org.example.Error.Nope",
        signature: "s",
        body: ["not today"],
      }),
    );
    const error = await rejection(caller.call(request()));
    expect(error).toBeInstanceOf(CallError);
    expect(error).toMatchObject({ kind: "remote", errorName: "org.example.Error.Nope", message: "not today" });
  });

  it("wraps transport failures", async () => {
    const caller = new TransportCaller(fakeTransport(new Error("socket closed")));
    const error = await rejection(caller.call(request()));
    expect(error).toMatchObject({ kind: "transport", message: "transport failure: socket closed" });
  });

  it("passes call errors from the transport through", async () => {
    const timeout = CallError.timeout("B", 10);
    const caller = new TransportCaller(fakeTransport(timeout));
    expect(await rejection(caller.call(request()))).toBe(timeout);
  });

  it("checks the reply signature and values", async () => {
    const wrongSignature = new TransportCaller(
      fakeTransport({ type: "method_return", replySerial: 1, signature: "s", body: ["x"] }),
    );
    expect(await rejection(wrongSignature.call(request("u")))).toMatchObject({
      kind: "typeMismatch",
      message: "org.example.A.B: reply signature 's' does not match expected 'u'",
    });

    const wrongValue = new TransportCaller(
      fakeTransport({ type: "method_return", replySerial: 1, signature: "u", body: ["x"] }),
    );
    expect(await rejection(wrongValue.call(request("u")))).toMatchObject({
      kind: "typeMismatch",
      message: "org.example.A.B: reply [0]: expected integer, got string (expected 'u')",
    });
  });
});

describe("MiddlewareCaller", () => {
  it("runs pre hooks in order and post hooks in reverse", async () => {
    const order: string[] = [];
    const tracer = (name: string): ClientMiddleware => ({
      pre: () => {
        order.push(`${name}:pre`);
      },
      post: () => {
        order.push(`${name}:post`);
      },
    });
    const stub = new StubCaller(async () => ["ok"]);
    const caller = stub.with(tracer("a")).with(tracer("b"));

    expect(await caller.call(request())).toEqual(["ok"]);
    expect(order).toEqual(["a:pre", "b:pre", "b:post", "a:post"]);
  });

  it("sends arguments rewritten by pre hooks", async () => {
    const stub = new StubCaller(async () => []);
    const caller = stub.with({
      pre: (_ctx, req) => {
        req.args = [req.args.length + 41];
      },
    });
    await caller.call(request("", [1]));
    expect(stub.requests[0].message.body).toEqual([42]);
  });

  it("checks arguments rewritten by pre hooks before sending them", async () => {
    let sent = 0;
    const transport: BusTransport = {
      ...fakeTransport({ type: "method_return", replySerial: 1, signature: "", body: [] }),
      call: async () => {
        sent++;
        return { type: "method_return", replySerial: 1, signature: "", body: [] };
      },
    };
    const caller = new TransportCaller(transport).with({
      pre: (_ctx, req) => {
        req.args = [-1];
      },
    });

    const error = await rejection(caller.call(request("", [1])));
    expect(error).toBeInstanceOf(CallError);
    expect(error).toMatchObject({
      kind: "typeMismatch",
      message: "org.example.A.B: argument [0]: -1 is out of range (expected 'u')",
    });
    expect(sent).toBe(0);
  });

  it("rejects calls a pre hook refuses, without sending them", async () => {
    const outcomes: CallOutcome[] = [];
    const stub = new StubCaller(async () => []);
    const caller = stub
      .with({
        post: (_ctx, _req, outcome) => {
          outcomes.push(outcome);
        },
      })
      .with({
        pre: (_ctx, req) =>
          req.method.endsWith(".B") ? { code: "permission-denied", message: "read-only session" } : undefined,
      });

    const error = await rejection(caller.call(request()));
    expect(error).toBeInstanceOf(RejectionError);
    expect(error).toMatchObject({ code: "permission-denied", message: "read-only session" });
    expect(stub.requests).toHaveLength(0);
    expect(outcomes).toEqual([{ ok: false, error }]);
  });

  it("reports failures to post hooks and rethrows them", async () => {
    const outcomes: CallOutcome[] = [];
    const failure = CallError.remote("org.example.Error.Nope", "no");
    const stub = new StubCaller(async () => {
      throw failure;
    });
    const caller = stub.with({
      post: (_ctx, _req, outcome) => {
        outcomes.push(outcome);
      },
    });

    expect(await rejection(caller.call(request()))).toBe(failure);
    expect(outcomes).toEqual([{ ok: false, error: failure }]);
  });

  it("keeps going when a post hook throws", async () => {
    let reached = false;
    const stub = new StubCaller(async () => ["ok"]);
    const caller = stub
      .with({
        post: () => {
          reached = true;
        },
      })
      .with({
        post: () => {
          throw new Error("hook failed");
        },
      });

    expect(await caller.call(request())).toEqual(["ok"]);
    expect(reached).toBe(true);
  });

  it("shares extensions between the hooks of one call", async () => {
    const KEY = new ExtensionKey<string>("test");
    const seen: Array<string | undefined> = [];
    const stub = new StubCaller(async () => []);
    const caller = stub.with({
      pre: (ctx) => {
        expect(ctx.extensions.has(KEY)).toBe(false);
        ctx.extensions.set(KEY, "from pre");
      },
      post: (ctx) => {
        seen.push(ctx.extensions.get(KEY));
      },
    });

    await caller.call(request());
    await caller.call(request());
    expect(seen).toEqual(["from pre", "from pre"]);
  });
});
