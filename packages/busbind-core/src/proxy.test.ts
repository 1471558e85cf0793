// Client proxy tests, against an object server on an in-process bus

import { describe, it, expect, afterEach } from "vitest";
import { Variant } from "@busbind/signature";
import { BusError, BusErrorName, CallError, type BusTransport, signalMessage } from "@busbind/wire";
import { defineInterface } from "@busbind/model";
import { MemoryBus, type MemoryConnection } from "@busbind/memory";
import {
  ObjectServer,
  PropertiesProxy,
  type ProxyOptions,
  createDispatcher,
  SignalDecodeError,
  createProxy,
} from "./index.ts";

const LIGHT_PATH = "/org/example/Light";
const SERVICE = "org.example.Lights";

const LightSpec = defineInterface({
  name: "org.example.Light",
  methods: {
    toggle: { out: { name: "on", type: "b" } },
    set_level: { in: [{ name: "level", type: "u" }] },
    describe: {
      out: [
        { name: "label", type: "s" },
        { name: "level", type: "u" },
      ],
    },
    fail: {},
    broken: { out: "u" },
    hang: {},
  },
  properties: {
    brightness: { type: "u", access: "readwrite" },
    label: { type: "s" },
    serial: { type: "s", emitsChanged: "const" },
    secret: { type: "s", access: "write", emitsChanged: "invalidates" },
    mode: { type: "s", access: "readwrite", emitsChanged: "invalidates" },
    quiet: { type: "u", access: "readwrite", emitsChanged: "false" },
  },
  signals: {
    changed: { args: [{ name: "on", type: "b" }] },
  },
});

const connections: MemoryConnection[] = [];

afterEach(() => {
  for (const connection of connections.splice(0)) {
    connection.close();
  }
});

async function setup(options: Omit<ProxyOptions, "path" | "destination"> = {}) {
  const bus = new MemoryBus();
  const serverConn = bus.connect();
  const clientConn = bus.connect();
  connections.push(clientConn, serverConn);
  await serverConn.requestName(SERVICE);

  const state = { on: false, level: 10, label: "desk", secret: "", mode: "auto", quiet: 0 };
  const dispatcher = createDispatcher(LightSpec, {
    methods: {
      toggle: () => (state.on = !state.on),
      set_level: (level: number) => {
        state.level = level;
      },
      describe: () => [state.label, state.level],
      fail: () => {
        throw new BusError("org.example.Light.Error.Broken", "bulb is broken");
      },
      broken: () => "not a number",
      hang: () => new Promise<void>(() => undefined),
    },
    properties: {
      brightness: {
        get: () => state.level,
        set: (value: number) => {
          state.level = value;
        },
      },
      label: { get: () => state.label },
      serial: { get: () => "SN-1" },
      secret: {
        set: (value: string) => {
          state.secret = value;
        },
      },
      mode: {
        get: () => state.mode,
        set: (value: string) => {
          state.mode = value;
        },
      },
      quiet: {
        get: () => state.quiet,
        set: (value: number) => {
          state.quiet = value;
        },
      },
    },
  });

  const server = new ObjectServer().at(LIGHT_PATH, dispatcher);
  await server.serve(serverConn);
  const proxy = createProxy(LightSpec, clientConn, { destination: SERVICE, path: LIGHT_PATH, ...options });
  return { serverConn, clientConn, server, proxy, state };
}

async function callError(promise: Promise<unknown>): Promise<CallError> {
  const error = await promise.then(
    () => undefined,
    (e: unknown) => e,
  );
  if (!(error instanceof CallError)) {
    throw new Error(`expected a CallError, got ${String(error)}`);
  }
  return error;
}

function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe("method calls", () => {
  it("returns a single output as a value", async () => {
    const { proxy, state } = await setup();
    expect(await proxy.callMethod<boolean>("Toggle")).toBe(true);
    expect(state.on).toBe(true);
  });

  it("returns undefined for methods without outputs", async () => {
    const { proxy, state } = await setup();
    expect(await proxy.callMethod("SetLevel", [42])).toBeUndefined();
    expect(state.level).toBe(42);
  });

  it("returns several outputs as one tuple", async () => {
    const { proxy } = await setup();
    expect(await proxy.callMethod<[string, number]>("Describe")).toEqual(["desk", 10]);
  });

  it("keeps concurrent calls apart", async () => {
    const { proxy } = await setup();
    const [described, toggled, again] = await Promise.all([
      proxy.callMethod("Describe"),
      proxy.callMethod("Toggle"),
      proxy.callMethod("Toggle"),
    ]);
    expect(described).toEqual(["desk", 10]);
    expect(toggled).toBe(true);
    expect(again).toBe(false);
  });

  it("surfaces named error replies as remote errors", async () => {
    const { proxy } = await setup();
    const error = await callError(proxy.callMethod("Fail"));
    expect(error.kind).toBe("remote");
    expect(error.errorName).toBe("org.example.Light.Error.Broken");
    expect(error.message).toBe("bulb is broken");
  });

  it("reports handlers returning values of the wrong type as Failed", async () => {
    const { proxy } = await setup();
    const error = await callError(proxy.callMethod("Broken"));
    expect(error.errorName).toBe(BusErrorName.Failed);
    expect(error.message).toBe(
      "Broken returned an invalid value: [0]: expected integer, got string (expected 'u')",
    );
  });

  it("refuses mistyped arguments before sending", async () => {
    const { proxy } = await setup();
    const error = await callError(proxy.callMethod("SetLevel", ["x"]));
    expect(error.kind).toBe("typeMismatch");
    expect(error.message).toBe("SetLevel: argument [0]: expected integer, got string (expected 'u')");
  });

  it("reports a reply signature the declaration does not expect", async () => {
    const { clientConn } = await setup();
    const skewed = defineInterface({
      name: "org.example.Light",
      methods: { toggle: { out: "s" } },
    });
    const proxy = createProxy(skewed, clientConn, { destination: SERVICE, path: LIGHT_PATH });
    const error = await callError(proxy.callMethod("Toggle"));
    expect(error.kind).toBe("typeMismatch");
    expect(error.message).toBe("org.example.Light.Toggle: reply signature 'b' does not match expected 's'");
  });

  it("times out after the proxy's timeout", async () => {
    const { proxy } = await setup({ timeoutMs: 5 });
    const error = await callError(proxy.callMethod("Hang"));
    expect(error.kind).toBe("timeout");
    expect(error.message).toBe("Hang: no reply within 5ms");
  });

  it("reports unknown objects", async () => {
    const { clientConn } = await setup();
    const proxy = createProxy(LightSpec, clientConn, { destination: SERVICE, path: "/nope" });
    const error = await callError(proxy.callMethod("Toggle"));
    expect(error.errorName).toBe(BusErrorName.UnknownObject);
    expect(error.message).toBe("Unknown object /nope");
  });

  it("throws for members the interface does not declare", async () => {
    const { proxy } = await setup();
    await expect(proxy.callMethod("Explode")).rejects.toThrow("org.example.Light has no method Explode");
  });
});

describe("properties", () => {
  it("reads and writes through org.freedesktop.DBus.Properties", async () => {
    const { proxy, state } = await setup();
    expect(await proxy.getProperty<number>("Brightness")).toBe(10);
    await proxy.setProperty("Brightness", 7);
    expect(state.level).toBe(7);
    expect(await proxy.getProperty<number>("Brightness")).toBe(7);
  });

  it("refuses read-only and const properties locally", async () => {
    const { proxy } = await setup();
    for (const name of ["Label", "Serial"]) {
      const error = await callError(proxy.setProperty(name, "x"));
      expect(error.kind).toBe("notWritable");
      expect(error.message).toBe(`property ${name} is not writable`);
    }
  });

  it("answers reads of write-only properties with AccessDenied", async () => {
    const { proxy } = await setup();
    const error = await callError(proxy.getProperty("Secret"));
    expect(error.errorName).toBe(BusErrorName.AccessDenied);
    expect(error.message).toBe("Property Secret is write-only");
  });

  it("gets every readable property in declaration order", async () => {
    const { proxy } = await setup();
    expect([...(await proxy.getAllProperties())]).toEqual([
      ["Brightness", 10],
      ["Label", "desk"],
      ["Serial", "SN-1"],
      ["Mode", "auto"],
      ["Quiet", 0],
    ]);
  });

  it("reports a property variant of the wrong type", async () => {
    const { clientConn } = await setup();
    const skewed = defineInterface({
      name: "org.example.Light",
      properties: { label: { type: "u" } },
    });
    const proxy = createProxy(skewed, clientConn, { destination: SERVICE, path: LIGHT_PATH });
    const error = await callError(proxy.getProperty("Label"));
    expect(error.kind).toBe("typeMismatch");
    expect(error.message).toBe("Label: reply signature 's' does not match expected 'u'");
  });
});

describe("change notification", () => {
  async function watch(transport: BusTransport) {
    const stream = new PropertiesProxy(transport, { destination: SERVICE, path: LIGHT_PATH }).receivePropertiesChanged();
    await stream.subscribe();
    return stream[Symbol.asyncIterator]();
  }

  it("sends the new value, sends invalidations, and stays quiet as declared", async () => {
    const { proxy, clientConn } = await setup();
    const changes = await watch(clientConn);

    await proxy.setProperty("Quiet", 3);
    await proxy.setProperty("Mode", "manual");
    await proxy.setProperty("Brightness", 7);

    const mode = await changes.next();
    expect(mode.done).toBe(false);
    expect(mode.value?.args()).toEqual({
      ok: true,
      value: ["org.example.Light", new Map(), ["Mode"]],
    });

    const brightness = await changes.next();
    expect(brightness.value?.args()).toEqual({
      ok: true,
      value: ["org.example.Light", new Map([["Brightness", new Variant("u", 7)]]), []],
    });
  });

  it("yields changes of one property", async () => {
    const { proxy, clientConn } = await setup();
    const watcher = createProxy(LightSpec, clientConn, { destination: SERVICE, path: LIGHT_PATH });
    const brightness = watcher.receivePropertyChanged<number>("Brightness");
    const mode = watcher.receivePropertyChanged<string>("Mode");
    const nextBrightness = brightness.next();
    const nextMode = mode.next();
    await tick();

    await proxy.setProperty("Mode", "manual");
    await proxy.setProperty("Brightness", 12);

    expect((await nextMode).value).toEqual({ kind: "invalidated", name: "Mode" });
    expect((await nextBrightness).value).toEqual({ kind: "changed", name: "Brightness", value: 12 });
    await brightness.return(undefined);
    await mode.return(undefined);
  });
});

describe("unreadable change notification", () => {
  function propertiesChanged(signature: string, body: unknown[]) {
    return signalMessage({
      path: LIGHT_PATH,
      interface: "org.freedesktop.DBus.Properties",
      member: "PropertiesChanged",
      signature,
      body,
    });
  }

  it("yields decode failures instead of dropping them", async () => {
    const { clientConn, serverConn } = await setup();
    const watcher = createProxy(LightSpec, clientConn, { destination: SERVICE, path: LIGHT_PATH });
    const brightness = watcher.receivePropertyChanged<number>("Brightness");
    const first = brightness.next();
    await tick();

    await serverConn.send(
      propertiesChanged("sa{sv}as", ["org.example.Light", new Map([["Brightness", new Variant("s", "bright")]]), []]),
    );
    await serverConn.send(propertiesChanged("s", ["org.example.Light"]));
    await serverConn.send(
      propertiesChanged("sa{sv}as", ["org.example.Light", new Map([["Brightness", new Variant("u", 3)]]), []]),
    );

    const wrongType = (await first).value;
    expect(wrongType?.kind).toBe("decodeFailed");
    if (wrongType?.kind === "decodeFailed") {
      expect(wrongType.name).toBe("Brightness");
      expect(wrongType.error).toBeInstanceOf(SignalDecodeError);
      expect(wrongType.error.kind).toBe("signatureMismatch");
      expect(wrongType.error.message).toBe("PropertiesChanged: Brightness has signature 's', expected 'u'");
    }

    const badBody = (await brightness.next()).value;
    expect(badBody?.kind).toBe("decodeFailed");
    if (badBody?.kind === "decodeFailed") {
      expect(badBody.error.message).toBe(
        "PropertiesChanged: body signature 's' does not match expected 'sa{sv}as'",
      );
    }

    expect((await brightness.next()).value).toEqual({ kind: "changed", name: "Brightness", value: 3 });
    await brightness.return(undefined);
  });
});

describe("signals", () => {
  it("receives signals emitted by the object server", async () => {
    const { proxy, server, serverConn } = await setup();
    const stream = proxy.receiveSignal<[boolean]>("Changed");
    await stream.subscribe();
    expect(stream.state).toBe("subscribed");

    await server.emitSignal(serverConn, LIGHT_PATH, "org.example.Light", "Changed", [true]);

    for await (const signal of stream) {
      expect(signal.args()).toEqual({ ok: true, value: [true] });
      expect(signal.namedArgs()).toEqual({ ok: true, value: { on: true } });
      break;
    }
    expect(stream.state).toBe("closed");
  });

  it("ignores signals from other paths", async () => {
    const { proxy, server, serverConn } = await setup();
    server.at("/org/example/Light2", createDispatcherFor());
    const stream = proxy.receiveSignal<[boolean]>("Changed");
    await stream.subscribe();

    await server.emitSignal(serverConn, "/org/example/Light2", "org.example.Light", "Changed", [false]);
    await server.emitSignal(serverConn, LIGHT_PATH, "org.example.Light", "Changed", [true]);

    for await (const signal of stream) {
      expect(signal.message.path).toBe(LIGHT_PATH);
      break;
    }
  });
});

function createDispatcherFor() {
  return createDispatcher(LightSpec, {
    methods: {
      toggle: () => true,
      set_level: () => undefined,
      describe: () => ["spare", 0],
      fail: () => undefined,
      broken: () => 0,
      hang: () => undefined,
    },
    properties: {
      brightness: { get: () => 0, set: () => undefined },
      label: { get: () => "spare" },
      serial: { get: () => "SN-2" },
      secret: { set: () => undefined },
      mode: { get: () => "auto", set: () => undefined },
      quiet: { get: () => 0, set: () => undefined },
    },
  });
}
