// Tests for interface dispatchers

import { describe, it, expect } from "vitest";
import { Variant } from "@busbind/signature";
import { type BusMessage, type BusTransport, createMessageQueue } from "@busbind/wire";
import { defineInterface, emitInterface, parseIntrospection } from "@busbind/model";
import { createDispatcher } from "./index.ts";

const CounterSpec = defineInterface({
  name: "org.example.Counter",
  methods: {
    increment: { in: ["u"], out: "u" },
  },
  properties: {
    count: { type: "u" },
    step: { type: "u", access: "readwrite", emitsChanged: "invalidates" },
  },
  signals: {
    overflow: { args: [{ name: "at", type: "u" }] },
  },
});

function recordingTransport(): { transport: BusTransport; sent: BusMessage[] } {
  const sent: BusMessage[] = [];
  const transport: BusTransport = {
    uniqueName: ":1.1",
    send: async (message) => {
      sent.push(message);
    },
    call: async () => {
      throw new Error("not connected");
    },
    subscribe: async () => createMessageQueue().stream,
  };
  return { transport, sent };
}

function counter() {
  let count = 0;
  let step = 1;
  return createDispatcher(CounterSpec, {
    methods: {
      increment: (by: number) => (count += by * step),
    },
    properties: {
      count: { get: () => count },
      step: {
        get: () => step,
        set: (value: number) => {
          step = value;
        },
      },
    },
  });
}

describe("createDispatcher", () => {
  it("routes by wire name in declaration order", () => {
    expect([...counter().routes.keys()]).toEqual(["Increment"]);
  });

  it("requires a handler for every method", () => {
    expect(() => createDispatcher(CounterSpec, { properties: {} })).toThrow(
      "org.example.Counter: no handler for method increment",
    );
  });

  it("requires getters and setters for accessible properties", () => {
    expect(() =>
      createDispatcher(CounterSpec, { methods: { increment: () => 0 }, properties: {} }),
    ).toThrow("org.example.Counter: no getter for property count");
    expect(() =>
      createDispatcher(CounterSpec, {
        methods: { increment: () => 0 },
        properties: { count: { get: () => 0 }, step: { get: () => 1 } },
      }),
    ).toThrow("org.example.Counter: no setter for property step");
  });

  it("does not take functions inherited from Object.prototype as handlers", () => {
    const NamedSpec = defineInterface({ name: "org.example.Named", methods: { toString: { out: "s" } } });
    expect(() => createDispatcher(NamedSpec, { methods: {} })).toThrow(
      "org.example.Named: no handler for method toString",
    );
  });

  it("introspects like emitInterface", () => {
    expect(counter().introspect(1)).toBe(emitInterface(CounterSpec, undefined, 1));
  });
});

describe("signals and change notification", () => {
  it("checks signal arguments before sending", async () => {
    const { transport, sent } = recordingTransport();
    const dispatcher = counter();
    await expect(dispatcher.emitSignal({ transport, path: "/c" }, "Overflow", ["big"])).rejects.toThrow(
      "Overflow: [0]: expected integer, got string (expected 'u')",
    );
    await expect(dispatcher.emitSignal({ transport, path: "/c" }, "Underflow", [])).rejects.toThrow(
      "org.example.Counter has no signal Underflow",
    );
    expect(sent).toHaveLength(0);

    await dispatcher.emitSignal({ transport, path: "/c" }, "Overflow", [7]);
    expect(sent).toEqual([
      {
        type: "signal",
        path: "/c",
        interface: "org.example.Counter",
        member: "Overflow",
        destination: undefined,
        signature: "u",
        body: [7],
      },
    ]);
  });

  it("announces changes made outside Set with the current value", async () => {
    const { transport, sent } = recordingTransport();
    const dispatcher = counter();
    await dispatcher.getProperty("Count");
    await dispatcher.propertyChanged({ transport, path: "/c" }, "Count");
    expect(sent[0]?.body).toEqual(["org.example.Counter", new Map([["Count", new Variant("u", 0)]]), []]);
  });

  it("invalidates properties that ask for it", async () => {
    const { transport, sent } = recordingTransport();
    const dispatcher = counter();
    await dispatcher.setProperty({ transport, path: "/c" }, "Step", new Variant("u", 5));
    expect(await dispatcher.getProperty("Step")).toEqual(new Variant("u", 5));
    expect(sent[0]?.body).toEqual(["org.example.Counter", new Map(), ["Step"]]);
  });
});

describe("constant properties", () => {
  const DeviceSpec = parseIntrospection(
    [
      "<node>",
      '  <interface name="org.example.Device">',
      '    <property name="Serial" type="s" access="readwrite">',
      '      <annotation name="org.freedesktop.DBus.Property.EmitsChangedSignal" value="const"/>',
      "    </property>",
      "  </interface>",
      "</node>",
    ].join("\n"),
  ).interfaces[0];

  it("need no setter even when declared readwrite", () => {
    expect(() => createDispatcher(DeviceSpec, { properties: { serial: { get: () => "a" } } })).not.toThrow();
  });

  it("are never set", async () => {
    let serial = "a";
    const dispatcher = createDispatcher(DeviceSpec, {
      properties: {
        serial: {
          get: () => serial,
          set: (value: string) => {
            serial = value;
          },
        },
      },
    });
    const { transport, sent } = recordingTransport();

    await expect(
      dispatcher.setProperty({ transport, path: "/d" }, "Serial", new Variant("s", "b")),
    ).rejects.toMatchObject({ errorName: "org.freedesktop.DBus.Error.PropertyReadOnly" });
    expect(serial).toBe("a");
    expect(sent).toEqual([]);
    expect(await dispatcher.getProperty("Serial")).toEqual(new Variant("s", "a"));
  });
});
