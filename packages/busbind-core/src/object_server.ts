// Object server: serves interface dispatchers at object paths.
//
// Introspectable, Properties and Peer are implemented here for every object;
// calls to other interfaces go to the dispatcher registered for them.

import { randomUUID } from "node:crypto";
import { Variant, isObjectPath } from "@busbind/signature";
import {
  BusError,
  BusErrorName,
  type BusTransport,
  type MethodCallMessage,
  type ReplyMessage,
  errorReply,
  expectsReply,
} from "@busbind/wire";
import { type IntrospectionNode, emitIntrospection } from "@busbind/model";
import {
  type InterfaceDispatcher,
  type MethodContext,
  type SignalContext,
  createDispatcher,
} from "./dispatcher.ts";
import { log } from "./logging.ts";
import { IntrospectableSpec, PeerSpec, PropertiesSpec } from "./standard.ts";

export interface ObjectServerOptions {
  /** Reported by `Peer.GetMachineId`. 32 hex digits. */
  machineId?: string;
}

export function defaultObjectServerOptions(): Required<ObjectServerOptions> {
  return {
    machineId: randomUUID().replace(/-/g, ""),
  };
}

/** A running server loop. */
export interface ServeHandle {
  /** Stop receiving calls. Calls already being handled still get replies. */
  close(): void;
  /** Resolves once the loop has stopped and every reply has been sent. */
  readonly done: Promise<void>;
}

function childNames(paths: Iterable<string>, parent: string): string[] {
  const prefix = parent === "/" ? "/" : `${parent}/`;
  const names = new Set<string>();
  for (const path of paths) {
    if (path !== parent && path.startsWith(prefix)) {
      names.add(path.slice(prefix.length).split("/")[0]);
    }
  }
  return [...names];
}

export class ObjectServer {
  readonly machineId: string;
  private readonly objects = new Map<string, Map<string, InterfaceDispatcher>>();
  private readonly standard: Map<string, InterfaceDispatcher>;

  constructor(options: ObjectServerOptions = {}) {
    const config = { ...defaultObjectServerOptions(), ...options };
    this.machineId = config.machineId;

    const introspectable = createDispatcher(IntrospectableSpec, {
      methods: {
        introspect: (ctx: MethodContext) => this.introspect(ctx.path),
      },
    });
    const properties = createDispatcher(PropertiesSpec, {
      methods: {
        get: (iface: string, name: string, ctx: MethodContext) =>
          this.requireInterface(ctx.path, iface).getProperty(name),
        set: (iface: string, name: string, value: Variant, ctx: MethodContext) =>
          this.requireInterface(ctx.path, iface).setProperty(ctx, name, value),
        get_all: (iface: string, ctx: MethodContext) =>
          this.requireInterface(ctx.path, iface).getAllProperties(),
      },
    });
    const peer = createDispatcher(PeerSpec, {
      methods: {
        ping: () => undefined,
        get_machine_id: () => this.machineId,
      },
    });
    this.standard = new Map([
      [PeerSpec.name, peer],
      [IntrospectableSpec.name, introspectable],
      [PropertiesSpec.name, properties],
    ]);
  }

  /**
   * Serve a dispatcher at a path.
   *
   * @throws Error for an invalid path, or an interface already served there
   */
  at(path: string, dispatcher: InterfaceDispatcher): this {
    if (!isObjectPath(path)) {
      throw new Error(`invalid object path "${path}"`);
    }
    const name = dispatcher.spec.name;
    if (this.standard.has(name)) {
      throw new Error(`${name} is provided by the object server`);
    }
    let interfaces = this.objects.get(path);
    if (interfaces === undefined) {
      interfaces = new Map();
      this.objects.set(path, interfaces);
    }
    if (interfaces.has(name)) {
      throw new Error(`${name} is already served at ${path}`);
    }
    interfaces.set(name, dispatcher);
    return this;
  }

  /** Stop serving one interface at a path, or the whole object. */
  remove(path: string, interfaceName?: string): boolean {
    if (interfaceName === undefined) {
      return this.objects.delete(path);
    }
    const interfaces = this.objects.get(path);
    if (interfaces === undefined) return false;
    const removed = interfaces.delete(interfaceName);
    if (interfaces.size === 0) this.objects.delete(path);
    return removed;
  }

  dispatcher(path: string, interfaceName: string): InterfaceDispatcher | undefined {
    return this.objects.get(path)?.get(interfaceName);
  }

  /**
   * Introspection document of a path.
   *
   * @throws BusError `UnknownObject` for a path with no object and no children
   */
  introspect(path: string): string {
    const interfaces = this.objects.get(path);
    const children = childNames(this.objects.keys(), path);
    if (interfaces === undefined && children.length === 0 && path !== "/") {
      throw new BusError(BusErrorName.UnknownObject, `Unknown object ${path}`);
    }
    const node: IntrospectionNode = {
      interfaces: [
        ...[...this.standard.values()].map((d) => d.spec),
        ...[...(interfaces?.values() ?? [])].map((d) => d.spec),
      ],
      children: children.map((name) => ({ name, interfaces: [], children: [] })),
    };
    return emitIntrospection(node);
  }

  /** Send a signal from an object served here. */
  async emitSignal(
    transport: BusTransport,
    path: string,
    interfaceName: string,
    member: string,
    args: readonly unknown[],
  ): Promise<void> {
    const ctx: SignalContext = { transport, path };
    await this.requireInterface(path, interfaceName).emitSignal(ctx, member, args);
  }

  /** Produce the reply to one method call. */
  async handle(message: MethodCallMessage, transport: BusTransport): Promise<ReplyMessage> {
    const path = message.path;
    const interfaces = this.objects.get(path);
    if (interfaces === undefined && path !== "/" && childNames(this.objects.keys(), path).length === 0) {
      return errorReply(message, BusErrorName.UnknownObject, `Unknown object ${path}`);
    }

    const dispatcher = this.route(message, interfaces);
    if (dispatcher === undefined) {
      return message.interface === undefined
        ? errorReply(message, BusErrorName.UnknownMethod, `Unknown method ${message.member}`)
        : errorReply(message, BusErrorName.UnknownInterface, `Unknown interface ${message.interface}`);
    }

    const ctx: MethodContext = { transport, path, message, sender: message.sender };
    return dispatcher.dispatch(message, ctx);
  }

  /**
   * Answer method calls arriving on a transport until closed.
   * Calls are handled concurrently.
   */
  async serve(transport: BusTransport): Promise<ServeHandle> {
    const stream = await transport.subscribe({ type: "method_call" });
    const inflight = new Set<Promise<void>>();

    const done = (async () => {
      for await (const message of stream) {
        if (message.type !== "method_call") continue;
        const task: Promise<void> = this.respond(message, transport).finally(() => inflight.delete(task));
        inflight.add(task);
      }
      await Promise.allSettled(inflight);
    })();

    return {
      close: () => stream.close(),
      done,
    };
  }

  private route(
    message: MethodCallMessage,
    interfaces: Map<string, InterfaceDispatcher> | undefined,
  ): InterfaceDispatcher | undefined {
    if (message.interface !== undefined) {
      return this.standard.get(message.interface) ?? interfaces?.get(message.interface);
    }
    for (const dispatcher of [...(interfaces?.values() ?? []), ...this.standard.values()]) {
      if (dispatcher.routes.has(message.member)) return dispatcher;
    }
    return undefined;
  }

  private requireInterface(path: string, interfaceName: string): InterfaceDispatcher {
    const dispatcher = this.dispatcher(path, interfaceName);
    if (dispatcher === undefined) {
      throw new BusError(BusErrorName.UnknownInterface, `Unknown interface ${interfaceName} at ${path}`);
    }
    return dispatcher;
  }

  private async respond(message: MethodCallMessage, transport: BusTransport): Promise<void> {
    try {
      const reply = await this.handle(message, transport);
      if (reply.type === "error") {
        log.dispatch("✗ %s.%s: %s", message.interface ?? "", message.member, reply.errorName);
      }
      if (expectsReply(message)) {
        await transport.send(reply);
      }
    } catch (e) {
      log.dispatch("failed to reply to %s: %O", message.member, e);
    }
  }
}

