// Server-side dispatch for one interface.
//
// The routing table maps wire member names to handlers, in declaration
// order. It is built once, when the dispatcher is created.

import {
  type TypeSignature,
  Variant,
  checkBody,
  checkValue,
  formatMismatch,
  typeToString,
} from "@busbind/signature";
import {
  BusError,
  BusErrorName,
  type BusTransport,
  type MethodCallMessage,
  type ReplyMessage,
  StandardInterface,
  errorReply,
  methodReturn,
  signalMessage,
} from "@busbind/wire";
import {
  type InterfaceSpec,
  type MethodSpec,
  type PropertySpec,
  argsSignature,
  emitInterface,
  findProperty,
  findSignal,
  isReadable,
  isWritable,
} from "@busbind/model";
import { log } from "./logging.ts";

/** Where signals are sent from. */
export interface SignalContext {
  transport: BusTransport;
  path: string;
}

/** Passed to method handlers as their last argument. */
export interface MethodContext extends SignalContext {
  message: MethodCallMessage;
  sender?: string;
}

/** Receives the call's input values, then a MethodContext. */
export type MethodHandler = (...args: never[]) => unknown;

export interface PropertyHandler {
  get?: () => unknown;
  set?: (value: never, ctx: SignalContext) => unknown;
}

/** Handlers by native member name. */
export interface DispatcherHandlers {
  methods?: Record<string, MethodHandler>;
  properties?: Record<string, PropertyHandler>;
}

export interface MethodRoute {
  readonly method: MethodSpec;
  readonly handler: MethodHandler;
  readonly inputTypes: TypeSignature;
  readonly outputTypes: TypeSignature;
}

export interface InterfaceDispatcher {
  readonly spec: InterfaceSpec;
  /** Wire member name → route, in declaration order. */
  readonly routes: ReadonlyMap<string, MethodRoute>;

  /** Handle a method call addressed to this interface. Always produces a reply. */
  dispatch(message: MethodCallMessage, ctx: MethodContext): Promise<ReplyMessage>;

  /** Same text as `emitInterface(spec, undefined, level)`. */
  introspect(level?: number): string;

  /** Send a signal of this interface. */
  emitSignal(ctx: SignalContext, member: string, args: readonly unknown[]): Promise<void>;

  /** @throws BusError for unknown or write-only properties */
  getProperty(name: string): Promise<Variant>;

  /**
   * Set a property and announce the change according to its change
   * notification policy.
   *
   * @throws BusError for unknown, read-only or mistyped values
   */
  setProperty(ctx: SignalContext, name: string, value: Variant): Promise<void>;

  /** Every readable property. */
  getAllProperties(): Promise<Map<string, Variant>>;

  /** Announce a change made outside `setProperty`. */
  propertyChanged(ctx: SignalContext, name: string): Promise<void>;
}

function replyBody(method: MethodSpec, result: unknown): unknown[] | undefined {
  switch (method.outputs.length) {
    case 0:
      return [];
    case 1:
      return [result];
    default:
      return Array.isArray(result) && result.length === method.outputs.length ? [...result] : undefined;
  }
}

function toErrorReply(message: MethodCallMessage, error: unknown): ReplyMessage {
  if (error instanceof BusError) {
    return errorReply(message, error.errorName, error.message);
  }
  const text = error instanceof Error ? error.message : String(error);
  return errorReply(message, BusErrorName.Failed, text);
}

/** A handler defined on the object itself, never one inherited from its prototype. */
function ownHandler<H>(table: Record<string, H> | undefined, name: string): H | undefined {
  return table !== undefined && Object.hasOwn(table, name) ? table[name] : undefined;
}

class Dispatcher implements InterfaceDispatcher {
  readonly routes: ReadonlyMap<string, MethodRoute>;
  private readonly propertyHandlers: Map<string, PropertyHandler>;

  constructor(
    readonly spec: InterfaceSpec,
    private readonly handlers: DispatcherHandlers,
  ) {
    const routes = new Map<string, MethodRoute>();
    for (const method of spec.methods) {
      const handler = ownHandler(handlers.methods, method.nativeName);
      if (handler === undefined) {
        throw new Error(`${spec.name}: no handler for method ${method.nativeName}`);
      }
      routes.set(method.wireName, {
        method,
        handler,
        inputTypes: method.inputs.map((arg) => arg.type),
        outputTypes: method.outputs.map((arg) => arg.type),
      });
    }
    this.routes = routes;

    this.propertyHandlers = new Map();
    for (const property of spec.properties) {
      const handler = ownHandler(handlers.properties, property.nativeName);
      if (isReadable(property) && handler?.get === undefined) {
        throw new Error(`${spec.name}: no getter for property ${property.nativeName}`);
      }
      if (isWritable(property) && handler?.set === undefined) {
        throw new Error(`${spec.name}: no setter for property ${property.nativeName}`);
      }
      this.propertyHandlers.set(property.wireName, handler ?? {});
    }
  }

  async dispatch(message: MethodCallMessage, ctx: MethodContext): Promise<ReplyMessage> {
    const route = this.routes.get(message.member);
    if (route === undefined) {
      return errorReply(
        message,
        BusErrorName.UnknownMethod,
        `Unknown method ${message.member} on interface ${this.spec.name}`,
      );
    }
    const { method } = route;

    const expected = argsSignature(method.inputs);
    const mismatch =
      message.signature === expected
        ? checkBody(route.inputTypes, message.body)
        : { path: "<body>", expected, message: `got signature '${message.signature}'` };
    if (mismatch) {
      return errorReply(
        message,
        BusErrorName.InvalidArgs,
        `Invalid arguments for ${method.wireName}: ${formatMismatch(mismatch)}`,
      );
    }

    log.dispatch("→ %s.%s on %s", this.spec.name, method.wireName, ctx.path);
    let result: unknown;
    try {
      result = await Reflect.apply(route.handler, this.handlers.methods, [...message.body, ctx]);
    } catch (e) {
      log.dispatch("✗ %s.%s: %O", this.spec.name, method.wireName, e);
      return toErrorReply(message, e);
    }

    const body = replyBody(method, result);
    const outputMismatch = body === undefined ? null : checkBody(route.outputTypes, body);
    if (body === undefined || outputMismatch) {
      const detail = outputMismatch ? formatMismatch(outputMismatch) : "wrong number of outputs";
      log.dispatch("✗ %s.%s returned a bad value: %s", this.spec.name, method.wireName, detail);
      return errorReply(message, BusErrorName.Failed, `${method.wireName} returned an invalid value: ${detail}`);
    }
    return methodReturn(message, argsSignature(method.outputs), body);
  }

  introspect(level = 0): string {
    return emitInterface(this.spec, undefined, level);
  }

  async emitSignal(ctx: SignalContext, member: string, args: readonly unknown[]): Promise<void> {
    const signal = findSignal(this.spec, member);
    if (signal === undefined) {
      throw BusError.unknownMethod(`${this.spec.name} has no signal ${member}`);
    }
    const mismatch = checkBody(
      signal.args.map((arg) => arg.type),
      args,
    );
    if (mismatch) {
      throw BusError.invalidArgs(`${signal.wireName}: ${formatMismatch(mismatch)}`);
    }
    log.signal("emit %s.%s from %s", this.spec.name, signal.wireName, ctx.path);
    await ctx.transport.send(
      signalMessage({
        path: ctx.path,
        interface: this.spec.name,
        member: signal.wireName,
        signature: argsSignature(signal.args),
        body: args,
      }),
    );
  }

  async getProperty(name: string): Promise<Variant> {
    const property = this.property(name);
    const getter = this.propertyHandlers.get(property.wireName)?.get;
    if (!isReadable(property) || getter === undefined) {
      throw new BusError(BusErrorName.AccessDenied, `Property ${name} is write-only`);
    }
    return this.read(property, getter);
  }

  async setProperty(ctx: SignalContext, name: string, value: Variant): Promise<void> {
    const property = this.property(name);
    const setter = this.propertyHandlers.get(property.wireName)?.set;
    if (!isWritable(property) || setter === undefined) {
      throw BusError.propertyReadOnly(`Property ${name} is read-only`);
    }
    const signature = typeToString(property.type);
    if (value.signature !== signature) {
      throw BusError.invalidArgs(`Property ${name} has type '${signature}', got '${value.signature}'`);
    }
    const mismatch = checkValue(property.type, value.value);
    if (mismatch) {
      throw BusError.invalidArgs(`Property ${name}: ${formatMismatch(mismatch)}`);
    }
    await Reflect.apply(setter, this.handlers.properties?.[property.nativeName], [value.value, ctx]);
    await this.notify(ctx, property, value);
  }

  async getAllProperties(): Promise<Map<string, Variant>> {
    const values = new Map<string, Variant>();
    for (const property of this.spec.properties) {
      const getter = this.propertyHandlers.get(property.wireName)?.get;
      if (isReadable(property) && getter !== undefined) {
        values.set(property.wireName, await this.read(property, getter));
      }
    }
    return values;
  }

  async propertyChanged(ctx: SignalContext, name: string): Promise<void> {
    await this.notify(ctx, this.property(name));
  }

  private property(name: string): PropertySpec {
    const property = findProperty(this.spec, name);
    if (property === undefined) {
      throw BusError.unknownProperty(`Unknown property ${name} on interface ${this.spec.name}`);
    }
    return property;
  }

  private async read(property: PropertySpec, getter: () => unknown): Promise<Variant> {
    const value: unknown = await Reflect.apply(getter, this.handlers.properties?.[property.nativeName], []);
    const mismatch = checkValue(property.type, value);
    if (mismatch) {
      throw BusError.failed(`Property ${property.wireName} has an invalid value: ${formatMismatch(mismatch)}`);
    }
    return new Variant(typeToString(property.type), value);
  }

  /** Send PropertiesChanged as the property's policy asks. */
  private async notify(ctx: SignalContext, property: PropertySpec, written?: Variant): Promise<void> {
    const changed = new Map<string, Variant>();
    const invalidated: string[] = [];
    switch (property.changeNotify) {
      case "true": {
        const getter = this.propertyHandlers.get(property.wireName)?.get;
        const value = isReadable(property) && getter !== undefined ? await this.read(property, getter) : written;
        if (value === undefined) return;
        changed.set(property.wireName, value);
        break;
      }
      case "invalidates":
        invalidated.push(property.wireName);
        break;
      case "const":
      case "false":
        return;
    }
    await ctx.transport.send(
      signalMessage({
        path: ctx.path,
        interface: StandardInterface.Properties,
        member: "PropertiesChanged",
        signature: "sa{sv}as",
        body: [this.spec.name, changed, invalidated],
      }),
    );
  }
}

/**
 * Create a dispatcher for one interface.
 *
 * @throws Error when a method has no handler, a readable property no getter,
 * or a writable property no setter
 *
 * @example
 * ```typescript
 * const dispatcher = createDispatcher(LightSpec, {
 *   methods: { toggle: () => (on = !on) },
 *   properties: { brightness: { get: () => level, set: (v: number) => { level = v; } } },
 * });
 * ```
 */
export function createDispatcher(spec: InterfaceSpec, handlers: DispatcherHandlers): InterfaceDispatcher {
  return new Dispatcher(spec, handlers);
}
