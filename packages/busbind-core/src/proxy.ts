// Client proxy runtime.
//
// Generated proxies extend ProxyBase; createProxy gives the same operations
// for a spec known only at run time.

import {
  type SingleType,
  Variant,
  checkBody,
  checkValue,
  formatMismatch,
  typeToString,
} from "@busbind/signature";
import {
  type BusTransport,
  CallError,
  StandardInterface,
  methodCall,
} from "@busbind/wire";
import {
  type ArgSpec,
  type InterfaceSpec,
  type MethodSpec,
  type PropertySpec,
  argsSignature,
  findMethod,
  findProperty,
  findSignal,
  isWritable,
} from "@busbind/model";
import { type Caller, TransportCaller } from "./caller.ts";
import type { ClientMiddleware } from "./middleware.ts";
import { log } from "./logging.ts";
import { SignalDecodeError, SignalMatcher, SignalStream } from "./signal.ts";

export interface ProxyOptions {
  /** Bus name of the peer. */
  destination?: string;
  path: string;
  /** Reply timeout in milliseconds. */
  timeoutMs?: number;
  /** Middleware applied to every call, first runs first. */
  middleware?: ClientMiddleware[];
}

/** Default proxy options. Override individual fields as needed. */
export function defaultProxyOptions(): Required<Pick<ProxyOptions, "timeoutMs">> {
  return {
    timeoutMs: 25_000,
  };
}

/**
 * One property change notification, as seen by a subscriber. A
 * `PropertiesChanged` signal that cannot be read, or that carries a value of
 * the wrong type, arrives as `decodeFailed`.
 */
export type PropertyChange<T = unknown> =
  | { kind: "changed"; name: string; value: T }
  | { kind: "invalidated"; name: string }
  | { kind: "decodeFailed"; name: string; error: SignalDecodeError };

type PropertiesChangedArgs = [string, Map<string, Variant>, string[]];

function conforms<T>(outputs: readonly ArgSpec[], value: unknown): value is T {
  if (outputs.length === 0) return value === undefined;
  if (outputs.length === 1) return checkValue(outputs[0].type, value) === null;
  return Array.isArray(value) && checkBody(outputs.map((arg) => arg.type), value) === null;
}

function unwrapVariant(member: string, type: SingleType, value: unknown): unknown {
  const expected = typeToString(type);
  if (!(value instanceof Variant)) {
    throw CallError.valueMismatch(member, "reply does not carry a variant");
  }
  if (value.signature !== expected) {
    throw CallError.typeMismatch(member, expected, value.signature);
  }
  return value.value;
}

function changeDecodeFailed(name: string, error: SignalDecodeError): PropertyChange<never> {
  log.signal("PropertiesChanged: %s", error.message);
  return { kind: "decodeFailed", name, error };
}

/**
 * Base class for interface proxies.
 *
 * Method calls go to the interface itself; properties go through
 * `org.freedesktop.DBus.Properties`. A proxy only borrows its transport.
 */
export class ProxyBase {
  readonly destination: string | undefined;
  readonly path: string;
  readonly timeoutMs: number;
  protected readonly caller: Caller;

  constructor(
    readonly spec: InterfaceSpec,
    protected readonly transport: BusTransport,
    options: ProxyOptions,
  ) {
    const config = { ...defaultProxyOptions(), ...options };
    this.destination = config.destination;
    this.path = config.path;
    this.timeoutMs = config.timeoutMs;
    let caller: Caller = new TransportCaller(transport);
    for (const middleware of config.middleware ?? []) {
      caller = caller.with(middleware);
    }
    this.caller = caller;
  }

  get interfaceName(): string {
    return this.spec.name;
  }

  /**
   * Call a method by wire name.
   *
   * No outputs resolve to undefined, one output to its value, several to a
   * tuple.
   */
  async callMethod<T = unknown>(member: string, args: readonly unknown[] = []): Promise<T> {
    const method = this.methodSpec(member);
    const inputs = method.inputs.map((arg) => arg.type);
    const mismatch = checkBody(inputs, args);
    if (mismatch) {
      throw CallError.valueMismatch(method.wireName, `argument ${formatMismatch(mismatch)}`);
    }

    const body = await this.invoke(
      this.spec.name,
      method.wireName,
      argsSignature(method.inputs),
      args,
      argsSignature(method.outputs),
    );
    const result = method.outputs.length === 0 ? undefined : method.outputs.length === 1 ? body[0] : [...body];
    if (!conforms<T>(method.outputs, result)) {
      throw CallError.valueMismatch(method.wireName, "reply does not match the declared outputs");
    }
    return result;
  }

  async getProperty<T = unknown>(name: string): Promise<T> {
    const property = this.propertySpec(name);
    const [value] = await this.invoke(
      StandardInterface.Properties,
      "Get",
      "ss",
      [this.spec.name, property.wireName],
      "v",
    );
    const inner = unwrapVariant(property.wireName, property.type, value);
    const mismatch = checkValue(property.type, inner);
    if (mismatch) {
      throw CallError.valueMismatch(property.wireName, formatMismatch(mismatch));
    }
    if (!conforms<T>([{ direction: "out", type: property.type }], inner)) {
      throw CallError.valueMismatch(property.wireName, "reply does not match the property type");
    }
    return inner;
  }

  /** @throws CallError `notWritable` for read-only and const properties, without a round trip */
  async setProperty(name: string, value: unknown): Promise<void> {
    const property = this.propertySpec(name);
    if (!isWritable(property)) {
      throw CallError.notWritable(property.wireName);
    }
    const mismatch = checkValue(property.type, value);
    if (mismatch) {
      throw CallError.valueMismatch(property.wireName, formatMismatch(mismatch));
    }
    await this.invoke(
      StandardInterface.Properties,
      "Set",
      "ssv",
      [this.spec.name, property.wireName, new Variant(typeToString(property.type), value)],
      "",
    );
  }

  /** All properties of the interface, by wire name. */
  async getAllProperties(): Promise<Map<string, unknown>> {
    const [dict] = await this.invoke(StandardInterface.Properties, "GetAll", "s", [this.spec.name], "a{sv}");
    const values = new Map<string, unknown>();
    if (!(dict instanceof Map)) return values;
    for (const [name, variant] of dict) {
      if (typeof name !== "string" || !(variant instanceof Variant)) continue;
      const property = findProperty(this.spec, name);
      values.set(name, property ? unwrapVariant(name, property.type, variant) : variant.value);
    }
    return values;
  }

  /** Signals of one member, from this proxy's object path. */
  receiveSignal<T extends readonly unknown[] = readonly unknown[]>(member: string): SignalStream<T> {
    const signal = findSignal(this.spec, member);
    if (signal === undefined) {
      throw new Error(`${this.spec.name} has no signal ${member}`);
    }
    const matcher = new SignalMatcher<T>(
      { interface: this.spec.name, member: signal.wireName, path: this.path },
      argsSignature(signal.args),
      signal.args.map((arg) => arg.name),
    );
    return new SignalStream<T>(this.transport, matcher);
  }

  /**
   * Changes of one property, from `PropertiesChanged`. Yields the new value
   * or, for `invalidates` properties, an invalidation marker.
   */
  async *receivePropertyChanged<T = unknown>(name: string): AsyncGenerator<PropertyChange<T>> {
    const property = this.propertySpec(name);
    const matcher = new SignalMatcher<PropertiesChangedArgs>(
      { interface: StandardInterface.Properties, member: "PropertiesChanged", path: this.path },
      "sa{sv}as",
    );
    for await (const signal of new SignalStream(this.transport, matcher)) {
      const args = signal.args();
      if (!args.ok) {
        yield changeDecodeFailed(property.wireName, args.error);
        continue;
      }
      const [iface, changed, invalidated] = args.value;
      if (iface !== this.spec.name) continue;

      const variant = changed.get(property.wireName);
      if (variant !== undefined) {
        const expected = typeToString(property.type);
        const value: unknown = variant.value;
        if (variant.signature !== expected) {
          yield changeDecodeFailed(
            property.wireName,
            new SignalDecodeError(
              "signatureMismatch",
              "PropertiesChanged",
              expected,
              variant.signature,
              `${property.wireName} has signature '${variant.signature}', expected '${expected}'`,
            ),
          );
        } else if (conforms<T>([{ direction: "out", type: property.type }], value)) {
          yield { kind: "changed", name: property.wireName, value };
        } else {
          const mismatch = checkValue(property.type, value);
          const detail = mismatch ? formatMismatch(mismatch) : "value does not match";
          yield changeDecodeFailed(
            property.wireName,
            new SignalDecodeError("valueMismatch", "PropertiesChanged", expected, variant.signature, `${property.wireName}: ${detail}`),
          );
        }
      } else if (invalidated.includes(property.wireName)) {
        yield { kind: "invalidated", name: property.wireName };
      }
    }
  }

  protected invoke(
    iface: string,
    member: string,
    signature: string,
    body: readonly unknown[],
    replySignature: string,
  ): Promise<readonly unknown[]> {
    return this.caller.call({
      message: methodCall({
        destination: this.destination,
        path: this.path,
        interface: iface,
        member,
        signature,
        body,
      }),
      replySignature,
      timeoutMs: this.timeoutMs,
    });
  }

  private methodSpec(member: string): MethodSpec {
    const method = findMethod(this.spec, member);
    if (method === undefined) {
      throw new Error(`${this.spec.name} has no method ${member}`);
    }
    return method;
  }

  private propertySpec(name: string): PropertySpec {
    const property = findProperty(this.spec, name);
    if (property === undefined) {
      throw new Error(`${this.spec.name} has no property ${name}`);
    }
    return property;
  }
}

/** A proxy for a spec known only at run time. */
export function createProxy(spec: InterfaceSpec, transport: BusTransport, options: ProxyOptions): ProxyBase {
  return new ProxyBase(spec, transport, options);
}
