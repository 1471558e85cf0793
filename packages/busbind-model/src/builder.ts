// Interface builder.
//
// Interfaces are described with ordinary calls (or one structured config
// value) and validated once, at build().

import { type SingleType, SignatureError, parseSingleType } from "@busbind/signature";
import { ModelValidationError, type ModelValidationErrorKind } from "./errors.ts";
import {
  type Annotation,
  type ArgSpec,
  type ChangeNotify,
  type Direction,
  EMITS_CHANGED_SIGNAL,
  type InterfaceSpec,
  type MethodSpec,
  type PropertyAccess,
  type PropertySpec,
  type SignalSpec,
  freezeInterface,
  parseChangeNotify,
} from "./model.ts";
import { isValidIdentifier, isValidInterfaceName, isValidMemberName, toWireName } from "./naming.ts";

// ============================================================================
// Configuration
// ============================================================================

/** An argument: a signature string, or a named argument. */
export type ArgConfig = string | { name?: string; type: string; direction?: Direction };

/** Member annotations, in declaration order. */
export type AnnotationConfig = Record<string, string>;

export interface MethodConfig {
  in?: readonly ArgConfig[];
  /** One output, or several (returned to clients as one tuple). */
  out?: ArgConfig | readonly ArgConfig[];
  /** Wire name, used verbatim. */
  rename?: string;
  doc?: string;
  annotations?: AnnotationConfig;
}

export interface PropertyConfig {
  type: string;
  /** Defaults to `read`. */
  access?: PropertyAccess;
  /** Defaults to `true`. */
  emitsChanged?: ChangeNotify;
  rename?: string;
  doc?: string;
  annotations?: AnnotationConfig;
}

export type AccessorOptions = Omit<PropertyConfig, "type" | "access">;

export interface SignalConfig {
  args?: readonly ArgConfig[];
  rename?: string;
  doc?: string;
  annotations?: AnnotationConfig;
}

export interface InterfaceConfig {
  name: string;
  doc?: string;
  annotations?: AnnotationConfig;
  methods?: Record<string, MethodConfig>;
  properties?: Record<string, PropertyConfig>;
  signals?: Record<string, SignalConfig>;
}

interface PendingProperty {
  native: string;
  types: string[];
  readable: boolean;
  writable: boolean;
  options: AccessorOptions;
}

// ============================================================================
// Builder
// ============================================================================

/**
 * Builds an immutable `InterfaceSpec`.
 *
 * @example
 * ```typescript
 * const spec = new InterfaceBuilder("org.example.Light")
 *   .method("toggle", { out: "b" })
 *   .getter("brightness", "u")
 *   .setter("set_brightness", "u")
 *   .signal("changed", { args: [{ name: "on", type: "b" }] })
 *   .build();
 * ```
 */
export class InterfaceBuilder {
  private readonly methods: Array<[string, MethodConfig]> = [];
  private readonly properties: PendingProperty[] = [];
  private readonly signals: Array<[string, SignalConfig]> = [];

  constructor(
    private readonly name: string,
    private readonly options: { doc?: string; annotations?: AnnotationConfig } = {},
  ) {}

  method(native: string, config: MethodConfig = {}): this {
    this.methods.push([native, config]);
    return this;
  }

  property(native: string, config: PropertyConfig): this {
    const access = config.access ?? "read";
    this.properties.push({
      native,
      types: [config.type],
      readable: access !== "write",
      writable: access !== "read",
      options: config,
    });
    return this;
  }

  /** Declare a readable property, or make a declared setter's property readable. */
  getter(native: string, type: string, options: AccessorOptions = {}): this {
    return this.accessor(native, type, "read", options);
  }

  /**
   * Declare a writable property. A `set_` or `set` prefix is dropped to find
   * the property, so `set_brightness` pairs with the `brightness` getter.
   */
  setter(native: string, type: string, options: AccessorOptions = {}): this {
    return this.accessor(propertyOfSetter(native), type, "write", options);
  }

  signal(native: string, config: SignalConfig = {}): this {
    this.signals.push([native, config]);
    return this;
  }

  /** @throws ModelValidationError naming the offending member */
  build(): InterfaceSpec {
    const fail = (kind: ModelValidationErrorKind, member: string | undefined, detail: string): never => {
      throw new ModelValidationError(kind, this.name, member, detail);
    };

    if (!isValidInterfaceName(this.name)) {
      fail("invalidInterfaceName", undefined, `invalid interface name "${this.name}"`);
    }

    const methods = this.methods.map(([native, config]) => buildMethod(native, config, fail));
    const properties = this.properties.map((pending) => buildProperty(pending, fail));
    const signals = this.signals.map(([native, config]) => buildSignal(native, config, fail));

    checkUnique(methods, "method", fail);
    checkUnique(properties, "property", fail);
    checkUnique(signals, "signal", fail);

    return freezeInterface({
      name: this.name,
      methods,
      properties,
      signals,
      doc: this.options.doc,
      annotations: toAnnotations(this.options.annotations),
    });
  }

  private accessor(native: string, type: string, role: "read" | "write", options: AccessorOptions): this {
    const existing = this.properties.find((p) => p.native === native && (role === "read" ? !p.readable : !p.writable));
    if (existing) {
      existing.types.push(type);
      existing.readable ||= role === "read";
      existing.writable ||= role === "write";
      existing.options = { ...existing.options, ...options };
      return this;
    }
    this.properties.push({
      native,
      types: [type],
      readable: role === "read",
      writable: role === "write",
      options,
    });
    return this;
  }
}

/** Build an interface from one structured description. */
export function defineInterface(config: InterfaceConfig): InterfaceSpec {
  const builder = new InterfaceBuilder(config.name, { doc: config.doc, annotations: config.annotations });
  for (const [native, method] of Object.entries(config.methods ?? {})) {
    builder.method(native, method);
  }
  for (const [native, property] of Object.entries(config.properties ?? {})) {
    builder.property(native, property);
  }
  for (const [native, signal] of Object.entries(config.signals ?? {})) {
    builder.signal(native, signal);
  }
  return builder.build();
}

// ============================================================================
// Validation
// ============================================================================

type Fail = (kind: ModelValidationErrorKind, member: string | undefined, detail: string) => never;

function propertyOfSetter(native: string): string {
  if (native.startsWith("set_")) return native.slice(4);
  if (/^set[A-Z]/.test(native)) return native.charAt(3).toLowerCase() + native.slice(4);
  return native;
}

function toAnnotations(config: AnnotationConfig | undefined): Annotation[] {
  return Object.entries(config ?? {}).map(([name, value]) => ({ name, value }));
}

function wireNameOf(native: string, rename: string | undefined, fail: Fail): string {
  if (!isValidIdentifier(native)) {
    fail("invalidIdentifier", native, `invalid identifier "${native}"`);
  }
  const wireName = rename ?? toWireName(native);
  if (!isValidMemberName(wireName)) {
    fail("invalidIdentifier", native, `invalid member name "${wireName}"`);
  }
  return wireName;
}

function parseType(text: string, member: string, fail: Fail): SingleType {
  if (!text) {
    return fail("missingType", member, "argument has no type");
  }
  try {
    return parseSingleType(text);
  } catch (e) {
    if (e instanceof SignatureError) {
      return fail("invalidSignature", member, e.message);
    }
    throw e;
  }
}

function buildArg(config: ArgConfig, direction: Direction, member: string, fail: Fail): ArgSpec {
  const normalized = typeof config === "string" ? { type: config } : config;
  const declared = typeof config === "string" ? undefined : config.direction;
  if (declared !== undefined && declared !== direction) {
    fail(
      "conflictingDirection",
      member,
      `argument ${normalized.name ?? normalized.type} is declared "${declared}" in the ${direction} list`,
    );
  }
  const name = typeof config === "string" ? undefined : config.name;
  if (name !== undefined && !isValidIdentifier(name)) {
    fail("invalidIdentifier", member, `invalid argument name "${name}"`);
  }
  const arg: ArgSpec = { direction, type: parseType(normalized.type, member, fail) };
  return name === undefined ? arg : { name, ...arg };
}

function buildMethod(native: string, config: MethodConfig, fail: Fail): MethodSpec {
  const wireName = wireNameOf(native, config.rename, fail);
  const out: readonly ArgConfig[] = config.out === undefined ? [] : isArgList(config.out) ? config.out : [config.out];
  return {
    wireName,
    nativeName: native,
    inputs: (config.in ?? []).map((arg) => buildArg(arg, "in", native, fail)),
    outputs: out.map((arg) => buildArg(arg, "out", native, fail)),
    doc: config.doc,
    annotations: toAnnotations(config.annotations),
  };
}

function isArgList(out: ArgConfig | readonly ArgConfig[]): out is readonly ArgConfig[] {
  return Array.isArray(out);
}

function buildProperty(pending: PendingProperty, fail: Fail): PropertySpec {
  const { native, options } = pending;
  const wireName = wireNameOf(native, options.rename, fail);
  const [type, ...others] = pending.types;
  const conflicting = others.find((other) => other !== type);
  if (conflicting !== undefined) {
    fail("conflictingPropertyType", native, `getter type "${type}" differs from setter type "${conflicting}"`);
  }

  const annotations = toAnnotations(options.annotations);
  let changeNotify = options.emitsChanged;
  const explicit = annotations.find((a) => a.name === EMITS_CHANGED_SIGNAL);
  if (explicit) {
    const parsed = parseChangeNotify(explicit.value);
    if (parsed === undefined) {
      fail("invalidAnnotation", native, `invalid ${EMITS_CHANGED_SIGNAL} value "${explicit.value}"`);
    }
    changeNotify ??= parsed;
  }

  const access: PropertyAccess = pending.readable && pending.writable ? "readwrite" : pending.readable ? "read" : "write";
  if ((changeNotify ?? "true") === "const" && access !== "read") {
    fail("constSetter", native, "a const property cannot be writable");
  }

  return {
    wireName,
    nativeName: native,
    type: parseType(type, native, fail),
    access,
    changeNotify: changeNotify ?? "true",
    doc: options.doc,
    annotations: annotations.filter((a) => a.name !== EMITS_CHANGED_SIGNAL),
  };
}

function buildSignal(native: string, config: SignalConfig, fail: Fail): SignalSpec {
  const wireName = wireNameOf(native, config.rename, fail);
  const args = (config.args ?? []).map((arg) => {
    if (typeof arg !== "string" && arg.direction === "out") {
      fail("signalOutArg", native, `signal argument ${arg.name ?? arg.type} cannot be an output`);
    }
    return buildArg(arg, "in", native, fail);
  });
  return {
    wireName,
    nativeName: native,
    args,
    doc: config.doc,
    annotations: toAnnotations(config.annotations),
  };
}

function checkUnique(members: ReadonlyArray<{ wireName: string; nativeName: string }>, what: string, fail: Fail): void {
  const seen = new Set<string>();
  for (const member of members) {
    if (seen.has(member.wireName)) {
      fail("duplicateName", member.nativeName, `duplicate ${what} name "${member.wireName}"`);
    }
    seen.add(member.wireName);
  }
}
