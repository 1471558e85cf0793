// Binding generator: TypeScript source for one interface.
//
// Each interface becomes an embedded defineInterface description, a proxy
// class, a handlers type and a dispatcher factory. Output is deterministic
// and already indented; nothing formats it afterwards.

import { typeToString } from "@busbind/signature";
import {
  type ArgConfig,
  type ArgSpec,
  type InterfaceConfig,
  type InterfaceSpec,
  type MethodConfig,
  type MethodSpec,
  type PropertyAccess,
  type PropertyConfig,
  type PropertySpec,
  type SignalConfig,
  type SignalSpec,
  isValidIdentifier,
  toWireName,
} from "@busbind/model";
import { NameScope, PROXY_MEMBERS, nativeName, paramNames, pascalCase, typeNameOf } from "./naming.ts";
import { tsLabeledTupleType, tsResultType, tsType } from "./types.ts";

export interface GenerateOptions {
  /** Default destination of the proxy. */
  service?: string;
  /** Default object path of the proxy. */
  path?: string;
  /** Defaults to the last element of the interface name. */
  typeName?: string;
}

// ============================================================================
// Naming Plan
// ============================================================================

export interface MethodPlan {
  readonly spec: MethodSpec;
  readonly native: string;
  readonly member: string;
  readonly params: readonly string[];
}

export interface PropertyPlan {
  readonly spec: PropertySpec;
  readonly native: string;
  /** Const properties are generated read-only. */
  readonly access: PropertyAccess;
  readonly getter?: string;
  readonly setter?: string;
  readonly changes?: string;
}

export interface SignalPlan {
  readonly spec: SignalSpec;
  readonly native: string;
  readonly member: string;
}

/** Every name the generated code uses for one interface. */
export interface InterfacePlan {
  readonly spec: InterfaceSpec;
  readonly typeName: string;
  readonly methods: readonly MethodPlan[];
  readonly properties: readonly PropertyPlan[];
  readonly signals: readonly SignalPlan[];
}

export function planInterface(spec: InterfaceSpec, typeName = typeNameOf(spec.name)): InterfacePlan {
  const members = new NameScope(PROXY_MEMBERS);
  const methodNatives = new NameScope();
  const propertyNatives = new NameScope();
  const signalNatives = new NameScope();

  const methods = spec.methods.map((method): MethodPlan => {
    const native = methodNatives.claim(nativeName(method.wireName));
    return { spec: method, native, member: members.claim(native), params: paramNames(method.inputs) };
  });

  const properties = spec.properties.map((property): PropertyPlan => {
    const native = propertyNatives.claim(nativeName(property.wireName));
    const access = property.changeNotify === "const" ? "read" : property.access;
    const readable = access !== "write";
    const notifies = property.changeNotify === "true" || property.changeNotify === "invalidates";
    return {
      spec: property,
      native,
      access,
      getter: readable ? members.claim(native) : undefined,
      setter: access !== "read" ? members.claim(`set${pascalCase(native)}`) : undefined,
      changes: readable && notifies ? members.claim(`receive${pascalCase(native)}Changed`) : undefined,
    };
  });

  const signals = spec.signals.map((signal): SignalPlan => {
    const native = signalNatives.claim(nativeName(signal.wireName));
    return { spec: signal, native, member: members.claim(`receive${pascalCase(native)}`) };
  });

  return { spec, typeName, methods, properties, signals };
}

// ============================================================================
// Interface Description
// ============================================================================

function argConfig(arg: ArgSpec): ArgConfig {
  const type = typeToString(arg.type);
  return arg.name !== undefined && isValidIdentifier(arg.name) ? { name: arg.name, type } : type;
}

function annotationsConfig(spec: { annotations: InterfaceSpec["annotations"] }): Record<string, string> | undefined {
  if (spec.annotations.length === 0) return undefined;
  return Object.fromEntries(spec.annotations.map((a): [string, string] => [a.name, a.value]));
}

function renameOf(native: string, wireName: string): string | undefined {
  return toWireName(native) === wireName ? undefined : wireName;
}

function methodConfig(plan: MethodPlan): MethodConfig {
  const { spec } = plan;
  const config: MethodConfig = {};
  if (spec.inputs.length > 0) config.in = spec.inputs.map(argConfig);
  if (spec.outputs.length > 0) config.out = spec.outputs.map(argConfig);
  config.rename = renameOf(plan.native, spec.wireName);
  config.doc = spec.doc;
  config.annotations = annotationsConfig(spec);
  return config;
}

function propertyConfig(plan: PropertyPlan): PropertyConfig {
  const { spec } = plan;
  return {
    type: typeToString(spec.type),
    access: plan.access === "read" ? undefined : plan.access,
    emitsChanged: spec.changeNotify === "true" ? undefined : spec.changeNotify,
    rename: renameOf(plan.native, spec.wireName),
    doc: spec.doc,
    annotations: annotationsConfig(spec),
  };
}

function signalConfig(plan: SignalPlan): SignalConfig {
  const { spec } = plan;
  return {
    args: spec.args.length > 0 ? spec.args.map(argConfig) : undefined,
    rename: renameOf(plan.native, spec.wireName),
    doc: spec.doc,
    annotations: annotationsConfig(spec),
  };
}

function recordOf<P extends { native: string }, C>(plans: readonly P[], config: (plan: P) => C): Record<string, C> | undefined {
  if (plans.length === 0) return undefined;
  return Object.fromEntries(plans.map((plan): [string, C] => [plan.native, config(plan)]));
}

/** The structured description the generated module passes to defineInterface. */
export function interfaceConfig(plan: InterfacePlan): InterfaceConfig {
  const { spec } = plan;
  return {
    name: spec.name,
    doc: spec.doc,
    annotations: annotationsConfig(spec),
    methods: recordOf(plan.methods, methodConfig),
    properties: recordOf(plan.properties, propertyConfig),
    signals: recordOf(plan.signals, signalConfig),
  };
}

// ============================================================================
// Source Text
// ============================================================================

function pad(level: number): string {
  return "  ".repeat(level);
}

function printKey(key: string): string {
  return isValidIdentifier(key) ? key : JSON.stringify(key);
}

function entriesOf(value: object): Array<[string, unknown]> {
  return Object.entries(value).filter(([, inner]) => inner !== undefined);
}

/** Strings, and arrays or objects made only of strings, print on one line. */
function isFlat(value: unknown): boolean {
  if (typeof value === "string") return true;
  if (Array.isArray(value)) return value.every(isFlat);
  if (typeof value === "object" && value !== null) {
    return entriesOf(value).every(([, inner]) => typeof inner === "string");
  }
  return false;
}

/**
 * Print a description value as a TypeScript literal.
 *
 * Undefined members are left out.
 */
export function printLiteral(value: unknown, level = 0): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  if (Array.isArray(value)) {
    if (value.every(isFlat)) {
      return `[${value.map((item) => printLiteral(item, level)).join(", ")}]`;
    }
    const items = value.map((item) => `${pad(level + 1)}${printLiteral(item, level + 1)},\n`);
    return `[\n${items.join("")}${pad(level)}]`;
  }
  if (typeof value === "object" && value !== null) {
    const entries = entriesOf(value);
    if (entries.length === 0) return "{}";
    if (isFlat(value)) {
      return `{ ${entries.map(([key, inner]) => `${printKey(key)}: ${printLiteral(inner, level)}`).join(", ")} }`;
    }
    const lines = entries.map(([key, inner]) => `${pad(level + 1)}${printKey(key)}: ${printLiteral(inner, level + 1)},\n`);
    return `{\n${lines.join("")}${pad(level)}}`;
  }
  throw new Error(`cannot print ${typeof value} as a literal`);
}

function docComment(doc: string | undefined, level: number): string[] {
  if (doc === undefined) return [];
  const lines = doc.replace(/\*\//g, "*\\/").split("\n");
  if (lines.length === 1) return [`${pad(level)}/** ${lines[0]} */`];
  return [`${pad(level)}/**`, ...lines.map((line) => `${pad(level)} *${line ? ` ${line}` : ""}`), `${pad(level)} */`];
}

function maybePromise(type: string): string {
  return `${type} | Promise<${type}>`;
}

function constructorLines(plan: InterfacePlan, options: GenerateOptions): string[] {
  const defaults: string[] = [];
  if (options.service !== undefined) defaults.push(`destination: ${JSON.stringify(options.service)}`);
  if (options.path !== undefined) defaults.push(`path: ${JSON.stringify(options.path)}`);
  const spec = `${plan.typeName}Spec`;
  if (defaults.length === 0) {
    return [
      `  constructor(transport: BusTransport, options: ProxyOptions) {`,
      `    super(${spec}, transport, options);`,
      `  }`,
    ];
  }
  const optionsType = options.path === undefined ? "ProxyOptions" : "Partial<ProxyOptions> = {}";
  return [
    `  constructor(transport: BusTransport, options: ${optionsType}) {`,
    `    super(${spec}, transport, { ${defaults.join(", ")}, ...options });`,
    `  }`,
  ];
}

function proxyMembers(plan: InterfacePlan): string[][] {
  const members: string[][] = [];

  for (const method of plan.methods) {
    const { spec } = method;
    const params = spec.inputs.map((arg, i) => `${method.params[i]}: ${tsType(arg.type)}`).join(", ");
    const result = tsResultType(spec.outputs);
    const args = method.params.length > 0 ? `, [${method.params.join(", ")}]` : "";
    members.push([
      ...docComment(spec.doc, 1),
      `  ${method.member}(${params}): Promise<${result}> {`,
      `    return this.callMethod<${result}>(${JSON.stringify(spec.wireName)}${args});`,
      `  }`,
    ]);
  }

  for (const property of plan.properties) {
    const { spec } = property;
    const type = tsType(spec.type);
    const wire = JSON.stringify(spec.wireName);
    if (property.getter !== undefined) {
      members.push([
        ...docComment(spec.doc, 1),
        `  ${property.getter}(): Promise<${type}> {`,
        `    return this.getProperty<${type}>(${wire});`,
        `  }`,
      ]);
    }
    if (property.setter !== undefined) {
      members.push([
        ...(property.getter === undefined ? docComment(spec.doc, 1) : []),
        `  ${property.setter}(value: ${type}): Promise<void> {`,
        `    return this.setProperty(${wire}, value);`,
        `  }`,
      ]);
    }
    if (property.changes !== undefined) {
      members.push([
        `  ${property.changes}(): AsyncGenerator<PropertyChange<${type}>> {`,
        `    return this.receivePropertyChanged<${type}>(${wire});`,
        `  }`,
      ]);
    }
  }

  for (const signal of plan.signals) {
    const { spec } = signal;
    const tuple = tsLabeledTupleType(spec.args, paramNames(spec.args));
    members.push([
      ...docComment(spec.doc, 1),
      `  ${signal.member}(): SignalStream<${tuple}> {`,
      `    return this.receiveSignal<${tuple}>(${JSON.stringify(spec.wireName)});`,
      `  }`,
    ]);
  }

  return members;
}

function handlersLines(plan: InterfacePlan): string[] {
  const name = `${plan.typeName}Handlers`;
  if (plan.methods.length === 0 && plan.properties.length === 0) {
    return [`export type ${name} = Record<string, never>;`];
  }

  const lines = [`export type ${name} = {`];
  if (plan.methods.length > 0) {
    lines.push("  methods: {");
    for (const method of plan.methods) {
      const params = method.spec.inputs.map((arg, i) => `${method.params[i]}: ${tsType(arg.type)}, `).join("");
      lines.push(`    ${method.native}(${params}ctx: MethodContext): ${maybePromise(tsResultType(method.spec.outputs))};`);
    }
    lines.push("  };");
  }
  if (plan.properties.length > 0) {
    lines.push("  properties: {");
    for (const property of plan.properties) {
      const type = tsType(property.spec.type);
      lines.push(`    ${property.native}: {`);
      if (property.access !== "write") {
        lines.push(`      get(): ${maybePromise(type)};`);
      }
      if (property.access !== "read") {
        lines.push(`      set(value: ${type}, ctx: SignalContext): ${maybePromise("void")};`);
      }
      lines.push("    };");
    }
    lines.push("  };");
  }
  lines.push("};");
  return lines;
}

/** Generate the TypeScript block for one interface. */
export function generateInterface(spec: InterfaceSpec, options: GenerateOptions = {}): string {
  return generatePlanned(planInterface(spec, options.typeName), options);
}

export function generatePlanned(plan: InterfacePlan, options: GenerateOptions = {}): string {
  const { typeName } = plan;
  const members = proxyMembers(plan);

  const lines = [
    ...docComment(plan.spec.doc, 0),
    `export const ${typeName}Spec: InterfaceSpec = defineInterface(${printLiteral(interfaceConfig(plan))});`,
    "",
    `export class ${typeName}Proxy extends ProxyBase {`,
    ...constructorLines(plan, options),
    ...members.flatMap((member) => ["", ...member]),
    "}",
    "",
    ...handlersLines(plan),
    "",
    `export function create${typeName}Dispatcher(handlers: ${typeName}Handlers): InterfaceDispatcher {`,
    `  return createDispatcher(${typeName}Spec, handlers);`,
    "}",
  ];
  return `${lines.join("\n")}\n`;
}
