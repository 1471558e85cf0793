// Interface model: immutable descriptions of methods, properties and signals.

import { type SingleType, typeToString } from "@busbind/signature";

// ============================================================================
// Members
// ============================================================================

export type Direction = "in" | "out";

export interface ArgSpec {
  readonly name?: string;
  readonly direction: Direction;
  readonly type: SingleType;
}

export interface Annotation {
  readonly name: string;
  readonly value: string;
}

export type PropertyAccess = "read" | "write" | "readwrite";

/**
 * How a property announces changes through `PropertiesChanged`.
 *
 * - `true`: the new value is sent
 * - `invalidates`: only the name is sent, peers re-read it
 * - `const`: never changes, so never announced
 * - `false`: changes are not announced
 */
export type ChangeNotify = "true" | "invalidates" | "const" | "false";

export const EMITS_CHANGED_SIGNAL = "org.freedesktop.DBus.Property.EmitsChangedSignal";

export interface MethodSpec {
  readonly wireName: string;
  readonly nativeName: string;
  readonly inputs: readonly ArgSpec[];
  readonly outputs: readonly ArgSpec[];
  readonly doc?: string;
  readonly annotations: readonly Annotation[];
}

export interface PropertySpec {
  readonly wireName: string;
  readonly nativeName: string;
  readonly type: SingleType;
  readonly access: PropertyAccess;
  readonly changeNotify: ChangeNotify;
  readonly doc?: string;
  readonly annotations: readonly Annotation[];
}

export interface SignalSpec {
  readonly wireName: string;
  readonly nativeName: string;
  readonly args: readonly ArgSpec[];
  readonly doc?: string;
  readonly annotations: readonly Annotation[];
}

export interface InterfaceSpec {
  readonly name: string;
  readonly methods: readonly MethodSpec[];
  readonly properties: readonly PropertySpec[];
  readonly signals: readonly SignalSpec[];
  readonly doc?: string;
  readonly annotations: readonly Annotation[];
}

/** An object path's introspection data. The root node may be unnamed. */
export interface IntrospectionNode {
  readonly name?: string;
  readonly interfaces: readonly InterfaceSpec[];
  readonly children: readonly IntrospectionNode[];
}

// ============================================================================
// Helpers
// ============================================================================

/** Concatenated signature of an argument list. */
export function argsSignature(args: readonly ArgSpec[]): string {
  return args.map((arg) => typeToString(arg.type)).join("");
}

export function isReadable(property: PropertySpec): boolean {
  return property.access !== "write";
}

/** Writable, and not declared constant. */
export function isWritable(property: PropertySpec): boolean {
  return property.access !== "read" && property.changeNotify !== "const";
}

export function parseChangeNotify(value: string): ChangeNotify | undefined {
  switch (value) {
    case "true":
    case "invalidates":
    case "const":
    case "false":
      return value;
    default:
      return undefined;
  }
}

export function findMethod(spec: InterfaceSpec, wireName: string): MethodSpec | undefined {
  return spec.methods.find((m) => m.wireName === wireName);
}

export function findProperty(spec: InterfaceSpec, wireName: string): PropertySpec | undefined {
  return spec.properties.find((p) => p.wireName === wireName);
}

export function findSignal(spec: InterfaceSpec, wireName: string): SignalSpec | undefined {
  return spec.signals.find((s) => s.wireName === wireName);
}

function freezeMembers<T extends { annotations: readonly Annotation[] }>(member: T): Readonly<T> {
  Object.freeze(member.annotations);
  return Object.freeze(member);
}

/** Freeze a freshly built interface and everything it owns. */
export function freezeInterface(spec: InterfaceSpec): InterfaceSpec {
  for (const method of spec.methods) {
    Object.freeze(method.inputs);
    Object.freeze(method.outputs);
    method.inputs.forEach((arg) => Object.freeze(arg));
    method.outputs.forEach((arg) => Object.freeze(arg));
    freezeMembers(method);
  }
  for (const signal of spec.signals) {
    Object.freeze(signal.args);
    signal.args.forEach((arg) => Object.freeze(arg));
    freezeMembers(signal);
  }
  spec.properties.forEach((property) => freezeMembers(property));
  Object.freeze(spec.methods);
  Object.freeze(spec.properties);
  Object.freeze(spec.signals);
  return freezeMembers(spec);
}

export function freezeNode(node: IntrospectionNode): IntrospectionNode {
  node.interfaces.forEach((spec) => freezeInterface(spec));
  node.children.forEach((child) => freezeNode(child));
  Object.freeze(node.interfaces);
  Object.freeze(node.children);
  return Object.freeze(node);
}
