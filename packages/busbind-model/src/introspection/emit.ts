// Introspection XML output.
//
// Output is deterministic: methods, then signals, then properties, each in
// declaration order, two spaces of indentation per level.

import { typeToString } from "@busbind/signature";
import {
  type Annotation,
  type ArgSpec,
  EMITS_CHANGED_SIGNAL,
  type InterfaceSpec,
  type IntrospectionNode,
  type PropertySpec,
} from "../model.ts";

export const INTROSPECTION_DOCTYPE =
  '<!DOCTYPE node PUBLIC "-//freedesktop//DTD D-BUS Object Introspection 1.0//EN"\n' +
  ' "http://www.freedesktop.org/standards/dbus/1.0/introspect.dtd">';

/** Receives emitted text as it is produced. */
export interface XmlSink {
  write(text: string): void;
}

class Writer {
  private readonly chunks: string[] = [];

  constructor(private readonly sink?: XmlSink) {}

  line(level: number, text: string): void {
    const out = `${"  ".repeat(level)}${text}\n`;
    this.chunks.push(out);
    this.sink?.write(out);
  }

  raw(text: string): void {
    this.chunks.push(text);
    this.sink?.write(text);
  }

  toString(): string {
    return this.chunks.join("");
  }
}

export function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/\t/g, "&#9;")
    .replace(/\n/g, "&#10;")
    .replace(/\r/g, "&#13;");
}

function commentSafe(text: string): string {
  let safe = text;
  while (safe.includes("--")) {
    safe = safe.replace(/--/g, "- -");
  }
  return safe;
}

function writeDoc(w: Writer, level: number, doc: string | undefined): void {
  if (doc === undefined || doc === "") return;
  const indent = "  ".repeat(level);
  w.raw(`${indent}<!--\n`);
  for (const line of commentSafe(doc).split("\n")) {
    w.raw(line === "" ? "\n" : `${indent} ${line}\n`);
  }
  w.raw(`${indent} -->\n`);
}

function writeAnnotations(w: Writer, level: number, annotations: readonly Annotation[]): void {
  for (const a of annotations) {
    w.line(level, `<annotation name="${escapeAttribute(a.name)}" value="${escapeAttribute(a.value)}"/>`);
  }
}

function writeArg(w: Writer, level: number, arg: ArgSpec, withDirection: boolean): void {
  const name = arg.name === undefined ? "" : ` name="${escapeAttribute(arg.name)}"`;
  const direction = withDirection ? ` direction="${arg.direction}"` : "";
  w.line(level, `<arg${name} type="${escapeAttribute(typeToString(arg.type))}"${direction}/>`);
}

function propertyAnnotations(property: PropertySpec): Annotation[] {
  const notify =
    property.changeNotify === "true" ? [] : [{ name: EMITS_CHANGED_SIGNAL, value: property.changeNotify }];
  return [...notify, ...property.annotations];
}

function writeInterface(w: Writer, spec: InterfaceSpec, level: number): void {
  writeDoc(w, level, spec.doc);
  w.line(level, `<interface name="${escapeAttribute(spec.name)}">`);
  writeAnnotations(w, level + 1, spec.annotations);

  for (const method of spec.methods) {
    writeDoc(w, level + 1, method.doc);
    w.line(level + 1, `<method name="${escapeAttribute(method.wireName)}">`);
    for (const arg of [...method.inputs, ...method.outputs]) {
      writeArg(w, level + 2, arg, true);
    }
    writeAnnotations(w, level + 2, method.annotations);
    w.line(level + 1, "</method>");
  }

  for (const signal of spec.signals) {
    writeDoc(w, level + 1, signal.doc);
    w.line(level + 1, `<signal name="${escapeAttribute(signal.wireName)}">`);
    for (const arg of signal.args) {
      writeArg(w, level + 2, arg, false);
    }
    writeAnnotations(w, level + 2, signal.annotations);
    w.line(level + 1, "</signal>");
  }

  for (const property of spec.properties) {
    writeDoc(w, level + 1, property.doc);
    const open = `<property name="${escapeAttribute(property.wireName)}" type="${escapeAttribute(
      typeToString(property.type),
    )}" access="${property.access}"`;
    const annotations = propertyAnnotations(property);
    if (annotations.length === 0) {
      w.line(level + 1, `${open}/>`);
    } else {
      w.line(level + 1, `${open}>`);
      writeAnnotations(w, level + 2, annotations);
      w.line(level + 1, "</property>");
    }
  }

  w.line(level, "</interface>");
}

/**
 * Emit one interface element.
 *
 * @param sink - Also receives the text as it is produced
 * @param level - Indentation level of the `<interface>` element
 */
export function emitInterface(spec: InterfaceSpec, sink?: XmlSink, level = 0): string {
  const w = new Writer(sink);
  writeInterface(w, spec, level);
  return w.toString();
}

function writeNode(w: Writer, node: IntrospectionNode, level: number): void {
  const name = node.name === undefined ? "" : ` name="${escapeAttribute(node.name)}"`;
  if (level > 0 && node.interfaces.length === 0 && node.children.length === 0) {
    w.line(level, `<node${name}/>`);
    return;
  }
  w.line(level, `<node${name}>`);
  for (const spec of node.interfaces) {
    writeInterface(w, spec, level + 1);
  }
  for (const child of node.children) {
    writeNode(w, child, level + 1);
  }
  w.line(level, "</node>");
}

/** Emit a complete introspection document, DOCTYPE included. */
export function emitIntrospection(node: IntrospectionNode, sink?: XmlSink): string {
  const w = new Writer(sink);
  w.raw(`${INTROSPECTION_DOCTYPE}\n`);
  writeNode(w, node, 0);
  return w.toString();
}
