// Introspection XML input.
//
// Recognises node, interface, method, signal, property, arg and annotation.
// Unknown elements are skipped with their subtrees, unknown attributes are
// ignored. A comment directly before an element becomes its doc.

import { SaxesParser, type SaxesTagPlain } from "saxes";
import { type SingleType, SignatureError, parseSingleType } from "@busbind/signature";
import { XmlParseError } from "../errors.ts";
import {
  type Annotation,
  type ArgSpec,
  type ChangeNotify,
  type Direction,
  EMITS_CHANGED_SIGNAL,
  type InterfaceSpec,
  type IntrospectionNode,
  type MethodSpec,
  type PropertyAccess,
  type PropertySpec,
  type SignalSpec,
  freezeNode,
  parseChangeNotify,
} from "../model.ts";
import { isValidInterfaceName, isValidMemberName, toCamelCase } from "../naming.ts";

// Mutable shapes while the document is open.

interface NodeDraft {
  kind: "node";
  name?: string;
  interfaces: InterfaceSpec[];
  children: IntrospectionNode[];
}

interface InterfaceDraft {
  kind: "interface";
  name: string;
  doc?: string;
  methods: MethodSpec[];
  properties: PropertySpec[];
  signals: SignalSpec[];
  annotations: Annotation[];
}

interface MemberDraft {
  kind: "method" | "signal";
  name: string;
  doc?: string;
  args: ArgSpec[];
  annotations: Annotation[];
}

interface PropertyDraft {
  kind: "property";
  name: string;
  doc?: string;
  type: SingleType;
  access: PropertyAccess;
  annotations: Annotation[];
}

/** Elements whose subtree is ignored. */
interface Skipped {
  kind: "skip";
}

type Frame = NodeDraft | InterfaceDraft | MemberDraft | PropertyDraft | Skipped;

/**
 * Normalise comment text into doc text: blank edge lines dropped, common
 * indentation removed, trailing whitespace trimmed.
 */
export function normalizeDoc(comment: string): string | undefined {
  const lines = comment.split(/\r?\n/).map((line) => line.trimEnd());
  while (lines.length > 0 && lines[0] === "") lines.shift();
  while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  if (lines.length === 0) return undefined;
  const indent = Math.min(
    ...lines.filter((line) => line !== "").map((line) => line.length - line.trimStart().length),
  );
  return lines.map((line) => line.slice(indent)).join("\n");
}

class IntrospectionReader {
  private readonly parser = new SaxesParser();
  private readonly stack: Frame[] = [];
  private pendingDoc: string | undefined;
  private root: NodeDraft | undefined;

  constructor() {
    this.parser.on("error", (err) => {
      throw XmlParseError.malformed(err.message, this.parser.line, this.parser.column);
    });
    this.parser.on("comment", (text) => {
      this.pendingDoc = normalizeDoc(text);
    });
    this.parser.on("text", (text) => {
      if (text.trim() !== "") this.pendingDoc = undefined;
    });
    this.parser.on("opentag", (tag) => {
      const doc = this.pendingDoc;
      this.pendingDoc = undefined;
      this.open(tag, doc);
    });
    this.parser.on("closetag", () => {
      this.pendingDoc = undefined;
      this.close();
    });
  }

  read(xml: string): IntrospectionNode {
    this.parser.write(xml).close();
    if (this.root === undefined) {
      throw XmlParseError.malformed("document has no root element", this.parser.line, this.parser.column);
    }
    return freezeNode(this.root);
  }

  private fail(make: (line: number, column: number) => XmlParseError): never {
    throw make(this.parser.line, this.parser.column);
  }

  private required(tag: SaxesTagPlain, attribute: string): string {
    const value = tag.attributes[attribute];
    if (value === undefined) {
      return this.fail((l, c) => XmlParseError.missingAttribute(tag.name, attribute, l, c));
    }
    return value;
  }

  private checkedName(tag: SaxesTagPlain, valid: (name: string) => boolean): string {
    const value = this.required(tag, "name");
    if (!valid(value)) {
      return this.fail((l, c) => XmlParseError.invalidValue(tag.name, "name", value, l, c));
    }
    return value;
  }

  private signature(tag: SaxesTagPlain, attribute: string): SingleType {
    const value = this.required(tag, attribute);
    try {
      return parseSingleType(value);
    } catch (e) {
      if (e instanceof SignatureError) {
        return this.fail((l, c) => XmlParseError.invalidValue(tag.name, attribute, value, l, c, e.message));
      }
      throw e;
    }
  }

  private open(tag: SaxesTagPlain, doc: string | undefined): void {
    const parent = this.stack[this.stack.length - 1];

    if (parent === undefined) {
      if (tag.name !== "node") {
        this.fail((l, c) => XmlParseError.unexpectedElement(tag.name, l, c));
      }
      this.root = { kind: "node", name: tag.attributes.name, interfaces: [], children: [] };
      this.stack.push(this.root);
      return;
    }

    this.stack.push(this.frameFor(tag, parent, doc));
  }

  private frameFor(tag: SaxesTagPlain, parent: Frame, doc: string | undefined): Frame {
    switch (parent.kind) {
      case "node":
        if (tag.name === "interface") {
          return {
            kind: "interface",
            name: this.checkedName(tag, isValidInterfaceName),
            doc,
            methods: [],
            properties: [],
            signals: [],
            annotations: [],
          };
        }
        if (tag.name === "node") {
          return { kind: "node", name: this.required(tag, "name"), interfaces: [], children: [] };
        }
        break;

      case "interface":
        if (tag.name === "method" || tag.name === "signal") {
          return { kind: tag.name, name: this.checkedName(tag, isValidMemberName), doc, args: [], annotations: [] };
        }
        if (tag.name === "property") {
          return {
            kind: "property",
            name: this.checkedName(tag, isValidMemberName),
            doc,
            type: this.signature(tag, "type"),
            access: this.access(tag),
            annotations: [],
          };
        }
        if (tag.name === "annotation") {
          this.addAnnotation(parent.annotations, tag);
          return { kind: "skip" };
        }
        break;

      case "method":
      case "signal":
        if (tag.name === "arg") {
          parent.args.push(this.arg(tag, parent.kind));
          return { kind: "skip" };
        }
        if (tag.name === "annotation") {
          this.addAnnotation(parent.annotations, tag);
          return { kind: "skip" };
        }
        break;

      case "property":
        if (tag.name === "annotation") {
          this.addAnnotation(parent.annotations, tag);
          return { kind: "skip" };
        }
        break;

      case "skip":
        break;
    }
    return { kind: "skip" };
  }

  private access(tag: SaxesTagPlain): PropertyAccess {
    const value = this.required(tag, "access");
    if (value === "read" || value === "write" || value === "readwrite") {
      return value;
    }
    return this.fail((l, c) => XmlParseError.invalidValue("property", "access", value, l, c));
  }

  private arg(tag: SaxesTagPlain, owner: "method" | "signal"): ArgSpec {
    const type = this.signature(tag, "type");
    const value = tag.attributes.direction;
    let direction: Direction = "in";
    if (value === "out" && owner === "method") {
      direction = "out";
    } else if (value !== undefined && value !== "in") {
      this.fail((l, c) => XmlParseError.invalidValue(`${owner} arg`, "direction", value, l, c));
    }
    const name = tag.attributes.name;
    return name === undefined ? { direction, type } : { name, direction, type };
  }

  /** An element carries each annotation name at most once. */
  private addAnnotation(annotations: Annotation[], tag: SaxesTagPlain): void {
    const name = this.required(tag, "name");
    if (annotations.some((a) => a.name === name)) {
      this.fail((l, c) => XmlParseError.invalidValue("annotation", "name", name, l, c, "duplicate annotation"));
    }
    annotations.push({ name, value: this.required(tag, "value") });
  }

  private close(): void {
    const frame = this.stack.pop();
    const parent = this.stack[this.stack.length - 1];
    if (frame === undefined || parent === undefined) return;

    switch (frame.kind) {
      case "node":
        if (parent.kind === "node") {
          parent.children.push({ name: frame.name, interfaces: frame.interfaces, children: frame.children });
        }
        return;

      case "interface":
        if (parent.kind === "node") {
          parent.interfaces.push({
            name: frame.name,
            methods: frame.methods,
            properties: frame.properties,
            signals: frame.signals,
            doc: frame.doc,
            annotations: frame.annotations,
          });
        }
        return;

      case "method":
        if (parent.kind === "interface") {
          parent.methods.push({
            wireName: frame.name,
            nativeName: toCamelCase(frame.name),
            inputs: frame.args.filter((arg) => arg.direction === "in"),
            outputs: frame.args.filter((arg) => arg.direction === "out"),
            doc: frame.doc,
            annotations: frame.annotations,
          });
        }
        return;

      case "signal":
        if (parent.kind === "interface") {
          parent.signals.push({
            wireName: frame.name,
            nativeName: toCamelCase(frame.name),
            args: frame.args,
            doc: frame.doc,
            annotations: frame.annotations,
          });
        }
        return;

      case "property":
        if (parent.kind === "interface") {
          parent.properties.push(this.property(frame));
        }
        return;

      case "skip":
        return;
    }
  }

  private property(frame: PropertyDraft): PropertySpec {
    let changeNotify: ChangeNotify = "true";
    const annotations: Annotation[] = [];
    for (const annotation of frame.annotations) {
      if (annotation.name !== EMITS_CHANGED_SIGNAL) {
        annotations.push(annotation);
        continue;
      }
      const parsed = parseChangeNotify(annotation.value);
      if (parsed === undefined) {
        return this.fail((l, c) => XmlParseError.invalidValue("annotation", "value", annotation.value, l, c));
      }
      changeNotify = parsed;
    }
    return {
      wireName: frame.name,
      nativeName: toCamelCase(frame.name),
      type: frame.type,
      access: frame.access,
      changeNotify,
      doc: frame.doc,
      annotations,
    };
  }
}

/**
 * Parse an introspection document.
 *
 * @throws XmlParseError on malformed XML, a missing required attribute, an
 * invalid interface or member name, a repeated annotation, an invalid
 * signature or access/direction value, or a root other than `<node>`
 */
export function parseIntrospection(xml: string | Uint8Array): IntrospectionNode {
  const text = typeof xml === "string" ? xml : new TextDecoder().decode(xml);
  return new IntrospectionReader().read(text);
}
