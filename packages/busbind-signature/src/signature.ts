// D-Bus type signature grammar.
//
// A signature is a sequence of complete types:
// - Basic types (y b n q i u x t d h s o g)
// - Arrays (a + one complete type)
// - Dictionaries (a{ + basic key + complete value + })
// - Structs (( + one or more complete types + ))
// - Variants (v), whose inner type travels with the value

import { SignatureError } from "./errors.ts";

// ============================================================================
// Limits
// ============================================================================

/** Maximum length of a signature string. */
export const MAX_SIGNATURE_LENGTH = 255;

/** Maximum nesting of arrays. */
export const MAX_ARRAY_DEPTH = 32;

/** Maximum nesting of structs and dict entries. */
export const MAX_STRUCT_DEPTH = 32;

/** Maximum combined nesting of arrays, structs and dict entries. */
export const MAX_TOTAL_DEPTH = 64;

// ============================================================================
// Type Nodes
// ============================================================================

/** Type codes of the basic (non-container) types. */
export type BasicCode =
  | "y" // byte
  | "b" // boolean
  | "n" // int16
  | "q" // uint16
  | "i" // int32
  | "u" // uint32
  | "x" // int64
  | "t" // uint64
  | "d" // double
  | "h" // unix fd index
  | "s" // string
  | "o" // object path
  | "g"; // signature

const BASIC_CODES: ReadonlySet<string> = new Set([
  "y", "b", "n", "q", "i", "u", "x", "t", "d", "h", "s", "o", "g",
]);

export interface BasicType {
  kind: "basic";
  code: BasicCode;
}

export interface ArrayType {
  kind: "array";
  element: SingleType;
}

/** `a{kv}`: an array of dict entries, represented as one node. */
export interface DictType {
  kind: "dict";
  key: BasicType;
  value: SingleType;
}

export interface StructType {
  kind: "struct";
  /** Field types in order. Never empty. */
  fields: readonly SingleType[];
}

export interface VariantType {
  kind: "variant";
}

/** One complete type. */
export type SingleType = BasicType | ArrayType | DictType | StructType | VariantType;

/** A full signature: zero or more complete types. */
export type TypeSignature = readonly SingleType[];

export type SignatureResult =
  | { ok: true; value: TypeSignature }
  | { ok: false; error: SignatureError };

export function isBasicCode(code: string): code is BasicCode {
  return BASIC_CODES.has(code);
}

export function basic(code: BasicCode): BasicType {
  return { kind: "basic", code };
}

// ============================================================================
// Parsing
// ============================================================================

class SignatureScanner {
  private pos = 0;
  private arrayDepth = 0;
  private structDepth = 0;

  constructor(private readonly text: string) {}

  get done(): boolean {
    return this.pos >= this.text.length;
  }

  /** Parse one complete type starting at the current position. */
  single(): SingleType {
    if (this.done) {
      throw SignatureError.unexpectedEnd(this.text, this.pos);
    }
    const start = this.pos;
    const c = this.text[this.pos++];

    if (isBasicCode(c)) {
      return basic(c);
    }

    switch (c) {
      case "v":
        return { kind: "variant" };
      case "a":
        return this.array(start);
      case "(":
        return this.struct(start);
      case ")":
      case "}":
        throw SignatureError.unmatchedContainer(this.text, start);
      case "{":
        // Dict entries only appear directly inside an array.
        throw SignatureError.invalidDictEntry(this.text, start, "dict entry outside of an array");
      default:
        throw SignatureError.unknownTypeCode(this.text, start, c);
    }
  }

  private enter(kind: "array" | "struct", at: number): void {
    if (kind === "array") {
      this.arrayDepth++;
    } else {
      this.structDepth++;
    }
    if (
      this.arrayDepth > MAX_ARRAY_DEPTH ||
      this.structDepth > MAX_STRUCT_DEPTH ||
      this.arrayDepth + this.structDepth > MAX_TOTAL_DEPTH
    ) {
      throw SignatureError.nestingTooDeep(this.text, at);
    }
  }

  private leave(kind: "array" | "struct"): void {
    if (kind === "array") {
      this.arrayDepth--;
    } else {
      this.structDepth--;
    }
  }

  private array(start: number): ArrayType | DictType {
    this.enter("array", start);
    let result: ArrayType | DictType;
    if (this.text[this.pos] === "{") {
      result = this.dictEntry();
    } else {
      result = { kind: "array", element: this.single() };
    }
    this.leave("array");
    return result;
  }

  private dictEntry(): DictType {
    const open = this.pos++;
    this.enter("struct", open);

    if (this.done) {
      throw SignatureError.unexpectedEnd(this.text, this.pos);
    }
    const keyAt = this.pos;
    const key = this.single();
    if (key.kind !== "basic") {
      throw SignatureError.invalidDictEntry(this.text, keyAt, "dict entry key must be a basic type");
    }
    if (this.text[this.pos] === "}") {
      throw SignatureError.invalidDictEntry(this.text, this.pos, "dict entry needs a value type");
    }
    const value = this.single();

    if (this.done) {
      throw SignatureError.unmatchedContainer(this.text, open);
    }
    if (this.text[this.pos] !== "}") {
      if (this.text[this.pos] === ")") {
        throw SignatureError.unmatchedContainer(this.text, this.pos);
      }
      throw SignatureError.invalidDictEntry(this.text, this.pos, "dict entry must hold exactly two types");
    }
    this.pos++;
    this.leave("struct");
    return { kind: "dict", key, value };
  }

  private struct(start: number): StructType {
    this.enter("struct", start);
    const fields: SingleType[] = [];
    while (true) {
      if (this.done) {
        throw SignatureError.unmatchedContainer(this.text, start);
      }
      const c = this.text[this.pos];
      if (c === ")") {
        if (fields.length === 0) {
          throw SignatureError.emptyStruct(this.text, start);
        }
        this.pos++;
        break;
      }
      if (c === "}") {
        throw SignatureError.unmatchedContainer(this.text, this.pos);
      }
      fields.push(this.single());
    }
    this.leave("struct");
    return { kind: "struct", fields };
  }
}

/**
 * Parse a signature into its complete types.
 *
 * @throws SignatureError on the first fault; no partial value is returned
 */
export function parseSignature(text: string): TypeSignature {
  if (text.length > MAX_SIGNATURE_LENGTH) {
    throw SignatureError.tooLong(text);
  }
  const scanner = new SignatureScanner(text);
  const types: SingleType[] = [];
  while (!scanner.done) {
    types.push(scanner.single());
  }
  return types;
}

/**
 * Parse a signature, returning a result instead of throwing.
 */
export function tryParseSignature(text: string): SignatureResult {
  try {
    return { ok: true, value: parseSignature(text) };
  } catch (e) {
    if (e instanceof SignatureError) {
      return { ok: false, error: e };
    }
    throw e;
  }
}

/**
 * Parse a signature that must hold exactly one complete type
 * (property types, variant contents).
 */
export function parseSingleType(text: string): SingleType {
  const types = parseSignature(text);
  if (types.length !== 1) {
    throw SignatureError.notSingleType(text, types.length);
  }
  return types[0];
}

/** Check whether `text` is a well-formed signature. */
export function isValidSignature(text: string): boolean {
  return tryParseSignature(text).ok;
}

// ============================================================================
// Formatting
// ============================================================================

/** Render one complete type back to signature text. */
export function typeToString(type: SingleType): string {
  switch (type.kind) {
    case "basic":
      return type.code;
    case "variant":
      return "v";
    case "array":
      return `a${typeToString(type.element)}`;
    case "dict":
      return `a{${type.key.code}${typeToString(type.value)}}`;
    case "struct":
      return `(${type.fields.map(typeToString).join("")})`;
  }
}

/** Render a full signature; the inverse of `parseSignature`. */
export function signatureToString(signature: TypeSignature): string {
  return signature.map(typeToString).join("");
}
