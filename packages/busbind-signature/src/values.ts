// Native value shapes for signature types.
//
// | signature        | value                  |
// | ---------------- | ---------------------- |
// | y n q i u h d    | number                 |
// | x t              | bigint                 |
// | b                | boolean                |
// | s o g            | string                 |
// | ay               | Uint8Array             |
// | aT               | T[]                    |
// | a{KV}            | Map<K, V>              |
// | (T1T2…)          | [T1, T2, …]            |
// | v                | Variant                |

import {
  type SingleType,
  type TypeSignature,
  isValidSignature,
  parseSingleType,
  typeToString,
} from "./signature.ts";
import { SignatureError } from "./errors.ts";

/** A value tagged with its own single-type signature. */
export class Variant<T = unknown> {
  constructor(
    public readonly signature: string,
    public readonly value: T,
  ) {}
}

const INTEGER_RANGES: Record<string, [number, number]> = {
  y: [0, 0xff],
  n: [-0x8000, 0x7fff],
  q: [0, 0xffff],
  i: [-0x80000000, 0x7fffffff],
  u: [0, 0xffffffff],
  h: [0, 0xffffffff],
};

const BIGINT_RANGES: Record<string, [bigint, bigint]> = {
  x: [-(1n << 63n), (1n << 63n) - 1n],
  t: [0n, (1n << 64n) - 1n],
};

const OBJECT_PATH = /^\/$|^(\/[A-Za-z0-9_]+)+$/;

/** Check whether `path` is a valid object path. */
export function isObjectPath(path: string): boolean {
  return OBJECT_PATH.test(path);
}

/** A value that failed to match its expected type. */
export interface ValueMismatch {
  /** Location inside the value, e.g. `[1].key`. */
  path: string;
  /** The type expected at that location. */
  expected: string;
  message: string;
}

function mismatch(path: string, type: SingleType, message: string): ValueMismatch {
  return { path: path || "<root>", expected: typeToString(type), message };
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return `array(${value.length})`;
  if (value instanceof Map) return `map(${value.size})`;
  if (value instanceof Uint8Array) return `bytes(${value.length})`;
  if (value instanceof Variant) return `variant<${value.signature}>`;
  return typeof value;
}

/**
 * Check a value against a single type.
 *
 * @returns the first mismatch found, or null if the value conforms
 */
export function checkValue(type: SingleType, value: unknown, path = ""): ValueMismatch | null {
  switch (type.kind) {
    case "basic": {
      const code = type.code;
      const intRange = INTEGER_RANGES[code];
      if (intRange) {
        if (typeof value !== "number" || !Number.isInteger(value)) {
          return mismatch(path, type, `expected integer, got ${describe(value)}`);
        }
        if (value < intRange[0] || value > intRange[1]) {
          return mismatch(path, type, `${value} is out of range`);
        }
        return null;
      }
      const bigRange = BIGINT_RANGES[code];
      if (bigRange) {
        if (typeof value !== "bigint") {
          return mismatch(path, type, `expected bigint, got ${describe(value)}`);
        }
        if (value < bigRange[0] || value > bigRange[1]) {
          return mismatch(path, type, `${value} is out of range`);
        }
        return null;
      }
      switch (code) {
        case "d":
          return typeof value === "number"
            ? null
            : mismatch(path, type, `expected number, got ${describe(value)}`);
        case "b":
          return typeof value === "boolean"
            ? null
            : mismatch(path, type, `expected boolean, got ${describe(value)}`);
        case "s":
          if (typeof value !== "string") {
            return mismatch(path, type, `expected string, got ${describe(value)}`);
          }
          return value.includes("\0") ? mismatch(path, type, "string contains NUL") : null;
        case "o":
          if (typeof value !== "string") {
            return mismatch(path, type, `expected object path, got ${describe(value)}`);
          }
          return isObjectPath(value) ? null : mismatch(path, type, `invalid object path "${value}"`);
        case "g":
          if (typeof value !== "string") {
            return mismatch(path, type, `expected signature, got ${describe(value)}`);
          }
          return isValidSignature(value) ? null : mismatch(path, type, `invalid signature "${value}"`);
      }
      return mismatch(path, type, `unsupported type code ${code}`);
    }

    case "array": {
      if (type.element.kind === "basic" && type.element.code === "y") {
        return value instanceof Uint8Array
          ? null
          : mismatch(path, type, `expected Uint8Array, got ${describe(value)}`);
      }
      if (!Array.isArray(value)) {
        return mismatch(path, type, `expected array, got ${describe(value)}`);
      }
      for (let i = 0; i < value.length; i++) {
        const inner = checkValue(type.element, value[i], `${path}[${i}]`);
        if (inner) return inner;
      }
      return null;
    }

    case "dict": {
      if (!(value instanceof Map)) {
        return mismatch(path, type, `expected Map, got ${describe(value)}`);
      }
      for (const [key, entry] of value) {
        const keyMismatch = checkValue(type.key, key, `${path}{key}`);
        if (keyMismatch) return keyMismatch;
        const inner = checkValue(type.value, entry, `${path}{${String(key)}}`);
        if (inner) return inner;
      }
      return null;
    }

    case "struct": {
      if (!Array.isArray(value)) {
        return mismatch(path, type, `expected tuple, got ${describe(value)}`);
      }
      if (value.length !== type.fields.length) {
        return mismatch(
          path,
          type,
          `expected ${type.fields.length} fields, got ${value.length}`,
        );
      }
      for (let i = 0; i < type.fields.length; i++) {
        const inner = checkValue(type.fields[i], value[i], `${path}.${i}`);
        if (inner) return inner;
      }
      return null;
    }

    case "variant": {
      if (!(value instanceof Variant)) {
        return mismatch(path, type, `expected Variant, got ${describe(value)}`);
      }
      let inner: SingleType;
      try {
        inner = parseSingleType(value.signature);
      } catch (e) {
        if (e instanceof SignatureError) {
          return mismatch(path, type, `variant carries invalid signature: ${e.message}`);
        }
        throw e;
      }
      return checkValue(inner, value.value, `${path}<${value.signature}>`);
    }
  }
}

/** Type guard over `checkValue`. */
export function isValueOf<T>(type: SingleType, value: unknown): value is T {
  return checkValue(type, value) === null;
}

/**
 * Check a whole message body against a signature.
 *
 * @returns the first mismatch, or null if every value conforms
 */
export function checkBody(signature: TypeSignature, body: readonly unknown[]): ValueMismatch | null {
  if (body.length !== signature.length) {
    return {
      path: "<body>",
      expected: signature.map(typeToString).join(""),
      message: `expected ${signature.length} values, got ${body.length}`,
    };
  }
  for (let i = 0; i < signature.length; i++) {
    const inner = checkValue(signature[i], body[i], `[${i}]`);
    if (inner) return inner;
  }
  return null;
}

/** Type guard over `checkBody`. */
export function isBodyOf<T extends readonly unknown[]>(
  signature: TypeSignature,
  body: readonly unknown[],
): body is T {
  return checkBody(signature, body) === null;
}

/** Format a mismatch as one line. */
export function formatMismatch(m: ValueMismatch): string {
  return `${m.path}: ${m.message} (expected '${m.expected}')`;
}
