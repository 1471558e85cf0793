// Conversion between busbind values and dbus-next values.
//
// dbus-next represents dictionaries as plain objects, byte arrays as Buffers
// and variants as its own Variant class. Conversion is driven by the
// signature.

import * as dbus from "dbus-next";
import { type SingleType, Variant, parseSignature, parseSingleType } from "@busbind/signature";

function keyFromString(type: SingleType, key: string): unknown {
  if (type.kind !== "basic") return key;
  switch (type.code) {
    case "x":
    case "t":
      return BigInt(key);
    case "y":
    case "n":
    case "q":
    case "i":
    case "u":
    case "h":
    case "d":
      return Number(key);
    case "b":
      return key === "true";
    default:
      return key;
  }
}

/** Convert one busbind value to the shape dbus-next marshals. */
export function toDbusNext(type: SingleType, value: unknown): unknown {
  switch (type.kind) {
    case "basic":
      return value;
    case "array": {
      const element = type.element;
      if (value instanceof Uint8Array) return Buffer.from(value);
      return Array.isArray(value) ? value.map((item) => toDbusNext(element, item)) : value;
    }
    case "dict": {
      const valueType = type.value;
      if (!(value instanceof Map)) return value;
      return Object.fromEntries([...value].map(([key, inner]) => [String(key), toDbusNext(valueType, inner)]));
    }
    case "struct": {
      const fields = type.fields;
      return Array.isArray(value)
        ? value.map((field, i) => (i < fields.length ? toDbusNext(fields[i], field) : field))
        : value;
    }
    case "variant":
      if (!(value instanceof Variant)) return value;
      return new dbus.Variant(value.signature, toDbusNext(parseSingleType(value.signature), value.value));
  }
}

/** Convert one value unmarshalled by dbus-next to its busbind shape. */
export function fromDbusNext(type: SingleType, value: unknown): unknown {
  switch (type.kind) {
    case "basic":
      if ((type.code === "x" || type.code === "t") && typeof value === "number") {
        return BigInt(value);
      }
      return value;
    case "array": {
      const element = type.element;
      if (element.kind === "basic" && element.code === "y") {
        if (value instanceof Uint8Array) return Uint8Array.from(value);
        if (Array.isArray(value)) return Uint8Array.from(value, Number);
        return value;
      }
      return Array.isArray(value) ? value.map((item) => fromDbusNext(element, item)) : value;
    }
    case "dict": {
      const { key: keyType, value: valueType } = type;
      if (value instanceof Map) {
        return new Map([...value].map(([key, inner]) => [key, fromDbusNext(valueType, inner)]));
      }
      if (typeof value !== "object" || value === null) return value;
      return new Map(
        Object.entries(value).map(([key, inner]) => [keyFromString(keyType, key), fromDbusNext(valueType, inner)]),
      );
    }
    case "struct": {
      const fields = type.fields;
      return Array.isArray(value)
        ? value.map((field, i) => (i < fields.length ? fromDbusNext(fields[i], field) : field))
        : value;
    }
    case "variant":
      if (!(value instanceof dbus.Variant)) return value;
      return new Variant(value.signature, fromDbusNext(parseSingleType(value.signature), value.value));
  }
}

export function bodyToDbusNext(signature: string, body: readonly unknown[]): unknown[] {
  const types = parseSignature(signature);
  return body.map((value, i) => (i < types.length ? toDbusNext(types[i], value) : value));
}

export function bodyFromDbusNext(signature: string, body: readonly unknown[]): unknown[] {
  const types = parseSignature(signature);
  return body.map((value, i) => (i < types.length ? fromDbusNext(types[i], value) : value));
}
