// TypeScript type text for wire types, following the native value shapes of
// @busbind/signature.

import type { SingleType } from "@busbind/signature";
import type { ArgSpec } from "@busbind/model";

export function tsType(type: SingleType): string {
  switch (type.kind) {
    case "basic":
      switch (type.code) {
        case "x":
        case "t":
          return "bigint";
        case "b":
          return "boolean";
        case "s":
        case "o":
        case "g":
          return "string";
        default:
          return "number";
      }
    case "array":
      if (type.element.kind === "basic" && type.element.code === "y") {
        return "Uint8Array";
      }
      return `${tsType(type.element)}[]`;
    case "dict":
      return `Map<${tsType(type.key)}, ${tsType(type.value)}>`;
    case "struct":
      return `[${type.fields.map(tsType).join(", ")}]`;
    case "variant":
      return "Variant";
  }
}

/** Tuple of an argument list, e.g. `[string, number]`. */
export function tsTupleType(args: readonly ArgSpec[]): string {
  return `[${args.map((arg) => tsType(arg.type)).join(", ")}]`;
}

/** Tuple with element labels, e.g. `[on: boolean, level: number]`. */
export function tsLabeledTupleType(args: readonly ArgSpec[], labels: readonly string[]): string {
  return `[${args.map((arg, i) => `${labels[i]}: ${tsType(arg.type)}`).join(", ")}]`;
}

/** What a call resolves to: nothing, the single output, or a tuple. */
export function tsResultType(outputs: readonly ArgSpec[]): string {
  if (outputs.length === 0) return "void";
  if (outputs.length === 1) return tsType(outputs[0].type);
  return tsTupleType(outputs);
}

export function usesVariant(type: SingleType): boolean {
  switch (type.kind) {
    case "basic":
      return false;
    case "array":
      return usesVariant(type.element);
    case "dict":
      return usesVariant(type.value);
    case "struct":
      return type.fields.some(usesVariant);
    case "variant":
      return true;
  }
}
