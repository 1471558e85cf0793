// Identifiers in generated code.
//
// Native names are camelCase forms of wire names. Words TypeScript reserves
// and names ProxyBase already uses get a trailing underscore.

import { readFileSync } from "node:fs";
import type { ArgSpec } from "@busbind/model";
import { toCamelCase, toWireName } from "@busbind/model";

function loadReservedWords(): ReadonlySet<string> {
  const parsed: unknown = JSON.parse(readFileSync(new URL("./reserved_words.json", import.meta.url), "utf8"));
  if (!Array.isArray(parsed)) {
    throw new Error("reserved_words.json must hold an array");
  }
  const words = parsed.filter((word): word is string => typeof word === "string");
  if (words.length !== parsed.length) {
    throw new Error("reserved_words.json must hold only strings");
  }
  return new Set(words);
}

export const RESERVED_WORDS: ReadonlySet<string> = loadReservedWords();

/** Members of ProxyBase and Object that a generated proxy must not shadow. */
export const PROXY_MEMBERS: ReadonlySet<string> = new Set([
  "constructor",
  "toString",
  "valueOf",
  "spec",
  "path",
  "destination",
  "timeoutMs",
  "caller",
  "transport",
  "interfaceName",
  "callMethod",
  "getProperty",
  "setProperty",
  "getAllProperties",
  "receiveSignal",
  "receivePropertyChanged",
  "invoke",
]);

/** Turn arbitrary text into an identifier that is not a reserved word. */
export function safeIdentifier(text: string): string {
  let id = text.replace(/[^A-Za-z0-9_]/g, "_");
  if (id === "") return "_";
  if (/^[0-9]/.test(id)) id = `_${id}`;
  return RESERVED_WORDS.has(id) ? `${id}_` : id;
}

/**
 * Native name for a wire member name.
 *
 * @example
 * ```typescript
 * nativeName("GetMachineId"); // "getMachineId"
 * nativeName("Delete"); // "delete_"
 * ```
 */
export function nativeName(wireName: string): string {
  return safeIdentifier(toCamelCase(wireName));
}

export function pascalCase(native: string): string {
  return native.charAt(0).toUpperCase() + native.slice(1);
}

/** Type name of an interface: its last element in PascalCase. */
export function typeNameOf(interfaceName: string): string {
  return toWireName(interfaceName.slice(interfaceName.lastIndexOf(".") + 1));
}

/** Hands out names unique within one scope. */
export class NameScope {
  private readonly used: Set<string>;

  constructor(taken: Iterable<string> = []) {
    this.used = new Set(taken);
  }

  /** The name itself, or the name with underscores appended until unused. */
  claim(name: string): string {
    let candidate = name;
    while (this.used.has(candidate)) {
      candidate += "_";
    }
    this.used.add(candidate);
    return candidate;
  }
}

/** Parameter names for an argument list; `ctx` is kept for the handler context. */
export function paramNames(args: readonly ArgSpec[]): string[] {
  const scope = new NameScope(["ctx"]);
  return args.map((arg, i) => scope.claim(arg.name === undefined ? `arg${i}` : safeIdentifier(toCamelCase(arg.name))));
}
