// Native ⇄ wire naming.
//
// Native identifiers are snake_case or camelCase; wire member names are
// PascalCase. Explicit renames bypass all of this and are stored verbatim.

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Maximum length of interface and member names. */
export const MAX_NAME_LENGTH = 255;

/**
 * Default wire name of a native identifier: PascalCase with underscores
 * removed.
 *
 * @example
 * ```typescript
 * toWireName("a_test"); // "ATest"
 * toWireName("strU32"); // "StrU32"
 * ```
 */
export function toWireName(native: string): string {
  return native
    .split("_")
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join("");
}

function isUpper(ch: string | undefined): boolean {
  return ch !== undefined && ch !== ch.toLowerCase() && ch === ch.toUpperCase();
}

function isLowerOrDigit(ch: string | undefined): boolean {
  return ch !== undefined && (/[0-9]/.test(ch) || (ch !== ch.toUpperCase() && ch === ch.toLowerCase()));
}

/**
 * snake_case form of a wire name. Acronyms stay together:
 * `CheckVEC` becomes `check_vec`, `ATest` becomes `a_test`.
 */
export function toSnakeCase(wire: string): string {
  let out = "";
  for (let i = 0; i < wire.length; i++) {
    const ch = wire[i];
    if (isUpper(ch)) {
      const prev = wire[i - 1];
      const next = wire[i + 1];
      if (i > 0 && prev !== "_" && (isLowerOrDigit(prev) || (isUpper(prev) && isLowerOrDigit(next)))) {
        out += "_";
      }
      out += ch.toLowerCase();
    } else {
      out += ch;
    }
  }
  return out;
}

/** camelCase form of a wire name, e.g. `GetMachineId` becomes `getMachineId`. */
export function toCamelCase(wire: string): string {
  return toSnakeCase(wire).replace(/_+([a-z0-9])/g, (_, ch: string) => ch.toUpperCase());
}

export function isValidIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

/** Method, signal and property names. */
export function isValidMemberName(name: string): boolean {
  return name.length <= MAX_NAME_LENGTH && IDENTIFIER.test(name);
}

/** Dotted interface names with at least two elements. */
export function isValidInterfaceName(name: string): boolean {
  if (name.length === 0 || name.length > MAX_NAME_LENGTH) return false;
  const elements = name.split(".");
  return elements.length >= 2 && elements.every((element) => IDENTIFIER.test(element));
}
