// Call and bus error types.
//
// CallError is what a proxy caller sees; BusError is what a handler throws to
// send a named error reply.

/** Standard `org.freedesktop.DBus.Error.*` names. */
export const BusErrorName = {
  Failed: "org.freedesktop.DBus.Error.Failed",
  NoReply: "org.freedesktop.DBus.Error.NoReply",
  ServiceUnknown: "org.freedesktop.DBus.Error.ServiceUnknown",
  UnknownObject: "org.freedesktop.DBus.Error.UnknownObject",
  UnknownInterface: "org.freedesktop.DBus.Error.UnknownInterface",
  UnknownMethod: "org.freedesktop.DBus.Error.UnknownMethod",
  UnknownProperty: "org.freedesktop.DBus.Error.UnknownProperty",
  PropertyReadOnly: "org.freedesktop.DBus.Error.PropertyReadOnly",
  InvalidArgs: "org.freedesktop.DBus.Error.InvalidArgs",
  NotSupported: "org.freedesktop.DBus.Error.NotSupported",
  AccessDenied: "org.freedesktop.DBus.Error.AccessDenied",
} as const;

/**
 * A named D-Bus error.
 *
 * Throw one from a method handler to reply with that error name; plain
 * errors become `org.freedesktop.DBus.Error.Failed`.
 */
export class BusError extends Error {
  constructor(
    public readonly errorName: string,
    message: string,
  ) {
    super(message);
    this.name = "BusError";
  }

  static failed(message: string): BusError {
    return new BusError(BusErrorName.Failed, message);
  }

  static invalidArgs(message: string): BusError {
    return new BusError(BusErrorName.InvalidArgs, message);
  }

  static unknownMethod(message: string): BusError {
    return new BusError(BusErrorName.UnknownMethod, message);
  }

  static unknownProperty(message: string): BusError {
    return new BusError(BusErrorName.UnknownProperty, message);
  }

  static propertyReadOnly(message: string): BusError {
    return new BusError(BusErrorName.PropertyReadOnly, message);
  }
}

export type CallErrorKind = "remote" | "typeMismatch" | "transport" | "timeout" | "notWritable";

/**
 * A failed remote call, surfaced to the caller of a proxy method.
 *
 * Call errors affect only the call that raised them, never the transport.
 */
export class CallError extends Error {
  constructor(
    public readonly kind: CallErrorKind,
    message: string,
    /** The remote error name, for `remote`. */
    public readonly errorName?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CallError";
  }

  static remote(errorName: string, message: string): CallError {
    return new CallError("remote", message, errorName);
  }

  static typeMismatch(member: string, expected: string, actual: string): CallError {
    return new CallError(
      "typeMismatch",
      `${member}: reply signature '${actual}' does not match expected '${expected}'`,
    );
  }

  /** Arguments or reply values that do not fit their signature. */
  static valueMismatch(member: string, detail: string): CallError {
    return new CallError("typeMismatch", `${member}: ${detail}`);
  }

  static transport(cause: unknown): CallError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new CallError("transport", `transport failure: ${detail}`, undefined, { cause });
  }

  static timeout(member: string, timeoutMs: number): CallError {
    return new CallError("timeout", `${member}: no reply within ${timeoutMs}ms`, BusErrorName.NoReply);
  }

  static notWritable(property: string): CallError {
    return new CallError("notWritable", `property ${property} is not writable`);
  }

  isRemote(): boolean {
    return this.kind === "remote";
  }
}

// ============================================================================
// Error Domains
// ============================================================================

/** Declaration of one error in a domain. */
export interface ErrorVariant {
  /** Full error name, used verbatim instead of `prefix.Variant`. */
  name?: string;
}

/**
 * A family of named errors sharing a prefix.
 *
 * @example
 * ```typescript
 * const Errors = errorDomain("org.example.Shop", {
 *   OutOfStock: {},
 *   Closed: { name: "org.example.Closed" },
 * });
 * throw Errors.create("OutOfStock", "no more widgets");
 * ```
 */
export interface ErrorDomain<V extends string> {
  readonly prefix: string;
  /** Error name of each variant. */
  readonly names: ReadonlyMap<V, string>;
  create(variant: V, message: string): BusError;
  /** Find which variant an error carries, if any. */
  variantOf(error: unknown): V | undefined;
}

export function errorDomain<V extends string>(
  prefix: string,
  variants: Record<V, ErrorVariant>,
): ErrorDomain<V> {
  const names = new Map<V, string>();
  const byName = new Map<string, V>();
  for (const variant of Object.keys(variants).filter((k): k is V => k in variants)) {
    const name = variants[variant].name ?? `${prefix}.${variant}`;
    names.set(variant, name);
    byName.set(name, variant);
  }

  const nameOf = (variant: V): string => {
    const name = names.get(variant);
    if (name === undefined) {
      throw new Error(`unknown error variant ${variant} in ${prefix}`);
    }
    return name;
  };

  return {
    prefix,
    names,
    create(variant, message) {
      return new BusError(nameOf(variant), message);
    },
    variantOf(error) {
      if (error instanceof BusError) return byName.get(error.errorName);
      if (error instanceof CallError && error.errorName !== undefined) {
        return byName.get(error.errorName);
      }
      return undefined;
    },
  };
}
