// Client-side middleware types.
//
// Middleware intercepts outgoing method calls before they are sent and
// observes their outcome, for logging, argument rewriting or access checks.

/**
 * Typed key for middleware state stored in `Extensions`.
 *
 * @example
 * ```typescript
 * const START = new ExtensionKey<number>("start");
 * ctx.extensions.set(START, Date.now());
 * const start = ctx.extensions.get(START); // number | undefined
 * ```
 */
export class ExtensionKey<T> {
  private readonly values = new WeakMap<Extensions, T>();

  constructor(public readonly description: string) {}

  /** @internal */
  read(owner: Extensions): T | undefined {
    return this.values.get(owner);
  }

  /** @internal */
  has(owner: Extensions): boolean {
    return this.values.has(owner);
  }

  /** @internal */
  write(owner: Extensions, value: T): void {
    this.values.set(owner, value);
  }

  /** @internal */
  remove(owner: Extensions): boolean {
    return this.values.delete(owner);
  }
}

/**
 * Per-call storage shared by the pre and post hooks of every middleware.
 */
export class Extensions {
  set<T>(key: ExtensionKey<T>, value: T): void {
    key.write(this, value);
  }

  get<T>(key: ExtensionKey<T>): T | undefined {
    return key.read(this);
  }

  has<T>(key: ExtensionKey<T>): boolean {
    return key.has(this);
  }

  delete<T>(key: ExtensionKey<T>): boolean {
    return key.remove(this);
  }
}

export interface ClientContext {
  extensions: Extensions;
}

/**
 * An outgoing method call as middleware sees it.
 */
export interface CallRequest {
  /** Interface-qualified member, e.g. `org.example.Light.Toggle`. */
  readonly method: string;
  readonly destination?: string;
  readonly path: string;
  /** Message body. Middleware may replace values before the call is sent. */
  args: unknown[];
}

export type CallOutcome =
  | { ok: true; value: readonly unknown[] }
  | { ok: false; error: Error };

export type RejectionCode =
  | "unauthenticated"
  | "permission-denied"
  | "rate-limited"
  | "invalid-request"
  | "internal"
  | string;

/** Returned by a pre hook to abort a call. */
export interface Rejection {
  code: RejectionCode;
  message: string;
}

/** Error thrown when middleware rejects a call. */
export class RejectionError extends Error {
  public readonly code: RejectionCode;

  constructor(rejection: Rejection) {
    super(rejection.message);
    this.name = "RejectionError";
    this.code = rejection.code;
  }

  static from(rejection: Rejection): RejectionError {
    return new RejectionError(rejection);
  }
}

/**
 * Client middleware.
 *
 * @example
 * ```typescript
 * const readOnly: ClientMiddleware = {
 *   pre(ctx, request) {
 *     if (request.method.endsWith(".Set")) {
 *       return { code: "permission-denied", message: "read-only session" };
 *     }
 *   },
 * };
 * ```
 */
export interface ClientMiddleware {
  /**
   * Called before the call is sent. May rewrite `request.args`, or return a
   * Rejection to abort the call.
   */
  pre?(ctx: ClientContext, request: CallRequest): Promise<Rejection | void> | Rejection | void;

  /** Called with the outcome. Cannot change it. */
  post?(ctx: ClientContext, request: CallRequest, outcome: CallOutcome): Promise<void> | void;
}
