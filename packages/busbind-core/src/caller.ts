// Caller abstraction.
//
// Proxies make every method call through a Caller, so middleware can be
// composed with with().

import { checkBody, formatMismatch, parseSignature } from "@busbind/signature";
import {
  type BusTransport,
  CallError,
  type MethodCallMessage,
  type ReplyMessage,
} from "@busbind/wire";
import type { CallOutcome, CallRequest, ClientContext, ClientMiddleware } from "./middleware.ts";
import { Extensions, RejectionError } from "./middleware.ts";
import { log } from "./logging.ts";

export interface CallerRequest {
  /** The method call to send. Its body must match its signature. */
  message: MethodCallMessage;

  /** Signature the reply body must carry. */
  replySignature: string;

  /** Reply timeout in milliseconds. */
  timeoutMs?: number;
}

/**
 * Makes method calls and returns the checked reply body.
 *
 * Rejects with `CallError` for error replies, reply mismatches, timeouts and
 * transport failures.
 */
export interface Caller {
  call(request: CallerRequest): Promise<readonly unknown[]>;

  /**
   * Wrap this caller with middleware. The first middleware added runs first
   * on pre, and last on post.
   */
  with(middleware: ClientMiddleware): Caller;
}

function describeMember(message: MethodCallMessage): string {
  return message.interface === undefined ? message.member : `${message.interface}.${message.member}`;
}

function errorText(reply: ReplyMessage): string {
  const [first] = reply.body;
  return typeof first === "string" ? first : reply.type === "error" ? reply.errorName : "";
}

/** Caller backed directly by a transport. */
export class TransportCaller implements Caller {
  constructor(private readonly transport: BusTransport) {}

  async call(request: CallerRequest): Promise<readonly unknown[]> {
    const member = describeMember(request.message);
    const { signature, body } = request.message;
    const argMismatch = checkBody(parseSignature(signature), body);
    if (argMismatch) {
      throw CallError.valueMismatch(member, `argument ${formatMismatch(argMismatch)}`);
    }

    let reply: ReplyMessage;
    try {
      reply = await this.transport.call(request.message, { timeoutMs: request.timeoutMs });
    } catch (e) {
      if (e instanceof CallError) throw e;
      throw CallError.transport(e);
    }

    if (reply.type === "error") {
      throw CallError.remote(reply.errorName, errorText(reply));
    }
    if (reply.signature !== request.replySignature) {
      throw CallError.typeMismatch(member, request.replySignature, reply.signature);
    }
    const mismatch = checkBody(parseSignature(request.replySignature), reply.body);
    if (mismatch) {
      throw CallError.valueMismatch(member, `reply ${formatMismatch(mismatch)}`);
    }
    return reply.body;
  }

  with(middleware: ClientMiddleware): Caller {
    return new MiddlewareCaller(this, [middleware]);
  }
}

/**
 * Caller that runs middleware around another Caller:
 * 1. Run pre() hooks (may reject or rewrite args)
 * 2. Call the inner caller with the rewritten body
 * 3. Run post() hooks with the outcome, in reverse order
 */
export class MiddlewareCaller implements Caller {
  constructor(
    private readonly inner: Caller,
    private readonly middlewares: ClientMiddleware[],
  ) {}

  async call(request: CallerRequest): Promise<readonly unknown[]> {
    const ctx: ClientContext = { extensions: new Extensions() };
    const message = request.message;
    const callRequest: CallRequest = {
      method: describeMember(message),
      destination: message.destination,
      path: message.path,
      args: [...message.body],
    };

    for (const mw of this.middlewares) {
      if (mw.pre) {
        const rejection = await mw.pre(ctx, callRequest);
        if (rejection) {
          const error = RejectionError.from(rejection);
          await this.runPostHooks(ctx, callRequest, { ok: false, error });
          throw error;
        }
      }
    }

    const finalRequest: CallerRequest = {
      ...request,
      message: { ...message, body: callRequest.args },
    };

    let outcome: CallOutcome;
    try {
      const value = await this.inner.call(finalRequest);
      outcome = { ok: true, value };
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e));
      await this.runPostHooks(ctx, callRequest, { ok: false, error });
      throw e;
    }

    await this.runPostHooks(ctx, callRequest, outcome);
    return outcome.value;
  }

  private async runPostHooks(ctx: ClientContext, request: CallRequest, outcome: CallOutcome): Promise<void> {
    for (let i = this.middlewares.length - 1; i >= 0; i--) {
      const mw = this.middlewares[i];
      if (mw.post) {
        try {
          await mw.post(ctx, request, outcome);
        } catch (e) {
          // Keep running the remaining hooks
          log.rpc("post hook failed for %s: %O", request.method, e);
        }
      }
    }
  }

  with(middleware: ClientMiddleware): Caller {
    return new MiddlewareCaller(this.inner, [...this.middlewares, middleware]);
  }
}
