// Logging.
//
// Everything logs through the `debug` package; enable with
// DEBUG=busbind:* (or a narrower namespace).

import createDebug from "debug";
import { CallError } from "@busbind/wire";
import type { CallOutcome, CallRequest, ClientContext, ClientMiddleware } from "./middleware.ts";
import { ExtensionKey } from "./middleware.ts";

export const log = {
  rpc: createDebug("busbind:rpc"),
  dispatch: createDebug("busbind:dispatch"),
  signal: createDebug("busbind:signal"),
};

const START_TIME = new ExtensionKey<number>("logging:start-time");

export interface LoggingOptions {
  /** Defaults to "busbind:rpc". */
  namespace?: string;

  /** Log call arguments. Defaults to true. */
  logArgs?: boolean;

  /** Log reply values. Defaults to true. */
  logResults?: boolean;

  /**
   * Minimum duration (ms) to log a reply. Faster calls are skipped.
   * Defaults to 0.
   */
  minDuration?: number;
}

/**
 * Create a middleware that logs every call with its timing.
 *
 * Logs structured objects:
 * - call: `{ type: "request", method, path, destination?, args? }`
 * - reply: `{ type: "response", method, duration, ok, result? | error? }`
 *
 * @example
 * ```typescript
 * const proxy = new LightProxy(transport, {
 *   destination: "org.example.Lights",
 *   path: "/org/example/Light/1",
 *   middleware: [loggingMiddleware()],
 * });
 * ```
 */
export function loggingMiddleware(options: LoggingOptions = {}): ClientMiddleware {
  const logger = createDebug(options.namespace ?? "busbind:rpc");
  const logArgs = options.logArgs ?? true;
  const logResults = options.logResults ?? true;
  const minDuration = options.minDuration ?? 0;

  return {
    pre(ctx: ClientContext, request: CallRequest): void {
      ctx.extensions.set(START_TIME, performance.now());
      if (!logger.enabled) return;

      const logObj: Record<string, unknown> = {
        type: "request",
        method: request.method,
        path: request.path,
      };
      if (request.destination !== undefined) {
        logObj.destination = request.destination;
      }
      if (logArgs && request.args.length > 0) {
        logObj.args = request.args;
      }
      logger(`→ ${request.method}`, logObj);
    },

    post(ctx: ClientContext, request: CallRequest, outcome: CallOutcome): void {
      const startTime = ctx.extensions.get(START_TIME);
      if (startTime === undefined) return;

      const duration = performance.now() - startTime;
      if (duration < minDuration) return;
      if (!logger.enabled) return;

      const logObj: Record<string, unknown> = {
        type: "response",
        method: request.method,
        duration: `${duration.toFixed(2)}ms`,
      };

      if (outcome.ok) {
        logObj.ok = true;
        if (logResults && outcome.value.length > 0) {
          logObj.result = outcome.value;
        }
        logger(`← ${request.method}: ✓ ${duration.toFixed(2)}ms`, logObj);
        return;
      }

      logObj.ok = false;
      const error = outcome.error;
      if (error instanceof CallError) {
        logObj.errorKind = error.kind;
        if (error.errorName !== undefined) {
          logObj.errorName = error.errorName;
        }
      }
      logObj.error = { name: error.name, message: error.message };
      logger(`← ${request.method}: ✗ ${duration.toFixed(2)}ms`, logObj);
    },
  };
}
