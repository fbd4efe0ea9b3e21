// Logging middleware.
//
// Provides request/response logging with timing information.
// Enabled through the DEBUG environment variable (see debug.ts).

import { RemoteError } from "@pairwire/wire";
import type { ClientMiddleware, ClientContext, CallRequest, CallOutcome } from "./middleware.ts";
import { RejectionError, extensionKey } from "./middleware.ts";
import { isEnabled } from "./debug.ts";

const START_TIME = extensionKey<number>("logging:start-time");

export interface LoggingOptions {
  /**
   * Namespace for debug matching. Defaults to "pairwire:rpc".
   * Supports patterns like "pairwire:*" or "*" in DEBUG.
   */
  namespace?: string;

  /**
   * Log request values. Defaults to true.
   */
  logArgs?: boolean;

  /**
   * Log reply sizes. Defaults to true.
   */
  logResults?: boolean;

  /**
   * Minimum duration (ms) to log. Calls faster than this are skipped.
   * Defaults to 0 (log all calls).
   */
  minDuration?: number;
}

/**
 * Create a logging middleware that logs all calls with timing information.
 *
 * Logs structured objects alongside a one-line summary:
 * - Request: { type: "request", message, args? }
 * - Response: { type: "response", message, duration, ok, replyBytes? | error? }
 *
 * @example
 * ```typescript
 * // DEBUG=pairwire:rpc
 * const caller = peer.with(loggingMiddleware());
 * await ping.send(undefined, caller);
 * // → ping
 * // ← ping: ✓ 0.42ms
 * ```
 */
export function loggingMiddleware(options: LoggingOptions = {}): ClientMiddleware {
  const namespace = options.namespace ?? "pairwire:rpc";
  const logArgs = options.logArgs ?? true;
  const logResults = options.logResults ?? true;
  const minDuration = options.minDuration ?? 0;

  return {
    pre(ctx: ClientContext, request: CallRequest): void {
      ctx.extensions.set(START_TIME, performance.now());

      // Nothing to report until the call is known to be slow enough
      if (minDuration > 0 || !isEnabled(namespace)) return;

      const logObj: Record<string, unknown> = {
        type: "request",
        message: request.message,
      };

      if (logArgs && request.value !== undefined) {
        logObj.args = request.value;
      }

      console.log(`→ ${request.message}`, logObj);
    },

    post(ctx: ClientContext, request: CallRequest, outcome: CallOutcome): void {
      const startTime = ctx.extensions.get(START_TIME);
      if (startTime === undefined) return;

      const duration = performance.now() - startTime;
      if (duration < minDuration) return;
      if (!isEnabled(namespace)) return;

      const logObj: Record<string, unknown> = {
        type: "response",
        message: request.message,
        duration: `${duration.toFixed(2)}ms`,
        ok: outcome.ok,
      };

      if (outcome.ok) {
        if (logResults) {
          logObj.replyBytes = outcome.value.length;
        }
        console.log(`← ${request.message}: ✓ ${duration.toFixed(2)}ms`, logObj);
        return;
      }

      const error = outcome.error;
      if (error instanceof RejectionError) {
        logObj.rejected = error.code;
      } else if (error instanceof RemoteError) {
        logObj.remote = true;
      }
      logObj.error = { name: error.name, message: error.message };

      console.log(`← ${request.message}: ✗ ${duration.toFixed(2)}ms`, logObj);
    },
  };
}
