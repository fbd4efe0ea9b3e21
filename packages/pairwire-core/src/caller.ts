// Caller abstraction.
//
// A Caller performs correlated calls. Peer implements it directly; with()
// wraps any Caller in middleware.

import type { ClientMiddleware, ClientContext, CallRequest, CallOutcome } from "./middleware.ts";
import { Extensions, RejectionError } from "./middleware.ts";
import { createDebug } from "./debug.ts";
import { toError } from "./errors.ts";

const debug = createDebug("pairwire:rpc");

/** Per-call settings. */
export interface CallOptions {
  /**
   * Reply timeout in milliseconds; 0 or Infinity waits indefinitely.
   * Defaults to the peer's `requestTimeoutMs`. A finite value above
   * 2^31 - 1 fails the call with a RangeError before anything is sent.
   */
  timeoutMs?: number;

  /** Aborting cancels the call. */
  signal?: AbortSignal;
}

/**
 * A call ready to go on the wire.
 */
export interface CallerRequest extends CallOptions {
  /** Message name, for middleware and logs. */
  message: string;

  /** Message identifier on the wire. */
  messageId: number;

  /** The request value before encoding. */
  value: unknown;

  /** Encoded request. */
  payload: Uint8Array;
}

/**
 * Caller interface for making correlated calls.
 */
export interface Caller {
  /**
   * Send a request and wait for its reply.
   *
   * @returns Encoded reply payload
   */
  call(request: CallerRequest): Promise<Uint8Array>;

  /**
   * Wrap this caller with middleware.
   *
   * Middleware is applied in order: first added runs first on pre,
   * and last on post (onion model).
   */
  with(middleware: ClientMiddleware): Caller;
}

/**
 * Caller implementation that applies middleware around another Caller.
 *
 * 1. Create context with extensions
 * 2. Run pre() hooks (can reject or replace the payload)
 * 3. Call inner caller
 * 4. Run post() hooks with outcome, in reverse order
 * 5. Return reply or rethrow the inner caller's error unchanged
 */
export class MiddlewareCaller implements Caller {
  constructor(
    private readonly inner: Caller,
    private readonly middlewares: ClientMiddleware[],
  ) {}

  async call(request: CallerRequest): Promise<Uint8Array> {
    const ctx: ClientContext = {
      extensions: new Extensions(),
    };

    const callRequest: CallRequest = {
      message: request.message,
      messageId: request.messageId,
      value: request.value,
      payload: request.payload,
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

    let value: Uint8Array;
    try {
      value = await this.inner.call({ ...request, payload: callRequest.payload });
    } catch (e) {
      await this.runPostHooks(ctx, callRequest, { ok: false, error: toError(e) });
      throw e;
    }

    await this.runPostHooks(ctx, callRequest, { ok: true, value });
    return value;
  }

  private async runPostHooks(
    ctx: ClientContext,
    request: CallRequest,
    outcome: CallOutcome,
  ): Promise<void> {
    for (let i = this.middlewares.length - 1; i >= 0; i--) {
      const mw = this.middlewares[i];
      if (mw.post) {
        try {
          await mw.post(ctx, request, outcome);
        } catch (e) {
          // Keep running the remaining hooks
          debug("post hook failed", { message: request.message, error: toError(e).message });
        }
      }
    }
  }

  with(middleware: ClientMiddleware): Caller {
    return new MiddlewareCaller(this.inner, [...this.middlewares, middleware]);
  }
}
