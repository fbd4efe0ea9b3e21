// The multiplexer: one Peer per transport.
//
// Outbound calls get a token from the correlator and wait for the response
// frame carrying it. Inbound frames are read strictly in order, but each
// request is handled in its own task, so a slow handler never holds up the
// frames behind it.

import { type MaybePromise, encodeUtf8, hexDump } from "@pairwire/codec";
import {
  type Frame,
  type MessageLookup,
  FrameError,
  RemoteError,
  decodeFrame,
  encodeFrame,
  errorFrame,
  isErrorResponse,
  isResponse,
  requestFrame,
  responseFrame,
} from "@pairwire/wire";
import type { MessageTransport } from "./transport.ts";
import { ReplyCorrelator } from "./correlator.ts";
import { type Caller, type CallerRequest, type CallOptions, MiddlewareCaller } from "./caller.ts";
import type { ClientMiddleware } from "./middleware.ts";
import { type DebugLogger, createDebug } from "./debug.ts";
import { PeerError, toError } from "./errors.ts";

/** The application side of a Peer: answers inbound requests. */
export interface LocalInterface {
  /**
   * Produce the reply payload for a request. A thrown error is sent back as
   * an error response carrying the error's message.
   */
  handle(messageId: number, payload: Uint8Array): MaybePromise<Uint8Array>;

  /**
   * Receives errors that belong to no call: malformed frames, responses for
   * unknown tokens, failures sending replies.
   */
  handleError?(error: Error): void;
}

export interface PeerOptions {
  /**
   * Default reply timeout for outbound calls, in milliseconds.
   * 0 or Infinity waits indefinitely. Defaults to 30000. Finite values
   * above 2^31 - 1 are refused with a RangeError.
   */
  requestTimeoutMs?: number;

  /** Error hook; takes precedence over `LocalInterface.handleError`. */
  onError?: (error: Error) => void;

  /** Debug namespace for this peer. Defaults to "pairwire:peer". */
  logNamespace?: string;
}

export type PeerState = "active" | "terminated";

const lenientUtf8 = new TextDecoder();

// Longest delay setTimeout honours; it fires at once for anything longer
const MAX_TIMER_MS = 0x7fff_ffff;

function checkTimeout(option: string, timeoutMs: number): void {
  if (Number.isFinite(timeoutMs) && timeoutMs > MAX_TIMER_MS) {
    throw new RangeError(`${option}: ${timeoutMs}ms exceeds the ${MAX_TIMER_MS}ms timer limit`);
  }
}

function describeFailure(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Multiplexes correlated request/reply calls in both directions over one
 * MessageTransport.
 *
 * The receive loop starts on construction and runs until the transport ends
 * or fails; every outstanding call then fails with that reason.
 *
 * @example
 * ```typescript
 * const peer = new Peer(transport, catalog, createDispatcher(catalog).on(ping, () => {}));
 * await ping.send(undefined, peer);
 * await peer.close();
 * ```
 */
export class Peer implements Caller {
  /** Settles once the receive loop has stopped and every inbound handler has finished. */
  readonly done: Promise<void>;

  private readonly correlator = new ReplyCorrelator();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly requestTimeoutMs: number;
  private readonly errorHook: (error: Error) => void;
  private readonly debug: DebugLogger;
  private terminalError: Error | null = null;

  constructor(
    private readonly transport: MessageTransport,
    private readonly messages: MessageLookup,
    private readonly local: LocalInterface,
    options: PeerOptions = {},
  ) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30000;
    checkTimeout("requestTimeoutMs", this.requestTimeoutMs);
    this.debug = createDebug(options.logNamespace ?? "pairwire:peer");
    this.errorHook =
      options.onError ??
      (local.handleError
        ? (error) => local.handleError?.(error)
        : (error) => this.debug("unhandled error", { name: error.name, message: error.message }));
    this.done = this.run();
  }

  get state(): PeerState {
    return this.terminalError ? "terminated" : "active";
  }

  /** Number of outbound calls waiting for a reply. */
  get pending(): number {
    return this.correlator.size;
  }

  /**
   * Send a request and wait for the reply payload.
   *
   * Rejects with `RemoteError` if the remote handler failed, `PeerError`
   * `timeout` or `cancelled` if the call was given up, and with the
   * transport's error (or `PeerError` `closed`) if the peer terminated
   * first.
   */
  async sendWithReply(
    messageId: number,
    payload: Uint8Array,
    options: CallOptions = {},
  ): Promise<Uint8Array> {
    if (this.terminalError) {
      throw this.terminalError;
    }
    const { signal } = options;
    if (signal?.aborted) {
      throw PeerError.cancelled();
    }
    const timeoutMs = options.timeoutMs ?? this.requestTimeoutMs;
    checkTimeout("timeoutMs", timeoutMs);

    let token = 0;
    const reply = new Promise<Uint8Array>((resolve, reject) => {
      token = this.correlator.enqueue({ resolve, reject });
    });

    const timer =
      timeoutMs > 0 && Number.isFinite(timeoutMs)
        ? setTimeout(() => this.correlator.cancel(token, PeerError.timeout(token, timeoutMs)), timeoutMs)
        : undefined;
    const onAbort = () => {
      this.correlator.cancel(token, PeerError.cancelled(token));
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const [result] = await Promise.all([reply, this.sendRequest(messageId, token, payload)]);
      return result;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }
  }

  call(request: CallerRequest): Promise<Uint8Array> {
    return this.sendWithReply(request.messageId, request.payload, {
      timeoutMs: request.timeoutMs,
      signal: request.signal,
    });
  }

  with(middleware: ClientMiddleware): Caller {
    return new MiddlewareCaller(this, [middleware]);
  }

  /**
   * Close the transport. Idempotent.
   *
   * @returns the `done` promise
   */
  close(): Promise<void> {
    this.transport.close();
    return this.done;
  }

  // A failed send fails only the call it belonged to.
  private async sendRequest(messageId: number, token: number, payload: Uint8Array): Promise<void> {
    try {
      await this.transport.send(encodeFrame(requestFrame(messageId, token, payload)));
    } catch (e) {
      this.correlator.cancel(token, toError(e));
    }
  }

  private async run(): Promise<void> {
    const reason = await this.receiveAll();
    this.terminalError = reason;
    this.debug("terminated", { reason: reason.message, pending: this.correlator.size });
    this.correlator.failAll(reason);
    await Promise.all(this.inFlight);
  }

  /** Read frames until the transport ends; returns why it ended. */
  private async receiveAll(): Promise<Error> {
    try {
      for (;;) {
        const bytes = await this.transport.recv();
        if (bytes === null) {
          return PeerError.closed();
        }
        this.dispatch(bytes);
      }
    } catch (e) {
      return toError(e);
    }
  }

  private dispatch(bytes: Uint8Array): void {
    let frame: Frame;
    try {
      frame = decodeFrame(bytes, this.messages);
    } catch (e) {
      if (e instanceof FrameError) {
        this.debug("dropped frame", { kind: e.kind, bytes: hexDump(bytes, 0, 16) });
      }
      this.reportError(e);
      return;
    }

    if (isResponse(frame)) {
      this.settle(frame);
      return;
    }

    const handling = this.answer(frame);
    this.inFlight.add(handling);
    void handling.finally(() => {
      this.inFlight.delete(handling);
    });
  }

  private settle(frame: Frame): void {
    try {
      if (isErrorResponse(frame)) {
        const text = lenientUtf8.decode(frame.payload);
        this.correlator.fail(frame.token, new RemoteError(text, frame.messageId));
      } else {
        this.correlator.yield(frame.token, frame.payload);
      }
    } catch (e) {
      this.reportError(e);
    }
  }

  // Never rejects: every failure becomes an error response or goes to the hook.
  private async answer(frame: Frame): Promise<void> {
    let reply: Frame;
    try {
      const result = await this.local.handle(frame.messageId, frame.payload);
      reply = responseFrame(frame.messageId, frame.token, result);
    } catch (e) {
      reply = errorFrame(frame.messageId, frame.token, encodeUtf8(describeFailure(e)));
    }

    try {
      await this.transport.send(encodeFrame(reply));
    } catch (e) {
      this.reportError(e);
    }
  }

  private reportError(e: unknown): void {
    const error = toError(e);
    try {
      this.errorHook(error);
    } catch (hookError) {
      this.debug("error hook failed", {
        error: error.message,
        hookError: toError(hookError).message,
      });
    }
  }
}
