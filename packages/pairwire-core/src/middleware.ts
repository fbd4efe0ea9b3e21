// Client-side middleware types.
//
// Middleware intercepts outbound calls before they are sent and observes
// their outcome, enabling patterns like auth checks, tracing and logging.

/** Key for one kind of per-call middleware state; carries the value's type. */
export interface ExtensionKey<T> {
  readonly id: symbol;
  /** Never set; ties the key to its value type. */
  readonly type?: T;
}

export function extensionKey<T>(description: string): ExtensionKey<T> {
  return { id: Symbol(description) };
}

/**
 * Per-call storage shared by middleware. Each middleware keeps its own keys,
 * so state from different middleware never collides.
 *
 * @example
 * ```typescript
 * const ATTEMPT = extensionKey<number>("attempt");
 * ctx.extensions.set(ATTEMPT, 1);
 * const attempt = ctx.extensions.get(ATTEMPT); // number | undefined
 * ```
 */
export class Extensions {
  private readonly values = new Map<symbol, unknown>();

  set<T>(key: ExtensionKey<T>, value: T): void {
    this.values.set(key.id, value);
  }

  get<T>(key: ExtensionKey<T>): T | undefined {
    // Only `set` with the same key writes this entry
    return this.values.get(key.id) as T | undefined;
  }
}

/**
 * Context passed to middleware hooks.
 *
 * Lives for one call and is shared between its pre and post hooks.
 */
export interface ClientContext {
  extensions: Extensions;
}

/**
 * An outgoing call as middleware sees it.
 */
export interface CallRequest {
  /** Message name, e.g. "jobs.submit". */
  readonly message: string;

  /** Message identifier on the wire. */
  readonly messageId: number;

  /** The request value before encoding, for inspection. */
  readonly value: unknown;

  /**
   * Encoded request. Middleware may replace it; whatever is here when the
   * last pre hook returns is what gets sent.
   */
  payload: Uint8Array;
}

/**
 * Represents the outcome of a call: the reply payload, or why there is none.
 */
export type CallOutcome = { ok: true; value: Uint8Array } | { ok: false; error: Error };

/**
 * Rejection codes for middleware rejections.
 */
export type RejectionCode =
  | "unauthenticated"
  | "permission-denied"
  | "rate-limited"
  | "invalid-request"
  | "internal"
  | (string & {});

/**
 * Rejection returned by middleware to abort a call.
 */
export interface Rejection {
  code: RejectionCode;
  message: string;
}

/**
 * Error thrown when middleware rejects a call. Nothing is sent.
 */
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
 * Client middleware interface.
 *
 * @example
 * ```typescript
 * const readOnly: ClientMiddleware = {
 *   pre(ctx, request) {
 *     if (request.message !== "jobs.status") {
 *       return { code: "permission-denied", message: "read-only caller" };
 *     }
 *   },
 * };
 *
 * await status.send(jobId, peer.with(readOnly));
 * ```
 */
export interface ClientMiddleware {
  /**
   * Called before the call is sent.
   *
   * May replace the payload, or reject the call by returning a Rejection.
   */
  pre?(ctx: ClientContext, request: CallRequest): Promise<Rejection | void> | Rejection | void;

  /**
   * Called once the call has an outcome, including rejections.
   *
   * Observes only; errors thrown here are logged and do not affect the call.
   */
  post?(ctx: ClientContext, request: CallRequest, outcome: CallOutcome): Promise<void> | void;
}
