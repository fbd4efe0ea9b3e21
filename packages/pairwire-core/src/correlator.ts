// Outstanding-call bookkeeping for a Peer.

import { PeerError } from "./errors.ts";

/** Continuation of an outbound call, settled exactly once. */
export interface ReplyWaiter {
  resolve(payload: Uint8Array): void;
  reject(error: Error): void;
}

/**
 * Owns the token counter and the table of outstanding calls.
 *
 * Tokens start at 1 and increase by one per call; 0 is never issued. Every
 * method runs to completion without yielding to the event loop, so no two
 * operations ever interleave on the table.
 */
export class ReplyCorrelator {
  private nextToken = 1;
  private waiters = new Map<number, ReplyWaiter>();
  private terminalError: Error | null = null;

  /** Number of outstanding calls. */
  get size(): number {
    return this.waiters.size;
  }

  /** Error passed to `failAll`, once the correlator has been shut down. */
  get terminal(): Error | null {
    return this.terminalError;
  }

  /**
   * Register a waiter and return its token.
   *
   * @throws the error given to `failAll`, once it has been called
   */
  enqueue(waiter: ReplyWaiter): number {
    if (this.terminalError) {
      throw this.terminalError;
    }
    const token = this.nextToken++;
    this.waiters.set(token, waiter);
    return token;
  }

  /**
   * Complete a call with its reply payload.
   *
   * @throws PeerError `invalid-token` if no call is outstanding for `token`
   */
  yield(token: number, payload: Uint8Array): void {
    this.take(token).resolve(payload);
  }

  /**
   * Fail a call.
   *
   * @throws PeerError `invalid-token` if no call is outstanding for `token`
   */
  fail(token: number, error: Error): void {
    this.take(token).reject(error);
  }

  /**
   * Fail a call if it is still outstanding.
   *
   * @returns false if the call had already settled
   */
  cancel(token: number, error: Error): boolean {
    const waiter = this.waiters.get(token);
    if (!waiter) {
      return false;
    }
    this.waiters.delete(token);
    waiter.reject(error);
    return true;
  }

  /** Fail every outstanding call with `error` and refuse new ones. */
  failAll(error: Error): void {
    if (!this.terminalError) {
      this.terminalError = error;
    }
    const waiters = [...this.waiters.values()];
    this.waiters.clear();
    for (const waiter of waiters) {
      waiter.reject(error);
    }
  }

  private take(token: number): ReplyWaiter {
    const waiter = this.waiters.get(token);
    if (!waiter) {
      throw PeerError.invalidToken(token);
    }
    this.waiters.delete(token);
    return waiter;
  }
}
