import { describe, it, expect, vi } from "vitest";
import { ReplyCorrelator } from "./correlator.ts";
import { PeerError } from "./errors.ts";

function waiter() {
  return { resolve: vi.fn(), reject: vi.fn() };
}

function invalidToken(fn: () => void): PeerError {
  try {
    fn();
  } catch (e) {
    if (e instanceof PeerError) return e;
    throw e;
  }
  throw new Error("expected an invalid-token error");
}

describe("ReplyCorrelator", () => {
  it("issues tokens from 1 upward", () => {
    const correlator = new ReplyCorrelator();
    expect([waiter(), waiter(), waiter()].map((w) => correlator.enqueue(w))).toEqual([1, 2, 3]);
    expect(correlator.size).toBe(3);
  });

  it("never reissues a token after it settles", () => {
    const correlator = new ReplyCorrelator();
    const first = correlator.enqueue(waiter());
    correlator.yield(first, new Uint8Array(0));
    expect(correlator.enqueue(waiter())).toBe(2);
  });

  it("resolves a waiter exactly once", () => {
    const correlator = new ReplyCorrelator();
    const w = waiter();
    const token = correlator.enqueue(w);
    const payload = Uint8Array.of(1, 2);

    correlator.yield(token, payload);
    expect(w.resolve).toHaveBeenCalledWith(payload);
    expect(correlator.size).toBe(0);

    const err = invalidToken(() => correlator.yield(token, payload));
    expect(err.kind).toBe("invalid-token");
    expect(err.token).toBe(token);
    expect(err.message).toBe("no outstanding call for token 1");
    expect(w.resolve).toHaveBeenCalledTimes(1);
  });

  it("rejects a waiter exactly once", () => {
    const correlator = new ReplyCorrelator();
    const w = waiter();
    const token = correlator.enqueue(w);
    const error = new Error("handler failed");

    correlator.fail(token, error);
    expect(w.reject).toHaveBeenCalledWith(error);
    expect(invalidToken(() => correlator.fail(token, error)).kind).toBe("invalid-token");
    expect(invalidToken(() => correlator.yield(token, new Uint8Array(0))).kind).toBe("invalid-token");
  });

  it("rejects tokens that were never issued", () => {
    const correlator = new ReplyCorrelator();
    expect(invalidToken(() => correlator.yield(0, new Uint8Array(0))).token).toBe(0);
    expect(invalidToken(() => correlator.yield(7, new Uint8Array(0))).token).toBe(7);
  });

  it("only settles the named token", () => {
    const correlator = new ReplyCorrelator();
    const a = waiter();
    const b = waiter();
    correlator.enqueue(a);
    const tokenB = correlator.enqueue(b);

    correlator.yield(tokenB, Uint8Array.of(2));
    expect(a.resolve).not.toHaveBeenCalled();
    expect(b.resolve).toHaveBeenCalledOnce();
    expect(correlator.size).toBe(1);
  });

  it("cancels outstanding calls and reports settled ones", () => {
    const correlator = new ReplyCorrelator();
    const w = waiter();
    const token = correlator.enqueue(w);
    const error = PeerError.timeout(token, 50);

    expect(correlator.cancel(token, error)).toBe(true);
    expect(w.reject).toHaveBeenCalledWith(error);
    expect(correlator.cancel(token, error)).toBe(false);
    expect(w.reject).toHaveBeenCalledOnce();
  });

  it("fails every outstanding call with the same error", () => {
    const correlator = new ReplyCorrelator();
    const waiters = [waiter(), waiter(), waiter()];
    for (const w of waiters) correlator.enqueue(w);
    const error = PeerError.closed();

    correlator.failAll(error);
    for (const w of waiters) {
      expect(w.reject).toHaveBeenCalledWith(error);
    }
    expect(correlator.size).toBe(0);
    expect(correlator.terminal).toBe(error);
  });

  it("refuses new calls after failAll", () => {
    const correlator = new ReplyCorrelator();
    const error = new Error("socket reset");
    correlator.failAll(error);

    expect(() => correlator.enqueue(waiter())).toThrow(error);
    expect(correlator.size).toBe(0);
  });

  it("keeps the first terminal error", () => {
    const correlator = new ReplyCorrelator();
    const first = new Error("first");
    correlator.failAll(first);
    correlator.failAll(new Error("second"));
    expect(correlator.terminal).toBe(first);
  });
});
