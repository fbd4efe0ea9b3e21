import { describe, it, expect } from "vitest";
import { createChannel } from "./channel.ts";
import { createMemoryTransportPair } from "./memory.ts";
import { PeerError } from "./errors.ts";

describe("createChannel", () => {
  it("delivers values in order to a waiting receiver", async () => {
    const channel = createChannel<number>();
    const first = channel.recv();
    channel.send(1);
    channel.send(2);
    expect(await first).toBe(1);
    expect(await channel.recv()).toBe(2);
  });

  it("drains buffered values before reporting the end", async () => {
    const channel = createChannel<string>();
    channel.send("a");
    channel.close();
    expect(channel.send("b")).toBe(false);
    expect(await channel.recv()).toBe("a");
    expect(await channel.recv()).toBeNull();
    expect(channel.isClosed()).toBe(true);
  });

  it("rejects receivers when closed with an error", async () => {
    const channel = createChannel<string>();
    const waiting = channel.recv();
    const error = new Error("link down");
    channel.close(error);
    await expect(waiting).rejects.toBe(error);
    await expect(channel.recv()).rejects.toBe(error);
  });
});

describe("createMemoryTransportPair", () => {
  it("carries messages both ways", async () => {
    const [a, b] = createMemoryTransportPair();
    await a.send(Uint8Array.of(1));
    await b.send(Uint8Array.of(2, 3));
    expect(await b.recv()).toEqual(Uint8Array.of(1));
    expect(await a.recv()).toEqual(Uint8Array.of(2, 3));
  });

  it("copies payloads", async () => {
    const [a, b] = createMemoryTransportPair();
    const payload = Uint8Array.of(5);
    await a.send(payload);
    payload[0] = 6;
    expect(await b.recv()).toEqual(Uint8Array.of(5));
  });

  it("ends the stream on both sides when one closes", async () => {
    const [a, b] = createMemoryTransportPair();
    await a.send(Uint8Array.of(1));
    a.close();
    a.close();
    expect(await a.recv()).toBeNull();
    expect(await b.recv()).toEqual(Uint8Array.of(1));
    expect(await b.recv()).toBeNull();
    await expect(a.send(Uint8Array.of(2))).rejects.toBeInstanceOf(PeerError);
    await expect(b.send(Uint8Array.of(2))).rejects.toThrow("transport closed");
  });

  it("fails one end with the given error", async () => {
    const [a, b] = createMemoryTransportPair();
    const error = new Error("connection reset");
    const waiting = a.recv();
    a.fail(error);
    await expect(waiting).rejects.toBe(error);
    expect(await b.recv()).toBeNull();
  });
});
