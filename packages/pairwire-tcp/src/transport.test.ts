import { describe, it, expect, afterEach, beforeEach } from "vitest";
import net from "node:net";
import { Peer, PeerError, createCatalog, createDispatcher, defineMessage, unit, utf8 } from "@pairwire/core";
import { type AcceptOptions, TcpEndpoint } from "./transport.ts";

const ping = defineMessage({ id: 0, name: "ping", request: unit, reply: unit });
const echo = defineMessage({ id: 1, name: "echo", request: utf8, reply: utf8 });
const stall = defineMessage({ id: 2, name: "stall", request: unit, reply: unit });
const catalog = createCatalog([ping, echo, stall]);

// Holds stalled handlers until the test ends
let gate: Promise<void> = Promise.resolve();
let release: () => void = () => {};

const serving = createDispatcher(catalog)
  .on(ping, () => {})
  .on(echo, (text) => text.toUpperCase())
  .on(stall, () => gate);

const client = new TcpEndpoint(catalog, createDispatcher(catalog));

const servers: net.Server[] = [];
const peers: Peer[] = [];

beforeEach(() => {
  gate = new Promise<void>((resolve) => {
    release = resolve;
  });
});

afterEach(async () => {
  release();
  await Promise.all(peers.splice(0).map((peer) => peer.close()));
  await Promise.all(servers.splice(0).map(stop));
});

function stop(server: net.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

/** A loopback server that starts a Peer on each accepted socket. */
async function listen(
  options?: AcceptOptions,
): Promise<{ port: number; accepted: Promise<Peer>; server: net.Server }> {
  const endpoint = new TcpEndpoint(catalog, serving);
  let onAccept: (peer: Peer) => void = () => {};
  const accepted = new Promise<Peer>((resolve) => {
    onAccept = resolve;
  });
  const server = net.createServer((socket) => {
    const peer = endpoint.accept(socket, options);
    peers.push(peer);
    onAccept(peer);
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("expected a TCP address");
  return { port: address.port, accepted, server };
}

describe("TcpEndpoint", () => {
  it("connects and makes calls", async () => {
    const { port, accepted, server } = await listen();
    servers.push(server);

    const peer = await client.connect({ host: "127.0.0.1", port });
    peers.push(peer);

    await expect(ping.send(undefined, peer)).resolves.toBeUndefined();
    expect(await echo.send("over tcp", peer)).toBe("OVER TCP");

    const remote = await accepted;
    await peer.close();
    await remote.done;
    expect(remote.state).toBe("terminated");
  });

  it("passes peer options through connect", async () => {
    const { port, server } = await listen();
    servers.push(server);

    const peer = await client.connect({ host: "127.0.0.1", port, requestTimeoutMs: 20 });
    peers.push(peer);

    const err = await stall.send(undefined, peer).then(
      () => null,
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(PeerError);
    expect(err).toHaveProperty("message", "no reply within 20ms");
  });

  it("applies the accepted side's frame limit", async () => {
    const { port, accepted, server } = await listen({ maxFrameLength: 8 });
    servers.push(server);

    const peer = await client.connect({ host: "127.0.0.1", port });
    peers.push(peer);

    // A ping frame is three bytes; this echo request is well over eight
    await expect(ping.send(undefined, peer)).resolves.toBeUndefined();
    await expect(echo.send("longer than the limit", peer)).rejects.toThrow();

    const remote = await accepted;
    await remote.done;
    expect(remote.state).toBe("terminated");
  });

  it("rejects with an io error when nothing listens", async () => {
    const { port, server } = await listen();
    await stop(server);

    const err = await client.connect({ host: "127.0.0.1", port }).then(
      () => null,
      (e: unknown) => e,
    );

    expect(err).toBeInstanceOf(PeerError);
    expect(err).toHaveProperty("kind", "io");
    expect(err).toHaveProperty(
      "message",
      expect.stringMatching(new RegExp(`^connect 127\\.0\\.0\\.1:${port}: `)),
    );
  });
});
