// TCP endpoints: a Peer per socket.

import net from "node:net";
import {
  type LocalInterface,
  type MessageCatalog,
  type PeerOptions,
  Peer,
  PeerError,
} from "@pairwire/core";
import { type FramingOptions, LengthPrefixedFramed } from "./framing.ts";

/** Options for connecting to or accepting a peer. */
export interface ConnectOptions extends PeerOptions, FramingOptions {
  host?: string;
  port: number;
}

export type AcceptOptions = PeerOptions & FramingOptions;

/**
 * Builds Peers over TCP sockets. Both sides speak the same protocol, so the
 * connecting and accepting sides differ only in who opened the socket.
 *
 * @example
 * ```typescript
 * const endpoint = new TcpEndpoint(catalog, createDispatcher(catalog).on(ping, () => {}));
 * const server = net.createServer((socket) => endpoint.accept(socket));
 * const peer = await endpoint.connect({ host: "127.0.0.1", port: 4100 });
 * ```
 */
export class TcpEndpoint {
  constructor(
    private readonly catalog: MessageCatalog,
    private readonly local: LocalInterface,
  ) {}

  /** Open a socket to `host:port` and start a Peer on it once connected. */
  connect(options: ConnectOptions): Promise<Peer> {
    const { host = "localhost", port, ...rest } = options;
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host, port });

      const onError = (err: Error) => {
        reject(PeerError.io(`connect ${host}:${port}: ${err.message}`));
      };
      socket.once("error", onError);
      socket.once("connect", () => {
        socket.off("error", onError);
        resolve(this.accept(socket, rest));
      });
    });
  }

  /** Start a Peer on an already connected socket. */
  accept(socket: net.Socket, options: AcceptOptions = {}): Peer {
    socket.setNoDelay(true);
    const { maxFrameLength, ...peerOptions } = options;
    const transport = new LengthPrefixedFramed(socket, { maxFrameLength });
    return new Peer(transport, this.catalog, this.local, peerOptions);
  }
}
