// @pairwire/tcp - TCP transport for pairwire peers (Node.js only)

export { LengthPrefixedFramed, MAX_PREFIX_LENGTH, type FramingOptions } from "./framing.ts";
export { TcpEndpoint, type ConnectOptions, type AcceptOptions } from "./transport.ts";
