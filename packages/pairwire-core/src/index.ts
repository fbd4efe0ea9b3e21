// @pairwire/core - typed request/reply multiplexing over a message transport

// Transport
export type { MessageTransport } from "./transport.ts";
export { type Channel, createChannel } from "./channel.ts";
export { type MemoryTransport, createMemoryTransportPair } from "./memory.ts";

// Peer
export { ReplyCorrelator, type ReplyWaiter } from "./correlator.ts";
export { Peer, type PeerOptions, type PeerState, type LocalInterface } from "./peer.ts";
export { PeerError, type PeerErrorKind, toError } from "./errors.ts";

// Messages
export {
  type MessageDefinition,
  type MessageKind,
  type AnyMessageKind,
  type MessageHandler,
  defineMessage,
  MessageCatalog,
  createCatalog,
  Dispatcher,
  createDispatcher,
} from "./catalog.ts";

// Caller and middleware
export { type Caller, type CallerRequest, type CallOptions, MiddlewareCaller } from "./caller.ts";
export {
  Extensions,
  extensionKey,
  type ExtensionKey,
  RejectionError,
  type ClientContext,
  type CallRequest,
  type CallOutcome,
  type Rejection,
  type RejectionCode,
  type ClientMiddleware,
} from "./middleware.ts";

// Logging
export { loggingMiddleware, type LoggingOptions } from "./logging.ts";
export { createDebug, isEnabled, type DebugLogger } from "./debug.ts";

// Re-exported so applications need only this package
export {
  type Serializable,
  type MaybePromise,
  DecodeError,
  unit,
  rawBytes,
  utf8,
  optional,
  schemaSerializable,
} from "@pairwire/codec";
export { FrameError, RemoteError } from "@pairwire/wire";
