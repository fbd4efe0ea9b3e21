// Message kinds, the catalog that maps identifiers to them, and typed
// dispatch of inbound requests.

import type { MaybePromise, Serializable } from "@pairwire/codec";
import { MAX_MESSAGE_ID, type MessageLookup } from "@pairwire/wire";
import type { Caller, CallOptions } from "./caller.ts";
import type { LocalInterface } from "./peer.ts";

export interface MessageDefinition<Req, Rep> {
  /** Wire identifier, 0..255, unique within a catalog. */
  id: number;
  /** Unique name, used for handler registration, middleware and logs. */
  name: string;
  request: Serializable<Req>;
  reply: Serializable<Rep>;
}

/**
 * A request/reply pair with a fixed identifier.
 */
export interface MessageKind<Req, Rep> extends Readonly<MessageDefinition<Req, Rep>> {
  /**
   * Encode `request`, make a correlated call through `caller`, and decode the
   * reply. Encoding, call and decoding failures propagate unchanged.
   */
  send(request: Req, caller: Caller, options?: CallOptions): Promise<Rep>;
}

/** Any message kind, whatever its request and reply types. */
export type AnyMessageKind = MessageKind<unknown, unknown>;

function checkMessageId(id: number, name: string): void {
  if (!Number.isInteger(id) || id < 0 || id > MAX_MESSAGE_ID) {
    throw new RangeError(`message ${name}: identifier ${id} outside 0..${MAX_MESSAGE_ID}`);
  }
}

/**
 * Define a message kind.
 *
 * @example
 * ```typescript
 * const ping = defineMessage({ id: 0, name: "ping", request: unit, reply: unit });
 * await ping.send(undefined, peer);
 * ```
 */
export function defineMessage<Req, Rep>(definition: MessageDefinition<Req, Rep>): MessageKind<Req, Rep> {
  const { id, name, request, reply } = definition;
  checkMessageId(id, name);

  return {
    id,
    name,
    request,
    reply,
    async send(value: Req, caller: Caller, options: CallOptions = {}): Promise<Rep> {
      const payload = await request.encode(value);
      const replyPayload = await caller.call({
        message: name,
        messageId: id,
        value,
        payload,
        ...options,
      });
      return reply.decode(replyPayload);
    },
  };
}

/**
 * Identifier → message kind lookup table, built once.
 */
export class MessageCatalog implements MessageLookup, Iterable<AnyMessageKind> {
  private byId = new Map<number, AnyMessageKind>();
  private names = new Map<string, AnyMessageKind>();

  /**
   * @throws Error on a duplicate identifier or name
   * @throws RangeError on an identifier outside 0..255
   */
  constructor(kinds: Iterable<AnyMessageKind>) {
    for (const kind of kinds) {
      checkMessageId(kind.id, kind.name);
      const clash = this.byId.get(kind.id);
      if (clash) {
        throw new Error(`message ${kind.name}: identifier ${kind.id} already used by ${clash.name}`);
      }
      if (this.names.has(kind.name)) {
        throw new Error(`duplicate message name: ${kind.name}`);
      }
      this.byId.set(kind.id, kind);
      this.names.set(kind.name, kind);
    }
  }

  get size(): number {
    return this.byId.size;
  }

  has(messageId: number): boolean {
    return this.byId.has(messageId);
  }

  get(messageId: number): AnyMessageKind | undefined {
    return this.byId.get(messageId);
  }

  byName(name: string): AnyMessageKind | undefined {
    return this.names.get(name);
  }

  [Symbol.iterator](): Iterator<AnyMessageKind> {
    return this.byId.values();
  }
}

export function createCatalog(kinds: Iterable<AnyMessageKind>): MessageCatalog {
  return new MessageCatalog(kinds);
}

/** Handles one message kind: takes the decoded request, returns the reply. */
export type MessageHandler<Req, Rep> = (request: Req) => MaybePromise<Rep>;

type Route = (payload: Uint8Array) => Promise<Uint8Array>;

/**
 * LocalInterface that decodes each request with its kind's codec, runs the
 * registered handler and encodes the reply.
 *
 * @example
 * ```typescript
 * const local = createDispatcher(catalog)
 *   .on(ping, () => {})
 *   .on(echo, (text) => text);
 * ```
 */
export class Dispatcher implements LocalInterface {
  private routes = new Map<number, Route>();

  constructor(readonly catalog: MessageCatalog) {}

  /**
   * Register the handler for `kind`, replacing any earlier one.
   *
   * @throws Error if `kind` is not the catalog's entry for its identifier
   */
  on<Req, Rep>(kind: MessageKind<Req, Rep>, handler: MessageHandler<Req, Rep>): this {
    if (this.catalog.get(kind.id) !== kind) {
      throw new Error(`message ${kind.name} is not in this catalog`);
    }
    this.routes.set(kind.id, async (payload) => {
      const request = await kind.request.decode(payload);
      const reply = await handler(request);
      return kind.reply.encode(reply);
    });
    return this;
  }

  async handle(messageId: number, payload: Uint8Array): Promise<Uint8Array> {
    const kind = this.catalog.get(messageId);
    if (!kind) {
      throw new Error(`unsupported message identifier ${messageId}`);
    }
    const route = this.routes.get(messageId);
    if (!route) {
      throw new Error(`no handler registered for message ${kind.name}`);
    }
    return route(payload);
  }
}

export function createDispatcher(catalog: MessageCatalog): Dispatcher {
  return new Dispatcher(catalog);
}
