import { describe, it, expect } from "vitest";
import { DecodeError, type Serializable, unit, utf8, optional } from "@pairwire/codec";
import { createCatalog, createDispatcher, defineMessage } from "./catalog.ts";
import { type Caller, type CallerRequest, MiddlewareCaller } from "./caller.ts";
import type { ClientMiddleware } from "./middleware.ts";

const ping = defineMessage({ id: 0, name: "ping", request: unit, reply: unit });
const echo = defineMessage({ id: 1, name: "echo", request: utf8, reply: utf8 });
const lookup = defineMessage({ id: 200, name: "lookup", request: utf8, reply: optional(utf8) });

class ScriptedCaller implements Caller {
  readonly requests: CallerRequest[] = [];

  constructor(private readonly reply: Uint8Array) {}

  async call(request: CallerRequest): Promise<Uint8Array> {
    this.requests.push(request);
    return this.reply;
  }

  with(middleware: ClientMiddleware): Caller {
    return new MiddlewareCaller(this, [middleware]);
  }
}

const evenOnly: Serializable<number> = {
  encode(value) {
    if (value % 2 !== 0) throw new RangeError(`odd: ${value}`);
    return Uint8Array.of(value);
  },
  decode: (bytes) => bytes[0],
};

describe("defineMessage", () => {
  it("keeps the definition", () => {
    expect(echo.id).toBe(1);
    expect(echo.name).toBe("echo");
    expect(echo.request).toBe(utf8);
  });

  it("rejects identifiers outside one byte", () => {
    expect(() => defineMessage({ id: 256, name: "big", request: unit, reply: unit })).toThrow(
      new RangeError("message big: identifier 256 outside 0..255"),
    );
    expect(() => defineMessage({ id: -1, name: "neg", request: unit, reply: unit })).toThrow(RangeError);
    expect(() => defineMessage({ id: 1.5, name: "frac", request: unit, reply: unit })).toThrow(RangeError);
  });

  it("encodes the request, calls, and decodes the reply", async () => {
    const caller = new ScriptedCaller(Uint8Array.of(0x6f, 0x6b));

    const reply = await echo.send("hi", caller, { timeoutMs: 250 });

    expect(reply).toBe("ok");
    expect(caller.requests).toEqual([
      { message: "echo", messageId: 1, value: "hi", payload: Uint8Array.of(0x68, 0x69), timeoutMs: 250 },
    ]);
  });

  it("decodes optional replies", async () => {
    expect(await lookup.send("k", new ScriptedCaller(Uint8Array.of(0)))).toBeNull();
    expect(await lookup.send("k", new ScriptedCaller(Uint8Array.of(1, 0x76)))).toBe("v");
  });

  it("does not call when the request cannot be encoded", async () => {
    const half = defineMessage({ id: 5, name: "half", request: evenOnly, reply: unit });
    const caller = new ScriptedCaller(new Uint8Array(0));

    await expect(half.send(3, caller)).rejects.toThrow(new RangeError("odd: 3"));
    expect(caller.requests).toHaveLength(0);
  });

  it("propagates reply decoding failures", async () => {
    await expect(ping.send(undefined, new ScriptedCaller(Uint8Array.of(1)))).rejects.toBeInstanceOf(
      DecodeError,
    );
  });
});

describe("createCatalog", () => {
  const catalog = createCatalog([ping, echo, lookup]);

  it("looks kinds up by identifier and name", () => {
    expect(catalog.size).toBe(3);
    expect(catalog.has(200)).toBe(true);
    expect(catalog.has(2)).toBe(false);
    expect(catalog.get(1)).toBe(echo);
    expect(catalog.get(2)).toBeUndefined();
    expect(catalog.byName("ping")).toBe(ping);
    expect(catalog.byName("pong")).toBeUndefined();
  });

  it("iterates in registration order", () => {
    expect([...catalog].map((kind) => kind.name)).toEqual(["ping", "echo", "lookup"]);
  });

  it("rejects duplicate identifiers", () => {
    const clash = defineMessage({ id: 1, name: "shout", request: utf8, reply: utf8 });
    expect(() => createCatalog([echo, clash])).toThrow("message shout: identifier 1 already used by echo");
  });

  it("rejects duplicate names", () => {
    const again = defineMessage({ id: 9, name: "echo", request: utf8, reply: utf8 });
    expect(() => createCatalog([echo, again])).toThrow("duplicate message name: echo");
  });
});

describe("Dispatcher", () => {
  const catalog = createCatalog([ping, echo, lookup]);

  it("decodes, runs the handler and encodes the reply", async () => {
    const local = createDispatcher(catalog).on(echo, (text) => text.toUpperCase());
    const reply = await local.handle(1, Uint8Array.of(0x68, 0x69));
    expect(Array.from(reply)).toEqual([0x48, 0x49]);
  });

  it("awaits asynchronous handlers", async () => {
    const local = createDispatcher(catalog).on(lookup, async (key) => (key === "k" ? "v" : null));
    expect(Array.from(await local.handle(200, Uint8Array.of(0x6b)))).toEqual([1, 0x76]);
    expect(Array.from(await local.handle(200, Uint8Array.of(0x78)))).toEqual([0]);
  });

  it("fails messages without a handler", async () => {
    const local = createDispatcher(catalog).on(ping, () => {});
    await expect(local.handle(1, new Uint8Array(0))).rejects.toThrow("no handler registered for message echo");
  });

  it("fails identifiers outside the catalog", async () => {
    await expect(createDispatcher(catalog).handle(7, new Uint8Array(0))).rejects.toThrow(
      "unsupported message identifier 7",
    );
  });

  it("propagates request decoding and handler failures", async () => {
    const local = createDispatcher(catalog)
      .on(ping, () => {})
      .on(echo, () => {
        throw new Error("echo is down");
      });
    await expect(local.handle(0, Uint8Array.of(1))).rejects.toBeInstanceOf(DecodeError);
    await expect(local.handle(1, new Uint8Array(0))).rejects.toThrow("echo is down");
  });

  it("only accepts kinds from its catalog", () => {
    const stranger = defineMessage({ id: 1, name: "echo", request: utf8, reply: utf8 });
    expect(() => createDispatcher(catalog).on(stranger, (text) => text)).toThrow(
      "message echo is not in this catalog",
    );
  });
});
