import { describe, expect, it } from "vitest";
import { utf8Encode } from "@nrepl-lite/bencode";
import { decodeResponse, stringField } from "@nrepl-lite/wire";

import { Connection, ConnectionError } from "./connection.ts";
import { SessionHandler } from "./handler.ts";
import { SessionRegistry, createDefaultState } from "./session.ts";
import type { MessageTransport } from "./transport.ts";
import { UUID_V4_PATTERN } from "./uuid.ts";

/** Transport fed from a fixed list of frames; `null` after the last one. */
class MemoryTransport implements MessageTransport {
  sent: Uint8Array[] = [];
  closed = false;

  constructor(private incoming: Array<Uint8Array | Error>) {}

  async send(payload: Uint8Array): Promise<void> {
    this.sent.push(payload);
  }

  async recv(): Promise<Uint8Array | null> {
    const next = this.incoming.shift();
    if (next === undefined) return null;
    if (next instanceof Error) throw next;
    return next;
  }

  close(): void {
    this.closed = true;
  }
}

const text = (buf: Uint8Array) => new TextDecoder().decode(buf);

function serve(frames: Array<string | Error>, logs: string[] = []) {
  const io = new MemoryTransport(frames.map((f) => (typeof f === "string" ? utf8Encode(f) : f)));
  const registry = new SessionRegistry(createDefaultState);
  const handler = new SessionHandler(registry, { random: () => 0 });
  const conn = new Connection(io, handler, { id: 1, peer: "127.0.0.1:40000" }, (m) =>
    logs.push(m),
  );
  return { io, registry, conn };
}

describe("Connection", () => {
  it("answers a clone request", async () => {
    const { io, registry, conn } = serve(["d2:op5:clone2:id3:abce"]);
    await conn.run();

    expect(io.sent).toHaveLength(1);
    const reply = decodeResponse(io.sent[0]);
    expect([...reply.keys()]).toEqual(["id", "new-session", "status"]);
    expect(stringField(reply, "id")).toBe("abc");
    expect(stringField(reply, "new-session")).toMatch(UUID_V4_PATTERN);
    expect(stringField(reply, "status")).toBe("done");
    expect(registry.has("abc")).toBe(true);
  });

  it("writes the exact clone reply bytes", async () => {
    const { io, conn } = serve(["d2:op5:clone2:id3:abce"]);
    await conn.run();

    expect(text(io.sent[0])).toBe(
      "d2:id3:abc11:new-session36:00000000-0000-4000-8000-0000000000006:status4:donee",
    );
  });

  it("rejects an unknown op and keeps serving", async () => {
    const logs: string[] = [];
    const { io, conn } = serve(["d2:op4:evale", "d2:op5:clone2:id1:xe"], logs);
    await conn.run();

    expect(io.sent).toHaveLength(2);
    expect(text(io.sent[0])).toBe(
      "d2:op4:eval6:statusl5:error10:unknown-op4:donee6:reason23:Unknown operation: evale",
    );
    expect(stringField(decodeResponse(io.sent[1]), "id")).toBe("x");
    expect(logs).toEqual(["#1 request failed: unknown-op", "#1 closed by peer"]);
  });

  it("names the missing field", async () => {
    const { io, conn } = serve(["d2:op5:clonee"]);
    await conn.run();

    expect(text(io.sent[0])).toBe(
      "d2:op5:clone6:statusl5:error13:missing-field4:donee6:reason26:Missing required field: ide",
    );
  });

  it("echoes the id of a rejected request", async () => {
    const { io, conn } = serve(["d2:id3:abc2:op5:bogus4:codei1ee"]);
    await conn.run();

    const reply = decodeResponse(io.sent[0]);
    expect(stringField(reply, "id")).toBe("abc");
    expect(stringField(reply, "op")).toBe("bogus");
  });

  it.each([
    ["d2:op", "decode-error"],
    ["i42e", "unexpected-shape"],
    ["d2:op5:clone2:idi7ee", "non-string-value"],
    ["d2:id3:abce", "no-op"],
  ])("answers %j with %s", async (frame, code) => {
    const { io, conn } = serve([frame]);
    await conn.run();

    const status = decodeResponse(io.sent[0]).get("status");
    expect(status).toEqual([utf8Encode("error"), utf8Encode(code), utf8Encode("done")]);
  });

  it("returns when the peer closes", async () => {
    const { io, conn } = serve([]);
    await expect(conn.run()).resolves.toBeUndefined();
    expect(io.sent).toHaveLength(0);
  });

  it("ends on a transport error after answering earlier requests", async () => {
    const { io, conn } = serve(["d2:op5:clone2:id1:ae", ConnectionError.frameTooLarge(600, 512)]);

    await expect(conn.run()).rejects.toMatchObject({ kind: "frame-too-large" });
    expect(io.sent).toHaveLength(1);
  });

  it("closes its transport", () => {
    const { io, conn } = serve([]);
    conn.close();
    expect(io.closed).toBe(true);
    expect(conn.transport()).toBe(io);
  });
});

describe("ConnectionError", () => {
  it("describes an oversized request", () => {
    const error = ConnectionError.frameTooLarge(600, 512);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("ConnectionError");
    expect(error.kind).toBe("frame-too-large");
    expect(error.message).toBe("request of at least 600 bytes exceeds the 512 byte limit");
  });

  it("keeps the cause of I/O errors", () => {
    const cause = new Error("EPIPE");
    const error = ConnectionError.io("write failed", cause);
    expect(error.kind).toBe("io");
    expect(error.cause).toBe(cause);
  });
});
