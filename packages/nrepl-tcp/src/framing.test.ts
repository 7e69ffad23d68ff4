import net from "node:net";
import { once } from "node:events";
import { afterEach, describe, expect, it } from "vitest";
import { utf8Encode } from "@nrepl-lite/bencode";
import { ConnectionError } from "@nrepl-lite/core";

import { BencodeFramed } from "./framing.ts";

interface SocketPair {
  server: net.Socket;
  client: net.Socket;
}

let listeners: net.Server[] = [];
let sockets: net.Socket[] = [];

async function socketPair(): Promise<SocketPair> {
  const listener = net.createServer({ allowHalfOpen: true });
  listeners.push(listener);
  listener.listen(0, "127.0.0.1");
  await once(listener, "listening");

  const addr = listener.address();
  if (addr === null || typeof addr === "string") throw new Error("no address");
  const { port } = addr;

  const accepted = once(listener, "connection");
  const client = net.createConnection({ host: "127.0.0.1", port });
  await once(client, "connect");
  const [server] = await accepted;
  if (!(server instanceof net.Socket)) throw new Error("no socket");

  sockets.push(server, client);
  return { server, client };
}

const text = (buf: Uint8Array | null) => (buf === null ? null : new TextDecoder().decode(buf));
const tick = () => new Promise((resolve) => setTimeout(resolve, 20));

describe("BencodeFramed", () => {
  afterEach(async () => {
    for (const socket of sockets) socket.destroy();
    await Promise.all(listeners.map((l) => new Promise((resolve) => l.close(resolve))));
    sockets = [];
    listeners = [];
  });

  it("reassembles a value split across writes", async () => {
    const { server, client } = await socketPair();
    const framed = new BencodeFramed(server);

    client.write("d2:op5:cl");
    await tick();
    client.write("one2:id3:abce");

    expect(text(await framed.recv())).toBe("d2:op5:clone2:id3:abce");
  });

  it("splits several values from one write", async () => {
    const { server, client } = await socketPair();
    const framed = new BencodeFramed(server);

    client.write("d2:op4:evaled2:op9:ls-sessionse");

    expect(text(await framed.recv())).toBe("d2:op4:evale");
    expect(text(await framed.recv())).toBe("d2:op9:ls-sessionse");
  });

  it("delivers malformed input as one frame and keeps reading", async () => {
    const { server, client } = await socketPair();
    const framed = new BencodeFramed(server);

    client.write("d2:opxe");
    expect(text(await framed.recv())).toBe("d2:opxe");

    client.write("le");
    expect(text(await framed.recv())).toBe("le");
  });

  it("fails with frame-too-large when a value outgrows the limit", async () => {
    const { server, client } = await socketPair();
    const framed = new BencodeFramed(server, 64);

    client.write(`d4:code200:${"x".repeat(80)}`);

    const error = await framed.recv().then(
      () => null,
      (e: unknown) => e,
    );
    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({ kind: "frame-too-large" });
    expect(server.destroyed).toBe(true);
  });

  it("rejects a complete value above the limit", async () => {
    const { server, client } = await socketPair();
    const framed = new BencodeFramed(server, 8);

    client.write("d2:op5:clonee");

    await expect(framed.recv()).rejects.toMatchObject({
      kind: "frame-too-large",
      message: "request of at least 13 bytes exceeds the 8 byte limit",
    });
  });

  it("returns null once the peer has finished", async () => {
    const { server, client } = await socketPair();
    const framed = new BencodeFramed(server);

    client.end("i1e");

    expect(text(await framed.recv())).toBe("i1e");
    expect(await framed.recv()).toBeNull();
  });

  it("delivers an incomplete tail when the peer finishes", async () => {
    const { server, client } = await socketPair();
    const framed = new BencodeFramed(server);

    client.end("d2:op5:clone2:id3:ab");

    expect(text(await framed.recv())).toBe("d2:op5:clone2:id3:ab");
    expect(await framed.recv()).toBeNull();
  });

  it("pauses the socket while frames wait to be received", async () => {
    const { server, client } = await socketPair();
    const framed = new BencodeFramed(server);

    client.write("i1ei2e");
    await tick();
    expect(server.isPaused()).toBe(true);

    expect(text(await framed.recv())).toBe("i1e");
    expect(server.isPaused()).toBe(true);
    expect(text(await framed.recv())).toBe("i2e");
    expect(server.isPaused()).toBe(false);
  });

  it("sends bytes unchanged", async () => {
    const { server, client } = await socketPair();
    const framed = new BencodeFramed(server);
    const received = once(client, "data");

    await framed.send(utf8Encode("d6:status4:donee"));

    const [chunk] = await received;
    expect(String(chunk)).toBe("d6:status4:donee");
  });

  it("refuses to send after close", async () => {
    const { server } = await socketPair();
    const framed = new BencodeFramed(server);

    framed.close();

    await expect(framed.send(utf8Encode("le"))).rejects.toMatchObject({ kind: "closed" });
  });
});
