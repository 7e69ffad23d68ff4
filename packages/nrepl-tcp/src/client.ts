// TCP client for talking to an nREPL server.

import net from "node:net";
import {
  type BencodeDict,
  type Encodable,
  encodeValue,
  isBytes,
  isList,
  utf8Decode,
} from "@nrepl-lite/bencode";
import { ConnectionError } from "@nrepl-lite/core";
import { decodeResponse, stringField } from "@nrepl-lite/wire";

import { BencodeFramed } from "./framing.ts";

/** Where to connect: `"host:port"` or its parts. */
export type ServerAddress = string | { host: string; port: number };

/** Result of a successful clone. */
export interface CloneResult {
  id: string;
  newSession: string;
}

function parseAddress(addr: ServerAddress): { host: string; port: number } {
  if (typeof addr !== "string") return addr;

  const lastColon = addr.lastIndexOf(":");
  if (lastColon < 0) {
    throw new Error(`Invalid address: ${addr}`);
  }
  const host = addr.slice(0, lastColon);
  const port = Number(addr.slice(lastColon + 1));
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid port in address: ${addr}`);
  }
  return { host, port };
}

/**
 * A connection to an nREPL server.
 *
 * Requests are answered in order, so `request` must not be called again
 * before the previous call has resolved.
 */
export class Client {
  private constructor(private readonly io: BencodeFramed) {}

  /** Open a connection. */
  static connect(addr: ServerAddress): Promise<Client> {
    return new Promise((resolve, reject) => {
      let target: { host: string; port: number };
      try {
        target = parseAddress(addr);
      } catch (e) {
        reject(e);
        return;
      }

      const socket = net.createConnection(target, () => {
        socket.off("error", onError);
        resolve(new Client(new BencodeFramed(socket)));
      });
      const onError = (err: Error) => {
        reject(ConnectionError.io(err.message, err));
      };
      socket.once("error", onError);
    });
  }

  /** Write raw bytes to the server. */
  write(bytes: Uint8Array): Promise<void> {
    return this.io.send(bytes);
  }

  /**
   * Read the next reply.
   *
   * @throws ConnectionError of kind `closed` when the server hung up
   */
  async read(): Promise<BencodeDict> {
    const frame = await this.io.recv();
    if (frame === null) {
      throw ConnectionError.closed();
    }
    return decodeResponse(frame);
  }

  /** Send a request dictionary and wait for its reply. */
  async request(fields: { readonly [key: string]: Encodable }): Promise<BencodeDict> {
    await this.write(encodeValue(fields));
    return this.read();
  }

  /**
   * Clone `id` into a session.
   *
   * @throws Error carrying the server's reason when the reply is an error
   */
  async clone(id: string): Promise<CloneResult> {
    const reply = await this.request({ op: "clone", id });
    const newSession = stringField(reply, "new-session");
    if (newSession === undefined) {
      throw new Error(`clone failed: ${stringField(reply, "reason") ?? "no new-session in reply"}`);
    }
    return { id: stringField(reply, "id") ?? id, newSession };
  }

  /** Ids of the sessions known to the server. */
  async lsSessions(): Promise<string[]> {
    const reply = await this.request({ op: "ls-sessions" });
    const sessions = reply.get("sessions");
    if (sessions === undefined || !isList(sessions)) {
      throw new Error(`ls-sessions failed: ${stringField(reply, "reason") ?? "no sessions in reply"}`);
    }
    return sessions.filter(isBytes).map(utf8Decode);
  }

  /** Finish sending; pending replies are still delivered. */
  end(): void {
    this.io.end();
  }

  /** Close the connection immediately. */
  close(): void {
    this.io.close();
  }
}
