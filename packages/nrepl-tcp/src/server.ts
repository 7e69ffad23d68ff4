// TCP server for accepting nREPL connections.

import net, { type AddressInfo } from "node:net";
import {
  Connection,
  ConnectionError,
  SessionHandler,
  SessionRegistry,
  createDefaultState,
  createLogger,
  type RandomSource,
  type ServerMiddleware,
} from "@nrepl-lite/core";

import { type ServerConfig, assertLoopbackHost, defaultServerConfig } from "./config.ts";
import { BencodeFramed } from "./framing.ts";

/** Collaborators a server is built with. */
export interface ServerOptions {
  /** Randomness for new session ids. Defaults to `Math.random`. */
  random?: RandomSource;
  /** Evaluator state for each new session. */
  createState?: () => unknown;
  /** Middleware run around every request, on every connection. */
  middleware?: readonly ServerMiddleware[];
}

/**
 * A TCP server that accepts nREPL connections.
 *
 * Connections are served concurrently and share one session registry; two
 * servers never share sessions. Only loopback addresses can be bound.
 *
 * @throws Error from the constructor when `config.host` is not loopback
 */
export class Server {
  readonly config: ServerConfig;
  readonly sessions: SessionRegistry<unknown>;

  private handler: SessionHandler<unknown>;
  private tcp: net.Server | null = null;
  private connections = new Set<Connection<BencodeFramed>>();
  private nextConnectionId = 1;
  private log = createLogger("nrepl:server");

  constructor(config?: Partial<ServerConfig>, options: ServerOptions = {}) {
    this.config = { ...defaultServerConfig(), ...config };
    assertLoopbackHost(this.config.host);
    this.sessions = new SessionRegistry<unknown>(options.createState ?? createDefaultState);
    this.handler = new SessionHandler(this.sessions, {
      random: options.random,
      middleware: options.middleware,
    });
  }

  /**
   * Bind the configured address and start accepting connections.
   *
   * Resolves with the bound address once the server is listening.
   */
  listen(): Promise<AddressInfo> {
    if (this.tcp) {
      return Promise.reject(new Error("Server is already listening"));
    }

    return new Promise((resolve, reject) => {
      const tcp = net.createServer({ allowHalfOpen: true }, async (socket) => {
        await this.accept(socket);
      });

      tcp.once("error", reject);
      tcp.listen(this.config.port, this.config.host, () => {
        tcp.off("error", reject);
        tcp.on("error", (err) => {
          this.log(`server error: ${err.message}`);
        });

        const addr = tcp.address();
        if (addr === null || typeof addr === "string") {
          tcp.close();
          reject(new Error(`Unexpected listen address: ${addr}`));
          return;
        }

        this.tcp = tcp;
        this.log(`listening on ${addr.address}:${addr.port}`);
        resolve(addr);
      });
    });
  }

  /**
   * Serve one accepted socket until it closes.
   *
   * Never rejects: a failing connection is logged and destroyed.
   */
  async accept(socket: net.Socket): Promise<void> {
    const id = this.nextConnectionId++;
    const peer = `${socket.remoteAddress}:${socket.remotePort}`;
    const io = new BencodeFramed(socket, this.config.maxFrameSize);
    const conn = new Connection(io, this.handler, { id, peer });

    this.connections.add(conn);
    this.log(`#${id} connected from ${peer}`);

    try {
      await conn.run();
      io.end();
    } catch (e) {
      if (!(e instanceof ConnectionError && e.kind === "closed")) {
        this.log(`#${id} connection error: ${e instanceof Error ? e.message : String(e)}`, {
          error: e,
        });
      }
      conn.close();
    } finally {
      this.connections.delete(conn);
    }
  }

  /** The bound address, or null when not listening. */
  address(): AddressInfo | null {
    const addr = this.tcp?.address();
    return addr && typeof addr !== "string" ? addr : null;
  }

  /**
   * Stop accepting, drop open connections and forget all sessions.
   */
  close(): Promise<void> {
    const tcp = this.tcp;
    this.tcp = null;

    for (const conn of this.connections) {
      conn.close();
    }
    this.connections.clear();
    this.sessions.clear();

    if (!tcp) return Promise.resolve();
    return new Promise((resolve, reject) => {
      tcp.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
