// Per-connection request loop.
//
// Generic over MessageTransport; the TCP server gives each accepted socket its
// own Connection over a BencodeFramed transport.

import {
  RequestError,
  decodeRequest,
  encodeResponse,
  requestContext,
  responseError,
} from "@nrepl-lite/wire";

import type { RequestHandler } from "./handler.ts";
import { type Logger, createLogger } from "./logging.ts";
import type { ConnectionInfo } from "./middleware.ts";
import type { MessageTransport } from "./transport.ts";

/**
 * Error that ends a connection.
 *
 * Unlike a RequestError, which only fails one request, this stops the
 * connection's loop. Other connections are unaffected.
 */
export class ConnectionError extends Error {
  constructor(
    public kind: "io" | "frame-too-large" | "closed",
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConnectionError";
  }

  static io(message: string, cause?: unknown): ConnectionError {
    return new ConnectionError("io", message, { cause });
  }

  static frameTooLarge(size: number, limit: number): ConnectionError {
    return new ConnectionError(
      "frame-too-large",
      `request of at least ${size} bytes exceeds the ${limit} byte limit`,
    );
  }

  static closed(): ConnectionError {
    return new ConnectionError("closed", "connection closed");
  }
}

/** A client connection being served. */
export class Connection<T extends MessageTransport = MessageTransport> {
  constructor(
    private readonly io: T,
    private readonly handler: RequestHandler,
    readonly info: ConnectionInfo,
    private readonly log: Logger = createLogger("nrepl:connection"),
  ) {}

  /** Get the underlying transport. */
  transport(): T {
    return this.io;
  }

  /**
   * Serve requests until the peer closes the connection.
   *
   * Requests are answered strictly in arrival order. A request that cannot be
   * decoded or served gets an error reply and the loop goes on.
   *
   * @throws ConnectionError when the transport fails
   */
  async run(): Promise<void> {
    while (true) {
      const payload = await this.io.recv();
      if (payload === null) {
        this.log(`#${this.info.id} closed by peer`);
        return;
      }

      const reply = await this.respond(payload);
      await this.io.send(reply);
    }
  }

  /** Produce the encoded reply for one request frame. */
  async respond(payload: Uint8Array): Promise<Uint8Array> {
    try {
      const request = decodeRequest(payload);
      const response = await this.handler.handle(request, this.info);
      return encodeResponse(response);
    } catch (e) {
      if (!(e instanceof RequestError)) throw e;
      this.log(`#${this.info.id} request failed: ${e.code}`, { error: e.message });
      return encodeResponse(responseError(e.code, e.message, requestContext(payload)));
    }
  }

  close(): void {
    this.io.close();
  }
}
