// Bencode framing for TCP streams.
//
// nREPL puts bencode values back to back on the socket with no length prefix.
// Bytes are accumulated until the codec reports a complete value; a read may
// carry part of a request, exactly one, or several.

import net from "node:net";
import { BencodeError, frameLength } from "@nrepl-lite/bencode";
import { ConnectionError, type MessageTransport } from "@nrepl-lite/core";

/** Largest request accepted by default. */
export const DEFAULT_MAX_FRAME_SIZE = 1024 * 1024;

interface Waiter {
  resolve: (frame: Uint8Array | null) => void;
  reject: (err: ConnectionError) => void;
}

/**
 * A bencode-framed TCP connection.
 *
 * Malformed input cannot be resynchronised, so everything buffered when it is
 * detected is delivered as a single frame; decoding it fails and the peer gets
 * a decode error. Buffering more than `maxFrameSize` bytes without completing
 * a value fails the transport with `frame-too-large` and destroys the socket.
 * An incomplete value left when the peer finishes sending is delivered as a
 * final frame, so it is answered with a decode error too.
 *
 * Reading from the socket pauses while complete frames wait for `recv`.
 */
export class BencodeFramed implements MessageTransport {
  private socket: net.Socket;
  private buf: Buffer = Buffer.alloc(0);
  private pendingFrames: Uint8Array[] = [];
  private waiting: Waiter | null = null;
  private closed = false;
  private error: ConnectionError | null = null;

  constructor(
    socket: net.Socket,
    readonly maxFrameSize: number = DEFAULT_MAX_FRAME_SIZE,
  ) {
    this.socket = socket;

    socket.on("data", (chunk: Buffer) => {
      if (this.closed) return;
      this.buf = this.buf.length === 0 ? chunk : Buffer.concat([this.buf, chunk]);
      this.processBuffer();
    });

    socket.on("error", (err: Error) => {
      this.fail(ConnectionError.io(err.message, err));
    });

    // Peer finished sending. Frames already buffered are still delivered.
    socket.on("end", () => {
      if (!this.closed && this.buf.length > 0) {
        const tail = new Uint8Array(this.buf);
        this.buf = Buffer.alloc(0);
        this.deliver(tail);
      }
      this.finish();
    });

    socket.on("close", () => {
      this.finish();
    });
  }

  private processBuffer(): void {
    while (this.buf.length > 0) {
      let length: number | null;
      try {
        length = frameLength(this.buf);
      } catch (e) {
        if (!(e instanceof BencodeError)) throw e;
        length = this.buf.length;
      }

      if (length === null) {
        if (this.buf.length > this.maxFrameSize) {
          this.fail(ConnectionError.frameTooLarge(this.buf.length, this.maxFrameSize));
          this.socket.destroy();
        }
        return;
      }
      if (length > this.maxFrameSize) {
        this.fail(ConnectionError.frameTooLarge(length, this.maxFrameSize));
        this.socket.destroy();
        return;
      }

      const frame = new Uint8Array(this.buf.subarray(0, length));
      this.buf = this.buf.subarray(length);
      this.deliver(frame);
    }
  }

  private deliver(frame: Uint8Array): void {
    if (this.waiting) {
      this.waiting.resolve(frame);
      this.waiting = null;
    } else {
      this.pendingFrames.push(frame);
      this.socket.pause();
    }
  }

  private fail(err: ConnectionError): void {
    if (this.closed) return;
    this.closed = true;
    this.buf = Buffer.alloc(0);
    if (this.waiting) {
      this.waiting.reject(err);
      this.waiting = null;
    } else {
      this.error = err;
    }
  }

  private finish(): void {
    this.closed = true;
    this.buf = Buffer.alloc(0);
    if (this.waiting) {
      this.waiting.resolve(null);
      this.waiting = null;
    }
  }

  /** Send one encoded value. */
  send(payload: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (this.socket.destroyed || this.socket.writableEnded) {
        reject(ConnectionError.closed());
        return;
      }
      this.socket.write(payload, (err) => {
        if (err) reject(ConnectionError.io(err.message, err));
        else resolve();
      });
    });
  }

  /**
   * Receive the next complete value.
   *
   * Waits as long as it takes; there is no read timeout.
   */
  recv(): Promise<Uint8Array | null> {
    const frame = this.pendingFrames.shift();
    if (frame !== undefined) {
      if (this.pendingFrames.length === 0 && !this.closed) this.socket.resume();
      return Promise.resolve(frame);
    }

    if (this.error) {
      const err = this.error;
      this.error = null;
      return Promise.reject(err);
    }
    if (this.closed) {
      return Promise.resolve(null);
    }

    return new Promise((resolve, reject) => {
      this.waiting = { resolve, reject };
    });
  }

  /** Finish sending; the socket closes once the peer has finished too. */
  end(): void {
    if (!this.socket.destroyed) this.socket.end();
  }

  /** Close the connection immediately. */
  close(): void {
    this.socket.destroy();
  }
}
