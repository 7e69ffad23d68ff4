/**
 * Message transport abstraction.
 *
 * A byte stream carries back-to-back bencode values with no length prefix, so
 * stream transports must find value boundaries themselves (BencodeFramed in
 * nrepl-tcp does this with the codec's `frameLength`). Tests use in-memory
 * transports.
 */
export interface MessageTransport {
  /**
   * Send one encoded reply.
   */
  send(payload: Uint8Array): Promise<void>;

  /**
   * Receive one complete request.
   *
   * Resolves `null` when the peer closed the connection cleanly. Rejects with
   * a ConnectionError when the connection failed or a request outgrew the
   * transport's limit.
   */
  recv(): Promise<Uint8Array | null>;

  /**
   * Close the transport.
   */
  close(): void;
}
