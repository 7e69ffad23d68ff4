// Request dispatch.
//
// No I/O happens here: a request mutates the registry and yields a response.

import {
  type Request,
  type Response,
  type SessionId,
  OPERATIONS,
  responseCloned,
  responseDescribed,
  responseSessions,
} from "@nrepl-lite/wire";

import type { SessionRegistry } from "./session.ts";

/** Version reported by `describe`. */
export const VERSION = "0.1.0";

export interface DispatchDeps {
  /** Mint an id for the session a clone hands back. */
  newSessionId(): SessionId;
}

/**
 * Apply a request to the registry.
 *
 * Clone is an unconditional upsert of `id`: cloning the same id twice
 * replaces its state and leaves the registry size unchanged. The minted
 * `new-session` id is returned to the client, not registered.
 */
export function dispatch<E>(
  registry: SessionRegistry<E>,
  request: Request,
  deps: DispatchDeps,
): Response {
  switch (request.op) {
    case "clone": {
      registry.upsert(request.id);
      return responseCloned(request.id, deps.newSessionId());
    }
    case "describe":
      return responseDescribed(OPERATIONS, { "nrepl-lite": VERSION }, request.id);
    case "ls-sessions":
      return responseSessions(registry.ids(), request.id);
  }
}
