// Server-side middleware.
//
// Middleware wraps dispatch: `pre` sees each interpreted request before it
// touches the session registry and may reject it; `post` observes the outcome.
// Logging is built on these hooks.

import type { Request, RequestError, Response } from "@nrepl-lite/wire";

/**
 * Extensions provide type-safe, symbol-keyed storage for middleware state.
 *
 * Each middleware can define a unique symbol and store/retrieve typed data
 * without conflicts with other middleware.
 *
 * @example
 * ```typescript
 * const START = Symbol("start");
 * ctx.extensions.set(START, performance.now());
 * const start = ctx.extensions.get<number>(START);
 * ```
 */
export class Extensions {
  private data = new Map<symbol, unknown>();

  set<T>(key: symbol, value: T): void {
    this.data.set(key, value);
  }

  get<T>(key: symbol): T | undefined {
    return this.data.get(key) as T | undefined;
  }
}

/** The connection a request arrived on. */
export interface ConnectionInfo {
  /** Server-assigned, increasing from 1. */
  readonly id: number;
  /** Remote address, `host:port`. */
  readonly peer: string;
}

/** Shared state for the pre/post hooks of a single request. */
export interface ServerContext {
  extensions: Extensions;
  connection: ConnectionInfo;
}

/** Outcome of a request once it has been through dispatch (or been rejected). */
export type RequestOutcome =
  | { ok: true; response: Response }
  | { ok: false; error: RequestError };

/** Returned by `pre` to refuse a request. The client gets a `rejected` error reply. */
export interface Rejection {
  message: string;
}

export interface ServerMiddleware {
  /**
   * Called before dispatch.
   *
   * @returns void to continue, a Rejection to answer with an error instead
   */
  pre?(ctx: ServerContext, request: Request): Promise<Rejection | void> | Rejection | void;

  /** Called after dispatch, or after a rejection. */
  post?(ctx: ServerContext, request: Request, outcome: RequestOutcome): Promise<void> | void;
}
