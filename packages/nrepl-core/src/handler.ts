// Request handling: middleware around dispatch.

import { type Request, type Response, RequestError } from "@nrepl-lite/wire";

import { dispatch } from "./dispatch.ts";
import {
  Extensions,
  type ConnectionInfo,
  type RequestOutcome,
  type ServerContext,
  type ServerMiddleware,
} from "./middleware.ts";
import type { SessionRegistry } from "./session.ts";
import { type RandomSource, randomUuid } from "./uuid.ts";

/** Turns an interpreted request into a response. */
export interface RequestHandler {
  /**
   * @throws RequestError when the request is refused; the connection replies
   * with an error and keeps serving
   */
  handle(request: Request, connection: ConnectionInfo): Promise<Response>;
}

export interface SessionHandlerOptions {
  /** Random source for new session ids. Defaults to `Math.random`. */
  random?: RandomSource;
  middleware?: readonly ServerMiddleware[];
}

/**
 * Handler backed by a session registry.
 *
 * `pre` hooks run in order; the first rejection stops the chain and skips
 * dispatch. `post` hooks run in order for every request that reached `pre`.
 */
export class SessionHandler<E> implements RequestHandler {
  private readonly random: RandomSource;
  private readonly middleware: readonly ServerMiddleware[];

  constructor(
    readonly registry: SessionRegistry<E>,
    options: SessionHandlerOptions = {},
  ) {
    this.random = options.random ?? Math.random;
    this.middleware = options.middleware ?? [];
  }

  /** Return a copy of this handler with extra middleware appended. */
  with(middleware: ServerMiddleware): SessionHandler<E> {
    return new SessionHandler(this.registry, {
      random: this.random,
      middleware: [...this.middleware, middleware],
    });
  }

  async handle(request: Request, connection: ConnectionInfo): Promise<Response> {
    const ctx: ServerContext = { extensions: new Extensions(), connection };

    for (const mw of this.middleware) {
      const rejection = await mw.pre?.(ctx, request);
      if (rejection) {
        const error = RequestError.rejected(rejection.message);
        await this.runPost(ctx, request, { ok: false, error });
        throw error;
      }
    }

    const response = dispatch(this.registry, request, {
      newSessionId: () => randomUuid(this.random),
    });
    await this.runPost(ctx, request, { ok: true, response });
    return response;
  }

  private async runPost(ctx: ServerContext, request: Request, outcome: RequestOutcome): Promise<void> {
    for (const mw of this.middleware) {
      await mw.post?.(ctx, request, outcome);
    }
  }
}
