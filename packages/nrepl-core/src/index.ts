// @nrepl-lite/core - sessions, dispatch and the connection loop
//
// Transport-agnostic: anything implementing MessageTransport can be served.

export { type RandomSource, UUID_V4_PATTERN, randomUuid } from "./uuid.ts";

export { type EvaluatorState, SessionRegistry, createDefaultState } from "./session.ts";

export { type DispatchDeps, VERSION, dispatch } from "./dispatch.ts";

export {
  Extensions,
  type ConnectionInfo,
  type ServerContext,
  type RequestOutcome,
  type Rejection,
  type ServerMiddleware,
} from "./middleware.ts";

export {
  type LogSink,
  type Logger,
  type LoggingOptions,
  isEnabled,
  createLogger,
  loggingMiddleware,
} from "./logging.ts";

export { type RequestHandler, type SessionHandlerOptions, SessionHandler } from "./handler.ts";

export { type MessageTransport } from "./transport.ts";

export { Connection, ConnectionError } from "./connection.ts";
