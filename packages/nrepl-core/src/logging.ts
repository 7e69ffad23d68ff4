// Logging for the nREPL server.
//
// Output is gated by the DEBUG environment variable, matched against a
// namespace the way npm's debug package does it: `DEBUG=nrepl:*` enables all
// server logging, `DEBUG=*,-nrepl:dispatch` everything but request logs.

import type { Request } from "@nrepl-lite/wire";
import type { ServerContext, ServerMiddleware, RequestOutcome } from "./middleware.ts";

const START_TIME = Symbol("logging:start-time");

/** Where log lines go. Defaults to stderr. */
export type LogSink = (message: string, data?: Record<string, unknown>) => void;

export type Logger = (message: string, data?: Record<string, unknown>) => void;

const stderrSink: LogSink = (message, data) => {
  if (data === undefined) console.error(message);
  else console.error(message, data);
};

/**
 * Check if a namespace is enabled by a DEBUG-style pattern list.
 * Supports wildcards (*) and exclusions (-prefix).
 */
export function isEnabled(namespace: string, setting = process.env.DEBUG): boolean {
  if (!setting) return false;

  const patterns = setting.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith("-")) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

/**
 * Match a namespace against a pattern with wildcard support.
 */
function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === "*") return true;

  const regexStr = pattern
    .replace(/[.+?^${}()|[\]\\]/g, "\\$&") // Escape special chars except *
    .replace(/\*/g, ".*");

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * Create a logger for a namespace. Whether it prints is decided per call, so
 * changing DEBUG takes effect immediately.
 */
export function createLogger(namespace: string, sink: LogSink = stderrSink): Logger {
  return (message, data) => {
    if (!isEnabled(namespace)) return;
    sink(`${namespace} ${message}`, data);
  };
}

export interface LoggingOptions {
  /**
   * Namespace for DEBUG matching. Defaults to "nrepl:dispatch".
   */
  namespace?: string;

  /**
   * Log request fields. Defaults to true.
   */
  logRequests?: boolean;

  /**
   * Log response fields. Defaults to true.
   */
  logResponses?: boolean;

  /**
   * Minimum duration (ms) to log a response. Defaults to 0.
   */
  minDuration?: number;

  sink?: LogSink;
}

/**
 * Create a middleware that logs each request and its outcome with timing.
 *
 * - Request: `→ clone` with `{ type: "request", op, connection, request? }`
 * - Response: `← clone: ✓ 0.12ms` with `{ type: "response", op, duration, ok, response? }`
 * - Rejection: `← clone: ✗ 0.12ms` with `{ ..., ok: false, errorCode, error }`
 */
export function loggingMiddleware(options: LoggingOptions = {}): ServerMiddleware {
  const namespace = options.namespace ?? "nrepl:dispatch";
  const logRequests = options.logRequests ?? true;
  const logResponses = options.logResponses ?? true;
  const minDuration = options.minDuration ?? 0;
  const sink = options.sink ?? stderrSink;

  return {
    pre(ctx: ServerContext, request: Request): void {
      ctx.extensions.set(START_TIME, performance.now());

      if (!isEnabled(namespace)) return;

      const logObj: Record<string, unknown> = {
        type: "request",
        op: request.op,
        connection: ctx.connection.id,
      };
      if (logRequests) {
        logObj.request = { ...request };
      }

      sink(`→ ${request.op}`, logObj);
    },

    post(ctx: ServerContext, request: Request, outcome: RequestOutcome): void {
      const startTime = ctx.extensions.get<number>(START_TIME);
      if (startTime === undefined) return;

      const duration = performance.now() - startTime;
      if (duration < minDuration) return;
      if (!isEnabled(namespace)) return;

      const logObj: Record<string, unknown> = {
        type: "response",
        op: request.op,
        connection: ctx.connection.id,
        duration: `${duration.toFixed(2)}ms`,
      };

      if (outcome.ok) {
        logObj.ok = true;
        if (logResponses) {
          logObj.response = { ...outcome.response };
        }
        sink(`← ${request.op}: ✓ ${duration.toFixed(2)}ms`, logObj);
      } else {
        logObj.ok = false;
        logObj.errorCode = outcome.error.code;
        logObj.error = outcome.error.message;
        sink(`← ${request.op}: ✗ ${duration.toFixed(2)}ms`, logObj);
      }
    },
  };
}
