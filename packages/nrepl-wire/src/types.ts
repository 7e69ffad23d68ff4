// nREPL request and response types.
//
// Requests are tagged by their `op`; responses by `tag`. Adding an operation
// means one new request variant, one interpretation branch in interpret.ts and
// one dispatch branch, without touching the bencode layer.

import type { RequestErrorCode } from "./request_error.ts";

/** Opaque session token, chosen by the client on clone and minted by the server. */
export type SessionId = string;

/** Completion marker sent with every final reply. */
export const STATUS_DONE = "done";

// ============================================================================
// Requests
// ============================================================================

/** Clone a session (op = "clone"). `id` is the session the client names. */
export interface CloneRequest {
  op: "clone";
  id: SessionId;
}

/** Describe the server (op = "describe"). */
export interface DescribeRequest {
  op: "describe";
  id?: SessionId;
}

/** List known sessions (op = "ls-sessions"). */
export interface LsSessionsRequest {
  op: "ls-sessions";
  id?: SessionId;
}

export type Request = CloneRequest | DescribeRequest | LsSessionsRequest;

export type Operation = Request["op"];

/** Every operation the server understands, in the order `describe` reports them. */
export const OPERATIONS: readonly Operation[] = ["clone", "describe", "ls-sessions"];

// ============================================================================
// Responses
// ============================================================================

/** Reply to a clone. */
export interface ClonedResponse {
  tag: "Cloned";
  id: SessionId;
  newSession: SessionId;
  status: typeof STATUS_DONE;
}

/** Reply to describe. */
export interface DescribedResponse {
  tag: "Described";
  id?: SessionId;
  ops: readonly Operation[];
  versions: Readonly<Record<string, string>>;
  status: typeof STATUS_DONE;
}

/** Reply to ls-sessions. */
export interface SessionsResponse {
  tag: "Sessions";
  id?: SessionId;
  sessions: readonly SessionId[];
  status: typeof STATUS_DONE;
}

/** Typed rejection of a request that could not be served. */
export interface ErrorResponse {
  tag: "Error";
  id?: SessionId;
  op?: string;
  code: RequestErrorCode;
  reason: string;
}

export type Response = ClonedResponse | DescribedResponse | SessionsResponse | ErrorResponse;

// ============================================================================
// Factory functions
// ============================================================================

export function requestClone(id: SessionId): CloneRequest {
  return { op: "clone", id };
}

export function requestDescribe(id?: SessionId): DescribeRequest {
  return id === undefined ? { op: "describe" } : { op: "describe", id };
}

export function requestLsSessions(id?: SessionId): LsSessionsRequest {
  return id === undefined ? { op: "ls-sessions" } : { op: "ls-sessions", id };
}

export function responseCloned(id: SessionId, newSession: SessionId): ClonedResponse {
  return { tag: "Cloned", id, newSession, status: STATUS_DONE };
}

export function responseDescribed(
  ops: readonly Operation[],
  versions: Readonly<Record<string, string>>,
  id?: SessionId,
): DescribedResponse {
  const out: DescribedResponse = { tag: "Described", ops, versions, status: STATUS_DONE };
  if (id !== undefined) out.id = id;
  return out;
}

export function responseSessions(sessions: readonly SessionId[], id?: SessionId): SessionsResponse {
  const out: SessionsResponse = { tag: "Sessions", sessions, status: STATUS_DONE };
  if (id !== undefined) out.id = id;
  return out;
}

export function responseError(
  code: RequestErrorCode,
  reason: string,
  context: { id?: SessionId; op?: string } = {},
): ErrorResponse {
  const out: ErrorResponse = { tag: "Error", code, reason };
  if (context.id !== undefined) out.id = context.id;
  if (context.op !== undefined) out.op = context.op;
  return out;
}
