// nREPL wire protocol types and codec
//
// Request/response model, the request error taxonomy, interpretation of
// decoded dictionaries into requests, and reply encoding.

// ============================================================================
// Request Errors
// ============================================================================

export { RequestError, RequestErrorCode } from "./request_error.ts";

// ============================================================================
// Wire Types
// ============================================================================

export type {
  SessionId,
  CloneRequest,
  DescribeRequest,
  LsSessionsRequest,
  Request,
  Operation,
  ClonedResponse,
  DescribedResponse,
  SessionsResponse,
  ErrorResponse,
  Response,
} from "./types.ts";

export {
  STATUS_DONE,
  OPERATIONS,
  requestClone,
  requestDescribe,
  requestLsSessions,
  responseCloned,
  responseDescribed,
  responseSessions,
  responseError,
} from "./types.ts";

// ============================================================================
// Interpretation and Codec
// ============================================================================

export { toStringDict, interpretRequest, requestContext } from "./interpret.ts";
export { decodeRequest, encodeResponse, decodeResponse, stringField } from "./codec.ts";
