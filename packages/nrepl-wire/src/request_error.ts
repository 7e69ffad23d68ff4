// Request-level errors.
//
// A RequestError affects only the request that raised it: the connection
// answers with an error reply and keeps serving.

/** Error codes, valued by the name sent in the reply's `status` list. */
export const RequestErrorCode = {
  /** Bytes are not valid bencode */
  DECODE_ERROR: "decode-error",
  /** Decoded value is not a dictionary */
  UNEXPECTED_SHAPE: "unexpected-shape",
  /** A dictionary value is not a UTF-8 byte string */
  NON_STRING_VALUE: "non-string-value",
  /** No `op` key */
  MISSING_OPERATION: "no-op",
  /** `op` names an operation the server does not support */
  UNKNOWN_OPERATION: "unknown-op",
  /** A field the operation requires is absent */
  MISSING_FIELD: "missing-field",
  /** Server middleware refused the request */
  REJECTED: "rejected",
} as const;

export type RequestErrorCode = (typeof RequestErrorCode)[keyof typeof RequestErrorCode];

export class RequestError extends Error {
  readonly code: RequestErrorCode;
  /** Name of the missing or offending field, where there is one. */
  readonly field: string | null;

  constructor(
    code: RequestErrorCode,
    options: { field?: string; message?: string; cause?: unknown } = {},
  ) {
    super(options.message ?? RequestError.codeToMessage(code, options.field), {
      cause: options.cause,
    });
    this.name = "RequestError";
    this.code = code;
    this.field = options.field ?? null;
  }

  static decode(cause: unknown): RequestError {
    const detail = cause instanceof Error ? `: ${cause.message}` : "";
    return new RequestError(RequestErrorCode.DECODE_ERROR, {
      message: `Malformed bencode${detail}`,
      cause,
    });
  }

  static unexpectedShape(kind: string): RequestError {
    return new RequestError(RequestErrorCode.UNEXPECTED_SHAPE, {
      message: `Expected a dictionary, got ${kind}`,
    });
  }

  static nonStringValue(field: string): RequestError {
    return new RequestError(RequestErrorCode.NON_STRING_VALUE, { field });
  }

  static missingOperation(): RequestError {
    return new RequestError(RequestErrorCode.MISSING_OPERATION);
  }

  static unknownOperation(op: string): RequestError {
    return new RequestError(RequestErrorCode.UNKNOWN_OPERATION, {
      message: `Unknown operation: ${op}`,
    });
  }

  static missingField(field: string): RequestError {
    return new RequestError(RequestErrorCode.MISSING_FIELD, { field });
  }

  static rejected(message: string): RequestError {
    return new RequestError(RequestErrorCode.REJECTED, { message });
  }

  private static codeToMessage(code: RequestErrorCode, field?: string): string {
    switch (code) {
      case RequestErrorCode.DECODE_ERROR:
        return "Malformed bencode";
      case RequestErrorCode.UNEXPECTED_SHAPE:
        return "Expected a dictionary";
      case RequestErrorCode.NON_STRING_VALUE:
        return `Value of ${field ?? "field"} is not a string`;
      case RequestErrorCode.MISSING_OPERATION:
        return "No op given";
      case RequestErrorCode.UNKNOWN_OPERATION:
        return "Unknown operation";
      case RequestErrorCode.MISSING_FIELD:
        return `Missing required field: ${field ?? "unknown"}`;
      case RequestErrorCode.REJECTED:
        return "Rejected";
    }
  }
}
