// Turning decoded bencode into requests.

import {
  type BencodeValue,
  decodeValue,
  isBytes,
  isDict,
  kindOf,
  utf8Decode,
} from "@nrepl-lite/bencode";

import { RequestError, RequestErrorCode } from "./request_error.ts";
import { type Request, type SessionId, requestClone, requestDescribe, requestLsSessions } from "./types.ts";

/**
 * Flatten a decoded request into string fields.
 *
 * Every value must be a UTF-8 byte string; lists, integers and nested
 * dictionaries are rejected rather than coerced.
 */
export function toStringDict(value: BencodeValue): Map<string, string> {
  if (!isDict(value)) {
    throw RequestError.unexpectedShape(kindOf(value));
  }

  const out = new Map<string, string>();
  for (const [key, field] of value) {
    if (!isBytes(field)) throw RequestError.nonStringValue(key);
    try {
      out.set(key, utf8Decode(field));
    } catch (e) {
      throw new RequestError(RequestErrorCode.NON_STRING_VALUE, {
        field: key,
        message: `Value of ${key} is not valid UTF-8`,
        cause: e,
      });
    }
  }
  return out;
}

function required(dict: ReadonlyMap<string, string>, field: string): string {
  const value = dict.get(field);
  if (value === undefined) throw RequestError.missingField(field);
  return value;
}

/** Interpret string fields as a request. Fields the op does not use are ignored. */
export function interpretRequest(dict: ReadonlyMap<string, string>): Request {
  const op = dict.get("op");
  if (op === undefined) throw RequestError.missingOperation();

  switch (op) {
    case "clone":
      return requestClone(required(dict, "id"));
    case "describe":
      return requestDescribe(dict.get("id"));
    case "ls-sessions":
      return requestLsSessions(dict.get("id"));
    default:
      throw RequestError.unknownOperation(op);
  }
}

/**
 * Best-effort `id` and `op` of a request that failed to interpret, so the
 * error reply can echo them. Anything unreadable is left out.
 */
export function requestContext(buf: Uint8Array): { id?: SessionId; op?: string } {
  let value: BencodeValue;
  try {
    value = decodeValue(buf).value;
  } catch {
    return {};
  }
  if (!isDict(value)) return {};

  const context: { id?: SessionId; op?: string } = {};
  for (const key of ["id", "op"] as const) {
    const field = value.get(key);
    if (field === undefined || !isBytes(field)) continue;
    try {
      context[key] = utf8Decode(field);
    } catch {
      continue;
    }
  }
  return context;
}
