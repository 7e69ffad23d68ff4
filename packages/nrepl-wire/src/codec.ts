// Wire codec for nREPL requests and responses.
//
// Replies are dictionaries whose keys go out in a fixed order per reply kind;
// a clone reply is always `id`, `new-session`, `status`.

import {
  type BencodeDict,
  type BencodeValue,
  type Encodable,
  BencodeError,
  decode,
  encodeDict,
  isBytes,
  isDict,
  kindOf,
  utf8Decode,
} from "@nrepl-lite/bencode";

import { interpretRequest, toStringDict } from "./interpret.ts";
import { RequestError } from "./request_error.ts";
import type { Request, Response } from "./types.ts";

/**
 * Decode one request.
 *
 * @throws RequestError for malformed bencode, a non-dictionary request, a
 * non-string field, or a missing/unknown op
 */
export function decodeRequest(buf: Uint8Array): Request {
  let value: BencodeValue;
  try {
    value = decode(buf);
  } catch (e) {
    if (e instanceof BencodeError) throw RequestError.decode(e);
    throw e;
  }
  return interpretRequest(toStringDict(value));
}

function responseEntries(response: Response): Array<[string, Encodable]> {
  const entries: Array<[string, Encodable]> = [];
  if (response.id !== undefined) entries.push(["id", response.id]);

  switch (response.tag) {
    case "Cloned":
      entries.push(["new-session", response.newSession], ["status", response.status]);
      break;
    case "Described":
      entries.push(
        ["ops", new Map(response.ops.map((op): [string, Encodable] => [op, new Map<string, Encodable>()]))],
        ["versions", new Map(Object.entries(response.versions))],
        ["status", response.status],
      );
      break;
    case "Sessions":
      entries.push(["sessions", response.sessions], ["status", response.status]);
      break;
    case "Error":
      if (response.op !== undefined) entries.push(["op", response.op]);
      entries.push(["status", ["error", response.code, "done"]], ["reason", response.reason]);
      break;
  }
  return entries;
}

/** Encode a response as a bencode dictionary. */
export function encodeResponse(response: Response): Uint8Array {
  return encodeDict(responseEntries(response));
}

/** Decode a reply dictionary, as a client sees it. */
export function decodeResponse(buf: Uint8Array): BencodeDict {
  const value = decode(buf);
  if (!isDict(value)) {
    throw new Error(`Expected a response dictionary, got ${kindOf(value)}`);
  }
  return value;
}

/** Read a UTF-8 string field of a reply, or `undefined` if absent or not a string. */
export function stringField(dict: BencodeDict, key: string): string | undefined {
  const value = dict.get(key);
  if (value === undefined || !isBytes(value)) return undefined;
  return utf8Decode(value);
}
