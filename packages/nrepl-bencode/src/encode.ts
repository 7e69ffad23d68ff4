// Bencode encoding.
//
// Dictionaries are written in the order given. Canonical bencode sorts keys,
// but protocol replies define their own key order, so ordering is the
// caller's job.

import { asciiDigits, concat, utf8Encode } from "./bytes.ts";
import type { Encodable } from "./value.ts";

const COLON = Uint8Array.of(0x3a);
const INT_START = Uint8Array.of(0x69);
const LIST_START = Uint8Array.of(0x6c);
const DICT_START = Uint8Array.of(0x64);
const END = Uint8Array.of(0x65);

export function encodeBytes(bytes: Uint8Array): Uint8Array {
  return concat(asciiDigits(bytes.length), COLON, bytes);
}

export function encodeString(str: string): Uint8Array {
  return encodeBytes(utf8Encode(str));
}

export function encodeInt(value: number | bigint): Uint8Array {
  if (typeof value === "number" && !Number.isSafeInteger(value)) {
    throw new Error(`cannot encode ${value} as a bencode integer`);
  }
  return concat(INT_START, asciiDigits(value), END);
}

export function encodeList(items: readonly Encodable[]): Uint8Array {
  return concat(LIST_START, ...items.map(encodeValue), END);
}

export function encodeDict(entries: Iterable<readonly [string, Encodable]>): Uint8Array {
  const parts: Uint8Array[] = [DICT_START];
  for (const [key, value] of entries) {
    parts.push(encodeString(key), encodeValue(value));
  }
  parts.push(END);
  return concat(...parts);
}

function isEncodableList(value: Encodable): value is readonly Encodable[] {
  return Array.isArray(value);
}

function isEncodableMap(value: Encodable): value is ReadonlyMap<string, Encodable> {
  return value instanceof Map;
}

/** Encode any supported value. */
export function encodeValue(value: Encodable): Uint8Array {
  if (value instanceof Uint8Array) return encodeBytes(value);
  if (typeof value === "string") return encodeString(value);
  if (typeof value === "number" || typeof value === "bigint") return encodeInt(value);
  if (isEncodableList(value)) return encodeList(value);
  if (isEncodableMap(value)) return encodeDict(value.entries());
  return encodeDict(Object.entries(value));
}
