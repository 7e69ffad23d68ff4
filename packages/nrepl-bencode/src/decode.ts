// Bencode decoding.
//
// Grammar:
//   string  = <length> ":" <bytes>       length: decimal, no leading zeros
//   integer = "i" ["-"] <digits> "e"      no leading zeros, no "-0"
//   list    = "l" <value>* "e"
//   dict    = "d" (<string> <value>)* "e"
//
// Running out of input inside a value is reported as an "eof" error, distinct
// from malformed input, so stream readers can tell "wait for more bytes" apart
// from "this will never parse".

import { hexDump, utf8Decode } from "./bytes.ts";
import type { BencodeDict, BencodeValue, DecodeResult } from "./value.ts";

const BYTE_I = 0x69;
const BYTE_L = 0x6c;
const BYTE_D = 0x64;
const BYTE_E = 0x65;
const BYTE_COLON = 0x3a;
const BYTE_MINUS = 0x2d;
const BYTE_0 = 0x30;
const BYTE_9 = 0x39;

/** Maximum list/dictionary nesting accepted by the decoder. */
export const MAX_DEPTH = 64;

export type BencodeErrorKind =
  | "eof"
  | "syntax"
  | "integer"
  | "length"
  | "key"
  | "depth"
  | "trailing";

/** Error raised for input that is not (or not yet) a complete bencode value. */
export class BencodeError extends Error {
  constructor(
    public readonly kind: BencodeErrorKind,
    message: string,
    public readonly offset: number,
  ) {
    super(message);
    this.name = "BencodeError";
  }

  /** True when more input could still complete the value. */
  isIncomplete(): boolean {
    return this.kind === "eof";
  }
}

function isDigit(byte: number): boolean {
  return byte >= BYTE_0 && byte <= BYTE_9;
}

class Decoder {
  private depth = 0;

  constructor(
    private readonly buf: Uint8Array,
    private pos: number,
  ) {}

  get position(): number {
    return this.pos;
  }

  private fail(kind: BencodeErrorKind, message: string, offset = this.pos): BencodeError {
    const context = offset < this.buf.length ? ` (bytes: ${hexDump(this.buf, offset)})` : "";
    return new BencodeError(kind, `${message} at offset ${offset}${context}`, offset);
  }

  private peek(): number {
    if (this.pos >= this.buf.length) {
      throw this.fail("eof", "unexpected end of input");
    }
    return this.buf[this.pos];
  }

  value(): BencodeValue {
    const byte = this.peek();
    if (byte === BYTE_I) return this.integer();
    if (byte === BYTE_L) return this.list();
    if (byte === BYTE_D) return this.dict();
    if (isDigit(byte)) return this.bytes();
    throw this.fail("syntax", `unexpected byte 0x${byte.toString(16).padStart(2, "0")}`);
  }

  bytes(): Uint8Array {
    const start = this.pos;
    let digits = "";
    while (true) {
      const byte = this.peek();
      if (byte === BYTE_COLON) break;
      if (!isDigit(byte)) throw this.fail("length", "invalid byte in string length");
      digits += String.fromCharCode(byte);
      this.pos++;
    }
    if (digits.length === 0) throw this.fail("length", "empty string length", start);
    if (digits.length > 1 && digits[0] === "0") {
      throw this.fail("length", "string length has leading zeros", start);
    }
    const length = Number(digits);
    if (!Number.isSafeInteger(length)) throw this.fail("length", "string length too large", start);

    this.pos++; // ':'
    const end = this.pos + length;
    if (end > this.buf.length) {
      throw this.fail("eof", `string of ${length} bytes runs past end of input`, start);
    }
    const out = this.buf.slice(this.pos, end);
    this.pos = end;
    return out;
  }

  integer(): bigint {
    const start = this.pos;
    this.pos++; // 'i'
    let text = "";
    if (this.peek() === BYTE_MINUS) {
      text = "-";
      this.pos++;
    }
    while (true) {
      const byte = this.peek();
      if (byte === BYTE_E) break;
      if (!isDigit(byte)) throw this.fail("integer", "invalid byte in integer");
      text += String.fromCharCode(byte);
      this.pos++;
    }
    const digits = text.startsWith("-") ? text.slice(1) : text;
    if (digits.length === 0) throw this.fail("integer", "integer has no digits", start);
    if (digits.length > 1 && digits[0] === "0") {
      throw this.fail("integer", "integer has leading zeros", start);
    }
    if (text === "-0") throw this.fail("integer", "negative zero", start);
    this.pos++; // 'e'
    return BigInt(text);
  }

  list(): BencodeValue[] {
    this.enter();
    this.pos++; // 'l'
    const items: BencodeValue[] = [];
    while (this.peek() !== BYTE_E) {
      items.push(this.value());
    }
    this.pos++;
    this.depth--;
    return items;
  }

  dict(): BencodeDict {
    this.enter();
    this.pos++; // 'd'
    const out: BencodeDict = new Map();
    while (true) {
      const byte = this.peek();
      if (byte === BYTE_E) break;
      if (!isDigit(byte)) throw this.fail("key", "dictionary key is not a byte string");
      const keyStart = this.pos;
      const rawKey = this.bytes();
      let key: string;
      try {
        key = utf8Decode(rawKey);
      } catch {
        throw this.fail("key", "dictionary key is not valid UTF-8", keyStart);
      }
      out.set(key, this.value());
    }
    this.pos++;
    this.depth--;
    return out;
  }

  private enter(): void {
    this.depth++;
    if (this.depth > MAX_DEPTH) {
      throw this.fail("depth", `nesting deeper than ${MAX_DEPTH}`);
    }
  }
}

/**
 * Decode one bencode value starting at `offset`.
 *
 * Bytes after the value are left alone; `next` points at the first of them.
 */
export function decodeValue(buf: Uint8Array, offset = 0): DecodeResult<BencodeValue> {
  const decoder = new Decoder(buf, offset);
  const value = decoder.value();
  return { value, next: decoder.position };
}

/** Decode a buffer that must hold exactly one bencode value. */
export function decode(buf: Uint8Array): BencodeValue {
  const { value, next } = decodeValue(buf);
  if (next !== buf.length) {
    throw new BencodeError(
      "trailing",
      `${buf.length - next} trailing bytes after value at offset ${next}`,
      next,
    );
  }
  return value;
}

/**
 * Length of the first complete value in `buf`.
 *
 * Returns `null` when `buf` holds only a prefix of a value (including an empty
 * buffer). Malformed input throws a `BencodeError`.
 */
export function frameLength(buf: Uint8Array): number | null {
  try {
    return decodeValue(buf).next;
  } catch (e) {
    if (e instanceof BencodeError && e.isIncomplete()) return null;
    throw e;
  }
}
