// Bencode value model.
//
// Byte strings stay raw (`Uint8Array`) because bencode carries arbitrary bytes;
// dictionary keys are decoded as UTF-8 since every key the protocol uses is text.

/** A bencode dictionary. Insertion order is the wire order. */
export type BencodeDict = Map<string, BencodeValue>;

export type BencodeValue = Uint8Array | bigint | BencodeValue[] | BencodeDict;

/**
 * Values accepted by the encoder.
 *
 * Strings are encoded as UTF-8 byte strings and numbers must be safe integers.
 * Plain objects are encoded as dictionaries in property order.
 */
export type Encodable =
  | Uint8Array
  | string
  | bigint
  | number
  | readonly Encodable[]
  | ReadonlyMap<string, Encodable>
  | { readonly [key: string]: Encodable };

/** Result of decoding one value: the value and the offset just past it. */
export interface DecodeResult<T> {
  value: T;
  next: number;
}

export function isBytes(value: BencodeValue): value is Uint8Array {
  return value instanceof Uint8Array;
}

export function isDict(value: BencodeValue): value is BencodeDict {
  return value instanceof Map;
}

export function isList(value: BencodeValue): value is BencodeValue[] {
  return Array.isArray(value);
}

export function isInteger(value: BencodeValue): value is bigint {
  return typeof value === "bigint";
}

/** Human-readable kind of a value, for error messages. */
export function kindOf(value: BencodeValue): "bytes" | "integer" | "list" | "dict" {
  if (isBytes(value)) return "bytes";
  if (isInteger(value)) return "integer";
  if (isList(value)) return "list";
  return "dict";
}
