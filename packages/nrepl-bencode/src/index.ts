// @nrepl-lite/bencode - bencode encoding and decoding
//
// Byte strings, integers, lists and dictionaries, plus frame detection for
// reading whole values off a byte stream.

export {
  type BencodeDict,
  type BencodeValue,
  type Encodable,
  type DecodeResult,
  isBytes,
  isDict,
  isList,
  isInteger,
  kindOf,
} from "./value.ts";

export { concat, utf8Encode, utf8Decode, hexDump } from "./bytes.ts";

export {
  BencodeError,
  type BencodeErrorKind,
  MAX_DEPTH,
  decode,
  decodeValue,
  frameLength,
} from "./decode.ts";

export {
  encodeBytes,
  encodeString,
  encodeInt,
  encodeList,
  encodeDict,
  encodeValue,
} from "./encode.ts";
