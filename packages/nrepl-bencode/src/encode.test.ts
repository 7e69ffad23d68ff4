import { describe, expect, it } from "vitest";

import {
  encodeBytes,
  encodeDict,
  encodeInt,
  encodeList,
  encodeString,
  encodeValue,
} from "./encode.ts";
import { decode } from "./decode.ts";
import { utf8Encode } from "./bytes.ts";

const text = (buf: Uint8Array) => new TextDecoder().decode(buf);

describe("encode", () => {
  it("encodes strings with their byte length", () => {
    expect(text(encodeString("spam"))).toBe("4:spam");
    expect(text(encodeString(""))).toBe("0:");
    // "é" is two bytes in UTF-8
    expect(text(encodeString("é"))).toBe("2:é");
  });

  it("encodes raw bytes", () => {
    expect(Array.from(encodeBytes(Uint8Array.of(0, 255)))).toEqual([0x32, 0x3a, 0, 255]);
  });

  it("encodes integers", () => {
    expect(text(encodeInt(42))).toBe("i42e");
    expect(text(encodeInt(-3n))).toBe("i-3e");
    expect(text(encodeInt(0))).toBe("i0e");
  });

  it("rejects numbers that are not safe integers", () => {
    expect(() => encodeInt(1.5)).toThrow(/cannot encode 1.5/);
    expect(() => encodeInt(Number.MAX_SAFE_INTEGER + 1)).toThrow();
  });

  it("encodes lists", () => {
    expect(text(encodeList(["a", 1, []]))).toBe("l1:ai1elee");
  });

  it("keeps dictionary entries in the given order", () => {
    const entries: Array<[string, string]> = [
      ["status", "done"],
      ["id", "abc"],
    ];
    const encoded = encodeDict(entries);
    expect(text(encoded)).toBe("d6:status4:done2:id3:abce");
  });

  it("encodes maps and plain objects as dictionaries", () => {
    expect(text(encodeValue(new Map([["k", "v"]])))).toBe("d1:k1:ve");
    expect(text(encodeValue({ b: "1", a: ["x"] }))).toBe("d1:b1:11:al1:xee");
  });

  it("re-encodes a decoded value to the same bytes", () => {
    const wire = utf8Encode("d2:op5:clone2:id3:abc4:argsli1ei-2eee");
    expect(text(encodeValue(decode(wire)))).toBe(text(wire));
  });
});
