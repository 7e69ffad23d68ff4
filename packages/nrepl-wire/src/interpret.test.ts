import { describe, expect, it } from "vitest";
import { decode, utf8Encode } from "@nrepl-lite/bencode";

import { interpretRequest, requestContext, toStringDict } from "./interpret.ts";
import { RequestError, RequestErrorCode } from "./request_error.ts";

function requestErrorOf(fn: () => unknown): RequestError {
  try {
    fn();
  } catch (e) {
    if (e instanceof RequestError) return e;
    throw e;
  }
  throw new Error("expected a RequestError");
}

const wire = (str: string) => decode(utf8Encode(str));

describe("toStringDict", () => {
  it("flattens a dictionary of byte strings", () => {
    const dict = toStringDict(wire("d2:op5:clone2:id3:abce"));
    expect([...dict]).toEqual([
      ["op", "clone"],
      ["id", "abc"],
    ]);
  });

  it("rejects a top-level value that is not a dictionary", () => {
    const error = requestErrorOf(() => toStringDict(wire("l1:ae")));
    expect(error.code).toBe(RequestErrorCode.UNEXPECTED_SHAPE);
    expect(error.message).toBe("Expected a dictionary, got list");
  });

  it("rejects integer values", () => {
    const error = requestErrorOf(() => toStringDict(wire("d2:op5:clone2:idi3ee")));
    expect(error.code).toBe(RequestErrorCode.NON_STRING_VALUE);
    expect(error.field).toBe("id");
    expect(error.message).toBe("Value of id is not a string");
  });

  it("rejects nested values", () => {
    const error = requestErrorOf(() => toStringDict(wire("d2:opl5:cloneee")));
    expect(error.code).toBe(RequestErrorCode.NON_STRING_VALUE);
    expect(error.field).toBe("op");
  });

  it("rejects values that are not UTF-8", () => {
    const raw = new Uint8Array([...utf8Encode("d2:id1:"), 0xff, 0x65]);
    const error = requestErrorOf(() => toStringDict(decode(raw)));
    expect(error.code).toBe(RequestErrorCode.NON_STRING_VALUE);
    expect(error.message).toBe("Value of id is not valid UTF-8");
  });
});

describe("interpretRequest", () => {
  it("builds a clone request", () => {
    const request = interpretRequest(new Map([["op", "clone"], ["id", "abc"]]));
    expect(request).toEqual({ op: "clone", id: "abc" });
  });

  it("ignores fields the op does not use", () => {
    const request = interpretRequest(
      new Map([["op", "clone"], ["id", "abc"], ["session", "other"], ["code", "(+ 1 2)"]]),
    );
    expect(request).toEqual({ op: "clone", id: "abc" });
  });

  it("reports a missing op", () => {
    const error = requestErrorOf(() => interpretRequest(new Map([["id", "abc"]])));
    expect(error.code).toBe(RequestErrorCode.MISSING_OPERATION);
    expect(error.message).toBe("No op given");
  });

  it("reports an unknown op", () => {
    const error = requestErrorOf(() => interpretRequest(new Map([["op", "bogus"]])));
    expect(error.code).toBe(RequestErrorCode.UNKNOWN_OPERATION);
    expect(error.message).toBe("Unknown operation: bogus");
  });

  it("treats eval as unknown", () => {
    const error = requestErrorOf(() => interpretRequest(new Map([["op", "eval"]])));
    expect(error.code).toBe(RequestErrorCode.UNKNOWN_OPERATION);
  });

  it("requires id for clone", () => {
    const error = requestErrorOf(() => interpretRequest(new Map([["op", "clone"]])));
    expect(error.code).toBe(RequestErrorCode.MISSING_FIELD);
    expect(error.field).toBe("id");
    expect(error.message).toBe("Missing required field: id");
  });

  it("builds describe and ls-sessions with an optional id", () => {
    expect(interpretRequest(new Map([["op", "describe"]]))).toEqual({ op: "describe" });
    expect(interpretRequest(new Map([["op", "ls-sessions"], ["id", "s1"]]))).toEqual({
      op: "ls-sessions",
      id: "s1",
    });
  });
});

describe("requestContext", () => {
  it("extracts id and op", () => {
    expect(requestContext(utf8Encode("d2:id3:abc2:op4:evale"))).toEqual({ id: "abc", op: "eval" });
  });

  it("skips fields that are not strings", () => {
    expect(requestContext(utf8Encode("d2:idi1e2:op4:evale"))).toEqual({ op: "eval" });
  });

  it("returns nothing for malformed input", () => {
    expect(requestContext(utf8Encode("d2:op"))).toEqual({});
    expect(requestContext(utf8Encode("i1e"))).toEqual({});
  });
});
