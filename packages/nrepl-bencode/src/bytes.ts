const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

export function concat(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((n, p) => n + p.length, 0);
  const out = new Uint8Array(total);
  let o = 0;
  for (const p of parts) {
    out.set(p, o);
    o += p.length;
  }
  return out;
}

export function utf8Encode(str: string): Uint8Array {
  return textEncoder.encode(str);
}

/** Decode UTF-8, throwing a TypeError on malformed input. */
export function utf8Decode(bytes: Uint8Array): string {
  return textDecoder.decode(bytes);
}

/** ASCII bytes for a decimal number, as used by string lengths and integers. */
export function asciiDigits(value: number | bigint): Uint8Array {
  return textEncoder.encode(value.toString(10));
}

/** Hex dump of buffer bytes for error messages, with the byte at `offset` bracketed. */
export function hexDump(buf: Uint8Array, offset: number, length = 16): string {
  const start = Math.max(0, offset - 4);
  const end = Math.min(buf.length, start + length);
  const bytes: string[] = [];
  for (let i = start; i < end; i++) {
    const hex = buf[i].toString(16).padStart(2, "0");
    bytes.push(i === offset ? `[${hex}]` : hex);
  }
  return bytes.join(" ");
}
