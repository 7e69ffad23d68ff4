// Version-4 session identifiers.

import type { SessionId } from "@nrepl-lite/wire";

/**
 * Source of uniform random numbers in `[0, 1)`, with the contract of
 * `Math.random`. Tests pass a deterministic stub.
 */
export type RandomSource = () => number;

/** Canonical form of the identifiers produced by {@link randomUuid}. */
export const UUID_V4_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

function nibble(random: RandomSource): number {
  const sample = random();
  const value = Math.floor(sample * 16);
  if (!(value >= 0 && value < 16)) {
    throw new RangeError(`random source returned ${sample}, expected a number in [0, 1)`);
  }
  return value;
}

function hexDigits(count: number, random: RandomSource): string {
  let out = "";
  for (let i = 0; i < count; i++) out += nibble(random).toString(16);
  return out;
}

/**
 * Generate an RFC 4122 version-4 identifier (`xxxxxxxx-xxxx-4xxx-yxxx-xxxxxxxxxxxx`).
 *
 * Draws 31 nibbles in output order. The third group starts with the version
 * digit `4`; the fourth starts with `8 | (3 & n)`, one of `8`, `9`, `a`, `b`.
 */
export function randomUuid(random: RandomSource = Math.random): SessionId {
  const part1 = hexDigits(8, random);
  const part2 = hexDigits(4, random);
  const part3 = "4" + hexDigits(3, random);
  const part4 = (8 | (3 & nibble(random))).toString(16) + hexDigits(3, random);
  const part5 = hexDigits(12, random);
  return `${part1}-${part2}-${part3}-${part4}-${part5}`;
}
