// Sign-magnitude integer encoding used by bsdiff control records
//
// bsdiff does not store offsets in two's complement. The top bit of the
// little-endian u64 is the sign (1 = negative), the low 63 bits hold the
// magnitude:
//   0x0000000000000007 -> 7
//   0x8000000000000007 -> -7
//   0x8000000000000000 -> 0 (negative zero collapses to zero)
//
// Values are bigint since the full 63-bit magnitude does not fit a JS number.

import { createCodedError, ErrorCode } from './constants.ts';

const SIGN_BIT = 1n << 63n;
const MAGNITUDE_MASK = SIGN_BIT - 1n;
const UINT64_MAX = (1n << 64n) - 1n;

// Largest magnitude either sign can carry: 2^63 - 1
export const MAX_MAGNITUDE = MAGNITUDE_MASK;

/**
 * Decode a raw u64 into a signed value
 * @throws CodedError INTEGER_OVERFLOW if raw is not a u64
 */
export function decodeSignMagnitude(raw: bigint): bigint {
  if (raw < 0n || raw > UINT64_MAX) {
    throw createCodedError(`Sign-magnitude value ${raw} is not an unsigned 64-bit integer`, ErrorCode.INTEGER_OVERFLOW);
  }
  if ((raw & SIGN_BIT) === 0n) return raw;
  return -(raw & MAGNITUDE_MASK);
}

/**
 * Encode a signed value into its raw u64 form
 * @throws CodedError INTEGER_OVERFLOW if the magnitude needs more than 63 bits
 */
export function encodeSignMagnitude(value: bigint): bigint {
  const magnitude = value < 0n ? -value : value;
  if (magnitude > MAX_MAGNITUDE) {
    throw createCodedError(`Value ${value} does not fit in a 63-bit magnitude`, ErrorCode.INTEGER_OVERFLOW);
  }
  return value < 0n ? SIGN_BIT | magnitude : value;
}

/**
 * Read a little-endian sign-magnitude integer
 */
export function readSignMagnitude(buf: Buffer, offset: number): bigint {
  return decodeSignMagnitude(buf.readBigUInt64LE(offset));
}

/**
 * Write a little-endian sign-magnitude integer
 * @returns Offset just past the written bytes
 */
export function writeSignMagnitude(buf: Buffer, value: bigint, offset: number): number {
  return buf.writeBigUInt64LE(encodeSignMagnitude(value), offset);
}
