// bsdiff header parsing
// Reference: https://android.googlesource.com/platform/external/bsdiff/+/master/bspatch.cc

import {
  BDF3_MAGIC_PREFIX,
  BSDF2_MAGIC_PREFIX,
  CONTROL_COMPRESSOR_BYTE,
  CompressorId,
  createCodedError,
  DIFF_COMPRESSOR_BYTE,
  ErrorCode,
  EXTRA_COMPRESSOR_BYTE,
  FormatVariant,
  HEADER_SIZE,
  isCompressorId,
  LEGACY_MAGIC,
  MAGIC_SIZE,
} from './constants.ts';

// Type definitions
export interface StreamCompressors {
  readonly control: CompressorId;
  readonly diff: CompressorId;
  readonly extra: CompressorId;
}

export interface MagicInfo {
  readonly variant: FormatVariant;
  readonly compressors: StreamCompressors;
}

export interface HeaderSizes {
  readonly compressedControlSize: bigint;
  readonly compressedDiffSize: bigint;
  readonly newFileSize: bigint; // Size of the reconstructed file
}

export interface PatchHeader extends MagicInfo, HeaderSizes {
  readonly magic: bigint; // Big-endian u64 view of bytes 0-7
  readonly magicBytes: Buffer;
}

const LEGACY_COMPRESSORS: StreamCompressors = Object.freeze({
  control: CompressorId.BZIP2,
  diff: CompressorId.BZIP2,
  extra: CompressorId.BZIP2,
});

function matchesPrefix(buf: Buffer, offset: number, prefix: number[]): boolean {
  for (let i = 0; i < prefix.length; i++) {
    if (buf[offset + i] !== prefix[i]) return false;
  }
  return true;
}

function readCompressorId(buf: Buffer, offset: number, index: number, stream: keyof StreamCompressors): CompressorId {
  const value = buf[offset + index];
  if (!isCompressorId(value)) {
    throw createCodedError(`Invalid ${stream} compressor id ${value} at magic byte ${index}`, ErrorCode.INVALID_COMPRESSOR_ID);
  }
  return value;
}

function readCompressors(buf: Buffer, offset: number): StreamCompressors {
  return Object.freeze({
    control: readCompressorId(buf, offset, CONTROL_COMPRESSOR_BYTE, 'control'),
    diff: readCompressorId(buf, offset, DIFF_COMPRESSOR_BYTE, 'diff'),
    extra: readCompressorId(buf, offset, EXTRA_COMPRESSOR_BYTE, 'extra'),
  });
}

/**
 * Identify the container variant from the 8-byte magic
 *
 * BSDIFF40 must match exactly. BDF3 and BSDF2 only fix their ASCII prefix;
 * bytes 5-7 select the control/diff/extra compressors. Byte 4 of BDF3 is not
 * validated.
 */
export function decodeMagic(buf: Buffer, offset = 0): MagicInfo {
  if (buf.length - offset < MAGIC_SIZE) {
    throw createCodedError(`Magic requires ${MAGIC_SIZE} bytes, got ${Math.max(buf.length - offset, 0)}`, ErrorCode.MALFORMED_MAGIC);
  }

  if (matchesPrefix(buf, offset, LEGACY_MAGIC)) {
    return { variant: FormatVariant.LEGACY, compressors: LEGACY_COMPRESSORS };
  }
  if (matchesPrefix(buf, offset, BDF3_MAGIC_PREFIX)) {
    return { variant: FormatVariant.V3, compressors: readCompressors(buf, offset) };
  }
  if (matchesPrefix(buf, offset, BSDF2_MAGIC_PREFIX)) {
    return { variant: FormatVariant.V2, compressors: readCompressors(buf, offset) };
  }

  throw createCodedError(`Not a bsdiff patch (magic ${buf.toString('hex', offset, offset + MAGIC_SIZE)})`, ErrorCode.MALFORMED_MAGIC);
}

/**
 * Build the 8-byte magic for a variant and its compressors
 */
export function encodeMagic(info: MagicInfo): Buffer {
  const { control, diff, extra } = info.compressors;

  switch (info.variant) {
    case FormatVariant.LEGACY:
      if (control !== CompressorId.BZIP2 || diff !== CompressorId.BZIP2 || extra !== CompressorId.BZIP2) {
        throw createCodedError('BSDIFF40 patches only carry bzip2 streams', ErrorCode.INVALID_COMPRESSOR_ID);
      }
      return Buffer.from(LEGACY_MAGIC);
    case FormatVariant.V2:
      return Buffer.from(BSDF2_MAGIC_PREFIX.concat([control, diff, extra]));
    case FormatVariant.V3:
      return Buffer.from(BDF3_MAGIC_PREFIX.concat([0, control, diff, extra]));
  }
}

/**
 * Parse the fixed header (first 32 bytes)
 *
 * The returned header and its compressors are frozen.
 */
export function parseHeader(buf: Buffer): PatchHeader {
  if (buf.length < HEADER_SIZE) {
    throw createCodedError(`Patch header requires ${HEADER_SIZE} bytes, got ${buf.length}`, ErrorCode.HEADER_TOO_SHORT);
  }

  const info = decodeMagic(buf, 0);

  return Object.freeze({
    magic: buf.readBigUInt64BE(0),
    magicBytes: Buffer.from(buf.subarray(0, MAGIC_SIZE)),
    variant: info.variant,
    compressors: info.compressors,
    compressedControlSize: buf.readBigUInt64LE(8),
    compressedDiffSize: buf.readBigUInt64LE(16),
    newFileSize: buf.readBigUInt64LE(24),
  });
}

/**
 * Serialize a header back into its 32-byte form
 */
export function writeHeader(header: MagicInfo & HeaderSizes): Buffer {
  const buf = Buffer.alloc(HEADER_SIZE);
  encodeMagic(header).copy(buf, 0);
  buf.writeBigUInt64LE(header.compressedControlSize, 8);
  buf.writeBigUInt64LE(header.compressedDiffSize, 16);
  buf.writeBigUInt64LE(header.newFileSize, 24);
  return buf;
}
