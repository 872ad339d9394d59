// bsdiff container constants
// Reference: https://www.daemonology.net/bsdiff/ and the Android bsdiff sources
//
// Layout of every variant:
//   0   8  magic (big-endian)
//   8   8  compressed control stream size (LE u64)
//   16  8  compressed diff stream size (LE u64)
//   24  8  new file size (LE u64)
//   32  .. control stream, diff stream, extra stream (+ variant trailers)

export const HEADER_SIZE = 32;
export const MAGIC_SIZE = 8;

// Control record: diff length, extra length, offset delta (3 x u64)
export const CONTROL_RECORD_SIZE = 24;

// 'BSDIFF40' - original bsdiff 4.x, all streams bzip2
export const LEGACY_MAGIC = [0x42, 0x53, 0x44, 0x49, 0x46, 0x46, 0x34, 0x30];
// 'BSDF2' + control/diff/extra compressor ids
export const BSDF2_MAGIC_PREFIX = [0x42, 0x53, 0x44, 0x46, 0x32];
// 'BDF3' + one unconstrained byte + control/diff/extra compressor ids
export const BDF3_MAGIC_PREFIX = [0x42, 0x44, 0x46, 0x33];

// Magic byte positions carrying compressor ids (V2 and V3)
export const CONTROL_COMPRESSOR_BYTE = 5;
export const DIFF_COMPRESSOR_BYTE = 6;
export const EXTRA_COMPRESSOR_BYTE = 7;

export const FormatVariant = {
  LEGACY: 'legacy',
  V2: 'v2',
  V3: 'v3',
} as const;

export type FormatVariant = (typeof FormatVariant)[keyof typeof FormatVariant];

export const CompressorId = {
  BZIP2: 1,
  BROTLI: 2,
} as const;

export type CompressorId = (typeof CompressorId)[keyof typeof CompressorId];

export function isCompressorId(value: number): value is CompressorId {
  return value === CompressorId.BZIP2 || value === CompressorId.BROTLI;
}

// Error codes
export const ErrorCode = {
  HEADER_TOO_SHORT: 'HEADER_TOO_SHORT',
  MALFORMED_MAGIC: 'MALFORMED_MAGIC',
  INVALID_COMPRESSOR_ID: 'INVALID_COMPRESSOR_ID',
  UNSUPPORTED_FORMAT_VARIANT: 'UNSUPPORTED_FORMAT_VARIANT',
  UNSUPPORTED_CODEC: 'UNSUPPORTED_CODEC',
  TRUNCATED_INPUT: 'TRUNCATED_INPUT',
  TRUNCATED_CONTROL_STREAM: 'TRUNCATED_CONTROL_STREAM',
  DECOMPRESSION_FAILED: 'DECOMPRESSION_FAILED',
  INTEGER_OVERFLOW: 'INTEGER_OVERFLOW',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// Error with code property
export interface CodedError extends Error {
  code: ErrorCode;
}

/**
 * Create an error with a code property
 */
export function createCodedError(message: string, code: ErrorCode, cause?: unknown): CodedError {
  const err = cause === undefined ? new Error(message) : new Error(message, { cause: cause });
  return Object.assign(err, { code: code });
}

export function isCodedError(err: unknown): err is CodedError {
  if (!(err instanceof Error) || !('code' in err)) return false;
  const code = err.code;
  return typeof code === 'string' && Object.values<string>(ErrorCode).indexOf(code) >= 0;
}

/**
 * True when the patch was well formed but uses a feature this reader does not implement.
 * Every other coded error means the input is corrupt or truncated.
 */
export function isUnsupportedError(err: unknown): boolean {
  return isCodedError(err) && err.code === ErrorCode.UNSUPPORTED_FORMAT_VARIANT;
}
