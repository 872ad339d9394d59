// bsdiff container parser exports
// Only exports needed for public API - internal helpers remain internal

// Error types for handling specific error conditions
export type { CodedError } from './constants.ts';
export { CompressorId, createCodedError, ErrorCode, FormatVariant, isCodedError, isUnsupportedError } from './constants.ts';
export type { Codec, DecodeFn } from './codecs/index.ts';
export { decompress, getCodec, getCodecName, isCodecSupported, registerCodec } from './codecs/index.ts';
export type { ControlRecord } from './ControlStream.ts';
export { ControlRecordCursor, ControlStream, readControlRecord, writeControlRecord } from './ControlStream.ts';
export type { HeaderSizes, MagicInfo, PatchHeader, StreamCompressors } from './headers.ts';
export { decodeMagic, encodeMagic, parseHeader, writeHeader } from './headers.ts';
export type { Segment } from './PatchReader.ts';
export { default as PatchReader } from './PatchReader.ts';
export { decodeSignMagnitude, encodeSignMagnitude, MAX_MAGNITUDE, readSignMagnitude, writeSignMagnitude } from './SignMagnitudeCodec.ts';
