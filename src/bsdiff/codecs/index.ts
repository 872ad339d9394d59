// Codec registry for bsdiff stream decompression
// Compressor ids come from the patch magic and are validated before they reach this registry

import { CompressorId, createCodedError, ErrorCode } from '../constants.ts';
import { decodeBrotli } from './Brotli.ts';
import { decodeBzip2 } from './BZip2.ts';

export type DecodeFn = (input: Buffer) => Buffer;

export interface Codec {
  name: string;
  decode: DecodeFn;
}

// Registry of supported codecs
const codecs: { [id: number]: Codec } = {};

/**
 * Register a codec
 */
export function registerCodec(id: number, codec: Codec): void {
  codecs[id] = codec;
}

/**
 * Get a codec by ID
 * @throws Error if codec is not supported
 */
export function getCodec(id: number): Codec {
  const codec = codecs[id];
  if (!codec) {
    throw createCodedError(`Unsupported compressor id: ${id}`, ErrorCode.UNSUPPORTED_CODEC);
  }
  return codec;
}

/**
 * Check if a codec is supported
 */
export function isCodecSupported(id: number): boolean {
  return codecs[id] !== undefined;
}

/**
 * Get human-readable codec name
 */
export function getCodecName(id: number): string {
  const codec = codecs[id];
  return codec ? codec.name : `Unknown (${id})`;
}

/**
 * Decompress a whole stream with the codec registered for `id`
 *
 * Collaborator failures are rethrown as DECOMPRESSION_FAILED with the
 * original error as `cause`.
 */
export function decompress(input: Buffer, id: number): Buffer {
  const codec = getCodec(id);
  try {
    return codec.decode(input);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw createCodedError(`${codec.name} decompression failed: ${detail}`, ErrorCode.DECOMPRESSION_FAILED, err);
  }
}

// Register built-in codecs

registerCodec(CompressorId.BZIP2, {
  name: 'BZip2',
  decode: decodeBzip2,
});

registerCodec(CompressorId.BROTLI, {
  name: 'Brotli',
  decode: decodeBrotli,
});
