// Brotli codec - compressor id 2 in BSDF2/BDF3 patches
//
// Uses Node's built-in zlib Brotli decoder

import zlib from 'zlib';

/**
 * Decode Brotli compressed data synchronously
 *
 * @param input - Raw Brotli stream (no framing)
 * @returns Decompressed data
 */
export function decodeBrotli(input: Buffer): Buffer {
  return zlib.brotliDecompressSync(input);
}
