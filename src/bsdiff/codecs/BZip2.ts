// BZip2 codec - control, diff and extra streams of BSDIFF40 patches, and compressor id 1 in BSDF2/BDF3
// Each stream is a standalone bzip2 file with the standard BZh header

import Bunzip from 'seek-bzip';

/**
 * Decode BZip2 compressed data synchronously
 *
 * @param input - BZip2 compressed data (with BZh header)
 * @returns Decompressed data
 */
export function decodeBzip2(input: Buffer): Buffer {
  return Bunzip.decode(input);
}
