/**
 * PatchReader - Opens a bsdiff patch held in memory
 *
 * Reader Flow:
 * 1. Parse the 32-byte header (magic + three sizes)
 * 2. Reject BDF3 patches (their mask stream is not supported)
 * 3. Slice the control and diff segments right after the header
 * 4. Decompress both segments once, with the compressors named by the magic
 * 5. Validate the control stream and hand out cursors over its records
 *
 * The extra segment runs from the end of the diff segment to the end of the
 * buffer. It is only decompressed when readExtraStream() is called.
 */

import type { Decompressor, Diagnostic, DiagnosticCallback, PatchReaderOptions, StreamName } from '../types.ts';
import { decompress } from './codecs/index.ts';
import { type CompressorId, createCodedError, ErrorCode, FormatVariant, HEADER_SIZE, isCodedError } from './constants.ts';
import { ControlRecordCursor, ControlStream } from './ControlStream.ts';
import { type PatchHeader, parseHeader, type StreamCompressors } from './headers.ts';

// Byte range inside the patch buffer
export interface Segment {
  offset: number;
  length: number;
}

function sliceSegment(buffer: Buffer, offset: number, size: bigint, stream: StreamName): Segment {
  const end = BigInt(offset) + size;
  if (end > BigInt(buffer.length)) {
    throw createCodedError(`${stream} stream ends at byte ${end}, past the end of the ${buffer.length} byte patch`, ErrorCode.TRUNCATED_INPUT);
  }
  return { offset: offset, length: Number(size) };
}

function countZeros(buf: Buffer): number {
  let zeros = 0;
  for (let i = 0; i < buf.length; i++) {
    if (buf[i] === 0) zeros++;
  }
  return zeros;
}

/**
 * PatchReader - parses a bsdiff patch and exposes its decoded streams
 */
export default class PatchReader {
  readonly header: PatchHeader;
  readonly controlSegment: Segment;
  readonly diffSegment: Segment;
  readonly extraSegment: Segment;
  readonly controlStream: ControlStream;
  readonly diffStream: Buffer;
  private readonly buffer: Buffer;
  private readonly decompressor: Decompressor;
  private readonly onDiagnostic: DiagnosticCallback | undefined;
  private extraStream: Buffer | null = null;

  /**
   * @throws CodedError for malformed, truncated or unsupported patches
   */
  constructor(buffer: Buffer, options: PatchReaderOptions = {}) {
    this.buffer = buffer;
    this.decompressor = options.decompress || decompress;
    this.onDiagnostic = options.onDiagnostic;

    const header = parseHeader(buffer);
    if (header.variant === FormatVariant.V3) {
      this.emit({
        type: 'unsupported-variant',
        variant: header.variant,
        compressedControlSize: header.compressedControlSize,
        compressedDiffSize: header.compressedDiffSize,
        compressedMaskSize: buffer.length >= HEADER_SIZE + 8 ? buffer.readBigUInt64LE(HEADER_SIZE) : undefined,
      });
      throw createCodedError('BDF3 patches carry a mask stream, which is not supported', ErrorCode.UNSUPPORTED_FORMAT_VARIANT);
    }
    this.header = header;

    this.controlSegment = sliceSegment(buffer, HEADER_SIZE, header.compressedControlSize, 'control');
    const diffStart = this.controlSegment.offset + this.controlSegment.length;
    this.diffSegment = sliceSegment(buffer, diffStart, header.compressedDiffSize, 'diff');
    const extraStart = this.diffSegment.offset + this.diffSegment.length;
    this.extraSegment = { offset: extraStart, length: buffer.length - extraStart };

    this.controlStream = new ControlStream(this.decompressSegment('control', this.controlSegment, header.compressors.control));

    this.diffStream = this.decompressSegment('diff', this.diffSegment, header.compressors.diff);
    if (this.onDiagnostic) {
      this.emit({ type: 'diff-zeros', zeroBytes: countZeros(this.diffStream), totalBytes: this.diffStream.length });
    }
  }

  get variant(): FormatVariant {
    return this.header.variant;
  }

  get compressors(): StreamCompressors {
    return this.header.compressors;
  }

  get newFileSize(): bigint {
    return this.header.newFileSize;
  }

  /**
   * Fresh cursor over the control records. Never decompresses again.
   */
  controlRecords(): ControlRecordCursor {
    return this.controlStream.cursor();
  }

  /**
   * Decompress the extra segment on first use
   */
  readExtraStream(): Buffer {
    if (this.extraStream === null) {
      this.extraStream = this.decompressSegment('extra', this.extraSegment, this.header.compressors.extra);
    }
    return this.extraStream;
  }

  private decompressSegment(stream: StreamName, segment: Segment, compressor: CompressorId): Buffer {
    const input = this.buffer.subarray(segment.offset, segment.offset + segment.length);
    let output: Buffer;
    try {
      output = this.decompressor(input, compressor);
    } catch (err) {
      if (isCodedError(err)) {
        if (err.code !== ErrorCode.DECOMPRESSION_FAILED) throw err;
        throw createCodedError(`Failed to decompress ${stream} stream: ${err.message}`, ErrorCode.DECOMPRESSION_FAILED, err);
      }
      const detail = err instanceof Error ? err.message : String(err);
      throw createCodedError(`Failed to decompress ${stream} stream: ${detail}`, ErrorCode.DECOMPRESSION_FAILED, err);
    }
    this.emit({
      type: 'stream',
      stream: stream,
      compressor: compressor,
      compressedSize: segment.length,
      decompressedSize: output.length,
    });
    return output;
  }

  private emit(diagnostic: Diagnostic): void {
    if (this.onDiagnostic) this.onDiagnostic(diagnostic);
  }
}
