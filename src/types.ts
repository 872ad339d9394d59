import type { CompressorId, FormatVariant } from './bsdiff/constants.ts';

export type StreamName = 'control' | 'diff' | 'extra';

/**
 * Emitted after a stream has been decompressed
 */
export interface StreamDiagnostic {
  type: 'stream';
  stream: StreamName;
  compressor: CompressorId;
  compressedSize: number;
  decompressedSize: number;
}

/**
 * Zero-byte ratio of the decompressed diff stream
 */
export interface DiffZerosDiagnostic {
  type: 'diff-zeros';
  zeroBytes: number;
  totalBytes: number;
}

/**
 * Emitted right before a patch is rejected for using an unimplemented variant
 *
 * Only compressed sizes are reported: nothing is decompressed for a rejected
 * patch, so there are no decompressed sizes or ratios.
 */
export interface UnsupportedVariantDiagnostic {
  type: 'unsupported-variant';
  variant: FormatVariant;
  compressedControlSize: bigint;
  compressedDiffSize: bigint;
  compressedMaskSize?: bigint; // u64 after the header, when present
}

export type Diagnostic = StreamDiagnostic | DiffZerosDiagnostic | UnsupportedVariantDiagnostic;

export type DiagnosticCallback = (diagnostic: Diagnostic) => void;

/**
 * Stream decompressor. Receives a whole compressed segment and returns the whole decompressed stream.
 */
export type Decompressor = (input: Buffer, compressor: CompressorId) => Buffer;

/**
 * Options for PatchReader
 */
export interface PatchReaderOptions {
  /**
   * Observer for decode statistics. Never alters the result.
   */
  onDiagnostic?: DiagnosticCallback;

  /**
   * Replacement for the built-in codec registry
   */
  decompress?: Decompressor;
}
