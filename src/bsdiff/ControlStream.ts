/**
 * ControlStream - decoded view over a decompressed bsdiff control stream
 *
 * The stream is a flat run of 24-byte records:
 *   0   8  diff length   (LE u64) bytes to add from old file + diff stream
 *   8   8  extra length  (LE u64) bytes to copy from the extra stream
 *   16  8  offset delta  (LE sign-magnitude) adjustment of the old file position
 *
 * Records are decoded on demand by a cursor. Each call to cursor() starts a
 * new pass over the same buffer.
 */

import { CONTROL_RECORD_SIZE, createCodedError, ErrorCode } from './constants.ts';
import { readSignMagnitude, writeSignMagnitude } from './SignMagnitudeCodec.ts';

export interface ControlRecord {
  diffLength: bigint;
  extraLength: bigint;
  offsetDelta: bigint;
}

function assertRecordAligned(buffer: Buffer): void {
  if (buffer.length % CONTROL_RECORD_SIZE !== 0) {
    throw createCodedError(`Decompressed control stream has length ${buffer.length}, which is not a multiple of ${CONTROL_RECORD_SIZE}`, ErrorCode.TRUNCATED_CONTROL_STREAM);
  }
}

/**
 * Decode the record starting at `offset`
 */
export function readControlRecord(buf: Buffer, offset: number): ControlRecord {
  return {
    diffLength: buf.readBigUInt64LE(offset),
    extraLength: buf.readBigUInt64LE(offset + 8),
    offsetDelta: readSignMagnitude(buf, offset + 16),
  };
}

/**
 * Encode a record at `offset`
 * @returns Offset just past the record
 */
export function writeControlRecord(buf: Buffer, record: ControlRecord, offset: number): number {
  buf.writeBigUInt64LE(record.diffLength, offset);
  buf.writeBigUInt64LE(record.extraLength, offset + 8);
  return writeSignMagnitude(buf, record.offsetDelta, offset + 16);
}

/**
 * Forward-only cursor over control records
 */
export class ControlRecordCursor implements IterableIterator<ControlRecord> {
  private readonly buffer: Buffer;
  private offset = 0;

  constructor(buffer: Buffer) {
    assertRecordAligned(buffer);
    this.buffer = buffer;
  }

  /** Byte offset of the next record */
  get position(): number {
    return this.offset;
  }

  /** Records not yet read */
  get remaining(): number {
    return (this.buffer.length - this.offset) / CONTROL_RECORD_SIZE;
  }

  get done(): boolean {
    return this.offset >= this.buffer.length;
  }

  next(): IteratorResult<ControlRecord> {
    if (this.done) {
      return { done: true, value: undefined };
    }
    const record = readControlRecord(this.buffer, this.offset);
    this.offset += CONTROL_RECORD_SIZE;
    return { done: false, value: record };
  }

  [Symbol.iterator](): ControlRecordCursor {
    return this;
  }
}

/**
 * Validated control stream
 */
export class ControlStream implements Iterable<ControlRecord> {
  private readonly buffer: Buffer;

  /**
   * @throws CodedError TRUNCATED_CONTROL_STREAM if the buffer does not hold whole records
   */
  constructor(buffer: Buffer) {
    assertRecordAligned(buffer);
    this.buffer = buffer;
  }

  /** Number of records */
  get length(): number {
    return this.buffer.length / CONTROL_RECORD_SIZE;
  }

  get byteLength(): number {
    return this.buffer.length;
  }

  /**
   * Decode the record at `index` without moving any cursor
   */
  at(index: number): ControlRecord | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) return undefined;
    return readControlRecord(this.buffer, index * CONTROL_RECORD_SIZE);
  }

  cursor(): ControlRecordCursor {
    return new ControlRecordCursor(this.buffer);
  }

  [Symbol.iterator](): ControlRecordCursor {
    return this.cursor();
  }

  toArray(): ControlRecord[] {
    const records: ControlRecord[] = [];
    for (const record of this) records.push(record);
    return records;
  }
}
