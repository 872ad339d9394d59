import assert from 'assert';
import { CompressorId, ErrorCode, FormatVariant } from '../../src/bsdiff/constants.ts';
import { decodeMagic, encodeMagic, parseHeader, writeHeader } from '../../src/bsdiff/headers.ts';
import { hasCode } from '../lib/assertions.ts';

function magic(ascii: string, trailer: number[]): Buffer {
  return Buffer.concat([Buffer.from(ascii, 'ascii'), Buffer.from(trailer)]);
}

function u64le(value: bigint): Buffer {
  var buf = Buffer.alloc(8);
  buf.writeBigUInt64LE(value, 0);
  return buf;
}

function flipBit(buf: Buffer, index: number, bit: number): Buffer {
  var copy = Buffer.from(buf);
  copy[index] ^= 1 << bit;
  return copy;
}

var LEGACY = Buffer.from('BSDIFF40', 'ascii');
var BSDF2 = magic('BSDF2', [0x01, 0x02, 0x01]);
var BDF3 = magic('BDF3', [0x00, 0x02, 0x02, 0x01]);

describe('headers', () => {
  describe('decodeMagic', () => {
    it('should recognize BSDIFF40 as the legacy all-bzip2 variant', () => {
      var info = decodeMagic(LEGACY);
      assert.equal(info.variant, FormatVariant.LEGACY);
      assert.deepEqual(info.compressors, { control: CompressorId.BZIP2, diff: CompressorId.BZIP2, extra: CompressorId.BZIP2 });
    });

    it('should read per-stream compressors from BSDF2', () => {
      var info = decodeMagic(BSDF2);
      assert.equal(info.variant, FormatVariant.V2);
      assert.equal(info.compressors.control, CompressorId.BZIP2);
      assert.equal(info.compressors.diff, CompressorId.BROTLI);
      assert.equal(info.compressors.extra, CompressorId.BZIP2);
    });

    it('should read per-stream compressors from BDF3', () => {
      var info = decodeMagic(BDF3);
      assert.equal(info.variant, FormatVariant.V3);
      assert.deepEqual(info.compressors, { control: CompressorId.BROTLI, diff: CompressorId.BROTLI, extra: CompressorId.BZIP2 });
    });

    it('should not constrain byte 4 of BDF3', () => {
      [0x00, 0x01, 0x7f, 0xff].forEach((value) => {
        var buf = Buffer.from(BDF3);
        buf[4] = value;
        assert.equal(decodeMagic(buf).variant, FormatVariant.V3);
      });
    });

    it('should decode at an offset', () => {
      var buf = Buffer.concat([Buffer.from([0xaa, 0xbb]), BSDF2]);
      assert.equal(decodeMagic(buf, 2).variant, FormatVariant.V2);
    });

    it('should reject an invalid compressor id in any stream position', () => {
      assert.throws(() => decodeMagic(magic('BSDF2', [0x03, 0x01, 0x01])), hasCode(ErrorCode.INVALID_COMPRESSOR_ID));
      assert.throws(() => decodeMagic(magic('BSDF2', [0x01, 0x00, 0x01])), hasCode(ErrorCode.INVALID_COMPRESSOR_ID));
      assert.throws(() => decodeMagic(magic('BSDF2', [0x01, 0x01, 0x03])), hasCode(ErrorCode.INVALID_COMPRESSOR_ID));
      assert.throws(() => decodeMagic(magic('BDF3', [0x00, 0x01, 0x01, 0xff])), hasCode(ErrorCode.INVALID_COMPRESSOR_ID));
    });

    it('should name the stream with the invalid compressor', () => {
      assert.throws(() => decodeMagic(magic('BSDF2', [0x01, 0x03, 0x01])), /Invalid diff compressor id 3 at magic byte 6/);
    });

    it('should reject unknown magic', () => {
      assert.throws(() => decodeMagic(Buffer.from('BSDIFF41', 'ascii')), hasCode(ErrorCode.MALFORMED_MAGIC));
      assert.throws(() => decodeMagic(Buffer.alloc(8)), hasCode(ErrorCode.MALFORMED_MAGIC));
      assert.throws(() => decodeMagic(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])), hasCode(ErrorCode.MALFORMED_MAGIC));
    });

    it('should reject fewer than 8 bytes', () => {
      assert.throws(() => decodeMagic(Buffer.from('BSDIFF4', 'ascii')), hasCode(ErrorCode.MALFORMED_MAGIC));
    });

    it('should reject every single-bit mutation of a fixed byte', () => {
      var cases: { buf: Buffer; fixed: number }[] = [
        { buf: LEGACY, fixed: 8 },
        { buf: BSDF2, fixed: 5 },
        { buf: BDF3, fixed: 4 },
      ];
      cases.forEach((c) => {
        for (var index = 0; index < c.fixed; index++) {
          for (var bit = 0; bit < 8; bit++) {
            var mutated = flipBit(c.buf, index, bit);
            assert.throws(() => decodeMagic(mutated), hasCode(ErrorCode.MALFORMED_MAGIC), `byte ${index} bit ${bit} of ${c.buf.toString('hex')}`);
          }
        }
      });
    });
  });

  describe('encodeMagic', () => {
    it('should rebuild each variant', () => {
      assert.deepEqual(encodeMagic(decodeMagic(LEGACY)), LEGACY);
      assert.deepEqual(encodeMagic(decodeMagic(BSDF2)), BSDF2);
      assert.deepEqual(encodeMagic(decodeMagic(BDF3)), BDF3);
    });

    it('should refuse non-bzip2 legacy streams', () => {
      var info = {
        variant: FormatVariant.LEGACY,
        compressors: { control: CompressorId.BZIP2, diff: CompressorId.BROTLI, extra: CompressorId.BZIP2 },
      };
      assert.throws(() => encodeMagic(info), hasCode(ErrorCode.INVALID_COMPRESSOR_ID));
    });
  });

  describe('parseHeader', () => {
    it('should read the magic big-endian and the sizes little-endian', () => {
      var buf = Buffer.concat([BSDF2, u64le(0x0102n), u64le(0x0304n), u64le(0x05060708n)]);
      var header = parseHeader(buf);
      assert.equal(header.magic, 0x4253444632010201n);
      assert.deepEqual(header.magicBytes, BSDF2);
      assert.equal(header.compressedControlSize, 258n);
      assert.equal(header.compressedDiffSize, 772n);
      assert.equal(header.newFileSize, 84281096n);
      assert.equal(header.variant, FormatVariant.V2);
      assert.deepEqual(header.compressors, { control: CompressorId.BZIP2, diff: CompressorId.BROTLI, extra: CompressorId.BZIP2 });
    });

    it('should read full 64-bit sizes', () => {
      var buf = Buffer.concat([LEGACY, u64le(0xffffffffffffffffn), u64le(0n), u64le(1n << 60n)]);
      var header = parseHeader(buf);
      assert.equal(header.magic, 0x4253444946463430n);
      assert.equal(header.compressedControlSize, 18446744073709551615n);
      assert.equal(header.compressedDiffSize, 0n);
      assert.equal(header.newFileSize, 1152921504606846976n);
    });

    it('should return a frozen header', () => {
      var header = parseHeader(Buffer.concat([BSDF2, u64le(1n), u64le(2n), u64le(3n)]));
      assert.ok(Object.isFrozen(header));
      assert.ok(Object.isFrozen(header.compressors));
      assert.equal(Reflect.set(header, 'newFileSize', 4n), false);
      assert.equal(Reflect.set(header.compressors, 'diff', CompressorId.BZIP2), false);
      assert.equal(header.newFileSize, 3n);
      assert.equal(header.compressors.diff, CompressorId.BROTLI);
    });

    it('should ignore bytes after the header', () => {
      var buf = Buffer.concat([LEGACY, u64le(1n), u64le(2n), u64le(3n), Buffer.from([0xde, 0xad])]);
      assert.equal(parseHeader(buf).newFileSize, 3n);
    });

    it('should reject buffers shorter than 32 bytes', () => {
      assert.throws(() => parseHeader(Buffer.alloc(0)), hasCode(ErrorCode.HEADER_TOO_SHORT));
      var buf = Buffer.concat([LEGACY, u64le(1n), u64le(2n), Buffer.alloc(7)]);
      assert.throws(() => parseHeader(buf), hasCode(ErrorCode.HEADER_TOO_SHORT));
      assert.throws(() => parseHeader(buf), /requires 32 bytes, got 31/);
    });

    it('should propagate magic failures', () => {
      var buf = Buffer.concat([magic('BSDF2', [0x01, 0x01, 0x03]), Buffer.alloc(24)]);
      assert.throws(() => parseHeader(buf), hasCode(ErrorCode.INVALID_COMPRESSOR_ID));
    });
  });

  describe('writeHeader', () => {
    it('should produce a header parseHeader reads back', () => {
      var buf = writeHeader({
        variant: FormatVariant.V2,
        compressors: { control: CompressorId.BROTLI, diff: CompressorId.BZIP2, extra: CompressorId.BROTLI },
        compressedControlSize: 11n,
        compressedDiffSize: 22n,
        newFileSize: 33n,
      });
      assert.equal(buf.length, 32);
      assert.equal(buf.toString('hex', 0, 8), '4253444632020102');
      var header = parseHeader(buf);
      assert.equal(header.compressedControlSize, 11n);
      assert.equal(header.compressedDiffSize, 22n);
      assert.equal(header.newFileSize, 33n);
    });
  });
});
