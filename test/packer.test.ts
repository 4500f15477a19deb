import { describe, it, expect } from 'vitest';
import { MessageBuffer } from '../src/MessageBuffer';
import { InvalidArgumentError } from '../src/errors';
import {
  bigIntBitLength,
  packArrayHeader,
  packBigInt,
  packBinaryHeader,
  packBoolean,
  packByte,
  packDouble,
  packExtensionTypeHeader,
  packFloat,
  packInt,
  packLong,
  packMapHeader,
  packNil,
  packRawStringHeader,
  packShort,
  packString,
  writePayload,
} from '../src/packer';

function encoded(write: (buf: MessageBuffer) => number): number[] {
  const buf = new MessageBuffer(0);
  const written = write(buf);
  return Array.from(buf.toBytes(written));
}

describe('packer', () => {
  it('should pack nil and booleans as single bytes', () => {
    expect(encoded((b) => packNil(b, 0))).toEqual([0xc0]);
    expect(encoded((b) => packBoolean(b, 0, true))).toEqual([0xc3]);
    expect(encoded((b) => packBoolean(b, 0, false))).toEqual([0xc2]);
  });

  it('should pack integers in the smallest format', () => {
    const cases: Array<[number, number[]]> = [
      [0, [0x00]],
      [127, [0x7f]],
      [-1, [0xff]],
      [-32, [0xe0]],
      [128, [0xcc, 0x80]],
      [255, [0xcc, 0xff]],
      [256, [0xcd, 0x01, 0x00]],
      [65535, [0xcd, 0xff, 0xff]],
      [65536, [0xce, 0x00, 0x01, 0x00, 0x00]],
      [2 ** 31, [0xce, 0x80, 0x00, 0x00, 0x00]],
      [2 ** 32, [0xcf, 0x00, 0x00, 0x00, 0x01, 0x00, 0x00, 0x00, 0x00]],
      [-33, [0xd0, 0xdf]],
      [-128, [0xd0, 0x80]],
      [-129, [0xd1, 0xff, 0x7f]],
      [-32768, [0xd1, 0x80, 0x00]],
      [-32769, [0xd2, 0xff, 0xff, 0x7f, 0xff]],
      [-(2 ** 31), [0xd2, 0x80, 0x00, 0x00, 0x00]],
      [-(2 ** 31) - 1, [0xd3, 0xff, 0xff, 0xff, 0xff, 0x7f, 0xff, 0xff, 0xff]],
    ];
    for (const [value, bytes] of cases) {
      expect(encoded((b) => packLong(b, 0, value))).toEqual(bytes);
    }
  });

  it('should pack bigints at the edges of the 64-bit range', () => {
    expect(encoded((b) => packLong(b, 0, 5n))).toEqual([0x05]);
    expect(encoded((b) => packLong(b, 0, 2n ** 64n - 1n))).toEqual([
      0xcf, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff,
    ]);
    expect(encoded((b) => packLong(b, 0, -(2n ** 63n)))).toEqual([
      0xd3, 0x80, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00,
    ]);
    expect(() => encoded((b) => packLong(b, 0, 2n ** 64n))).toThrow(InvalidArgumentError);
    expect(() => encoded((b) => packLong(b, 0, -(2n ** 63n) - 1n))).toThrow(InvalidArgumentError);
  });

  it('should reject non-integral numbers', () => {
    expect(() => encoded((b) => packLong(b, 0, 1.5))).toThrow(InvalidArgumentError);
  });

  it('should range-check byte, short and int inputs', () => {
    expect(encoded((b) => packByte(b, 0, -128))).toEqual([0xd0, 0x80]);
    expect(() => encoded((b) => packByte(b, 0, 128))).toThrow(InvalidArgumentError);
    expect(encoded((b) => packShort(b, 0, 200))).toEqual([0xcc, 0xc8]);
    expect(() => encoded((b) => packShort(b, 0, 32768))).toThrow(InvalidArgumentError);
    expect(encoded((b) => packInt(b, 0, -1))).toEqual([0xff]);
    expect(() => encoded((b) => packInt(b, 0, 2 ** 31))).toThrow(InvalidArgumentError);
  });

  it('should pack bigints by bit length', () => {
    expect(encoded((b) => packBigInt(b, 0, 2n ** 63n))).toEqual([
      0xcf, 0x80, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00,
    ]);
    expect(encoded((b) => packBigInt(b, 0, -(2n ** 63n)))).toEqual([
      0xd3, 0x80, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00,
    ]);
    expect(encoded((b) => packBigInt(b, 0, 42n))).toEqual([0x2a]);
    expect(() => encoded((b) => packBigInt(b, 0, -(2n ** 63n) - 1n))).toThrow(
      'MessagePack cannot serialize a bigint larger than 2^64-1',
    );
    expect(() => encoded((b) => packBigInt(b, 0, 2n ** 64n))).toThrow(InvalidArgumentError);
  });

  it('should compute bit lengths without the sign bit', () => {
    expect(bigIntBitLength(0n)).toBe(0);
    expect(bigIntBitLength(-1n)).toBe(0);
    expect(bigIntBitLength(255n)).toBe(8);
    expect(bigIntBitLength(-256n)).toBe(8);
    expect(bigIntBitLength(2n ** 63n)).toBe(64);
  });

  it('should pack floats and doubles', () => {
    expect(encoded((b) => packFloat(b, 0, 1.5))).toEqual([0xca, 0x3f, 0xc0, 0x00, 0x00]);
    expect(encoded((b) => packDouble(b, 0, 1.5))).toEqual([
      0xcb, 0x3f, 0xf8, 0x00, 0x00, 0x00, 0x00, 0x00, 0x00,
    ]);
  });

  it('should pack strings as UTF-8 behind the smallest header', () => {
    expect(encoded((b) => packString(b, 0, ''))).toEqual([0xa0]);
    expect(encoded((b) => packString(b, 0, 'abc'))).toEqual([0xa3, 0x61, 0x62, 0x63]);
    expect(encoded((b) => packString(b, 0, 'é'))).toEqual([0xa2, 0xc3, 0xa9]);

    const long = encoded((b) => packString(b, 0, 'x'.repeat(32)));
    expect(long.length).toBe(34);
    expect(long.slice(0, 2)).toEqual([0xd9, 32]);
  });

  it('should choose string header formats by length', () => {
    expect(encoded((b) => packRawStringHeader(b, 0, 31))).toEqual([0xbf]);
    expect(encoded((b) => packRawStringHeader(b, 0, 255))).toEqual([0xd9, 0xff]);
    expect(encoded((b) => packRawStringHeader(b, 0, 256))).toEqual([0xda, 0x01, 0x00]);
    expect(encoded((b) => packRawStringHeader(b, 0, 65536))).toEqual([0xdb, 0x00, 0x01, 0x00, 0x00]);
  });

  it('should choose array and map header formats by size', () => {
    expect(encoded((b) => packArrayHeader(b, 0, 0))).toEqual([0x90]);
    expect(encoded((b) => packArrayHeader(b, 0, 15))).toEqual([0x9f]);
    expect(encoded((b) => packArrayHeader(b, 0, 16))).toEqual([0xdc, 0x00, 0x10]);
    expect(encoded((b) => packArrayHeader(b, 0, 65536))).toEqual([0xdd, 0x00, 0x01, 0x00, 0x00]);

    expect(encoded((b) => packMapHeader(b, 0, 15))).toEqual([0x8f]);
    expect(encoded((b) => packMapHeader(b, 0, 16))).toEqual([0xde, 0x00, 0x10]);
    expect(encoded((b) => packMapHeader(b, 0, 65535))).toEqual([0xde, 0xff, 0xff]);
    expect(encoded((b) => packMapHeader(b, 0, 65536))).toEqual([0xdf, 0x00, 0x01, 0x00, 0x00]);
  });

  it('should reject negative sizes without writing anything', () => {
    const buf = new MessageBuffer(4);
    expect(() => packArrayHeader(buf, 0, -1)).toThrow('array size must be >= 0: -1');
    expect(() => packMapHeader(buf, 0, -1)).toThrow('map size must be >= 0: -1');
    expect(buf.size).toBe(4);
    expect(Array.from(buf.toBytes())).toEqual([0, 0, 0, 0]);
  });

  it('should use fixext codes for exact payload lengths', () => {
    const fixext: Array<[number, number]> = [
      [1, 0xd4],
      [2, 0xd5],
      [4, 0xd6],
      [8, 0xd7],
      [16, 0xd8],
    ];
    for (const [length, code] of fixext) {
      expect(encoded((b) => packExtensionTypeHeader(b, 0, 7, length))).toEqual([code, 7]);
    }
  });

  it('should use ext8, ext16 and ext32 for other payload lengths', () => {
    expect(encoded((b) => packExtensionTypeHeader(b, 0, 1, 3))).toEqual([0xc7, 3, 1]);
    expect(encoded((b) => packExtensionTypeHeader(b, 0, 1, 255))).toEqual([0xc7, 0xff, 1]);
    expect(encoded((b) => packExtensionTypeHeader(b, 0, 1, 256))).toEqual([0xc8, 0x01, 0x00, 1]);
    expect(encoded((b) => packExtensionTypeHeader(b, 0, -1, 65536))).toEqual([
      0xc9, 0x00, 0x01, 0x00, 0x00, 0xff,
    ]);
  });

  it('should reject invalid extension headers', () => {
    const buf = new MessageBuffer(8);
    expect(() => packExtensionTypeHeader(buf, 0, 128, 1)).toThrow(InvalidArgumentError);
    expect(() => packExtensionTypeHeader(buf, 0, 1, -1)).toThrow(InvalidArgumentError);
    expect(() => packExtensionTypeHeader(buf, 0, 1, 2 ** 32)).toThrow(
      'extension size must be < 2^32: 4294967296',
    );
  });

  it('should choose binary header formats by length', () => {
    expect(encoded((b) => packBinaryHeader(b, 0, 0))).toEqual([0xc4, 0x00]);
    expect(encoded((b) => packBinaryHeader(b, 0, 256))).toEqual([0xc5, 0x01, 0x00]);
    expect(encoded((b) => packBinaryHeader(b, 0, 65536))).toEqual([0xc6, 0x00, 0x01, 0x00, 0x00]);
  });

  it('should write a payload sub-range', () => {
    expect(encoded((b) => writePayload(b, 0, Uint8Array.of(1, 2, 3, 4), 1, 2))).toEqual([2, 3]);
  });

  it('should write at the given offset', () => {
    const buf = new MessageBuffer(0);
    expect(packLong(buf, 3, 128)).toBe(2);
    expect(Array.from(buf.toBytes(5))).toEqual([0, 0, 0, 0xcc, 0x80]);
  });
});
