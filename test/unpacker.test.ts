import { describe, it, expect } from 'vitest';
import { MessageBuffer } from '../src/MessageBuffer';
import { MessageUnpacker } from '../src/unpacker';
import {
  InsufficientDataError,
  IntegerOverflowError,
  TypeMismatchError,
} from '../src/errors';
import {
  packArrayHeader,
  packBinaryHeader,
  packBoolean,
  packDouble,
  packExtensionTypeHeader,
  packFloat,
  packLong,
  packMapHeader,
  packNil,
  packString,
  writePayload,
} from '../src/packer';

/**
 * Runs the writers one after another and returns an unpacker over the result.
 */
function unpackerOf(...writers: Array<(buf: MessageBuffer, offset: number) => number>): MessageUnpacker {
  const buf = new MessageBuffer(0);
  let pos = 0;
  for (const write of writers) pos += write(buf, pos);
  return new MessageUnpacker(buf.toBytes(pos));
}

describe('MessageUnpacker', () => {
  it('should round-trip integers at format boundaries', () => {
    const values = [
      -33, -32, -1, 0, 127, 128, 255, 256, 65535, 65536,
      2 ** 31 - 1, 2 ** 31, 2 ** 32 - 1, 2 ** 32,
    ];
    for (const v of values) {
      const u = unpackerOf((b, o) => packLong(b, o, v));
      expect(u.unpackNumber()).toBe(v);
      expect(u.hasNext()).toBe(false);
    }

    expect(unpackerOf((b, o) => packLong(b, o, 2n ** 63n - 1n)).unpackLong()).toBe(2n ** 63n - 1n);
    expect(unpackerOf((b, o) => packLong(b, o, 2n ** 64n - 1n)).unpackBigInt()).toBe(2n ** 64n - 1n);
    expect(unpackerOf((b, o) => packLong(b, o, -(2n ** 63n))).unpackLong()).toBe(-(2n ** 63n));
  });

  it('should return bigints for integers outside the safe range', () => {
    expect(unpackerOf((b, o) => packLong(b, o, 2n ** 60n)).unpackNumber()).toBe(2n ** 60n);
  });

  it('should keep the position when an integer overflows the requested width', () => {
    const wide = unpackerOf((b, o) => packLong(b, o, 2n ** 64n - 1n));
    expect(() => wide.unpackLong()).toThrow(IntegerOverflowError);
    expect(wide.position).toBe(0);

    const int = unpackerOf((b, o) => packLong(b, o, 2 ** 31));
    expect(() => int.unpackInt()).toThrow(IntegerOverflowError);
    expect(int.position).toBe(0);
    expect(int.unpackLong()).toBe(2n ** 31n);
  });

  it('should report the format found on a mismatch', () => {
    const u = unpackerOf(packNil);
    expect(() => u.unpackBoolean()).toThrow(TypeMismatchError);
    expect(() => u.unpackBoolean()).toThrow('Expected boolean, but found NIL at position 0');
    expect(u.tryUnpackNil()).toBe(true);
    expect(u.hasNext()).toBe(false);
  });

  it('should not consume a truncated string', () => {
    const u = new MessageUnpacker(Uint8Array.of(0xa3, 0x61));
    expect(() => u.unpackString()).toThrow(InsufficientDataError);
    expect(u.position).toBe(0);
  });

  it('should read booleans, floats and doubles', () => {
    const u = unpackerOf(
      (b, o) => packBoolean(b, o, true),
      (b, o) => packFloat(b, o, 1.5),
      (b, o) => packDouble(b, o, -0.25),
      (b, o) => packLong(b, o, 5),
    );
    expect(u.unpackBoolean()).toBe(true);
    expect(u.unpackFloat()).toBe(1.5);
    expect(u.unpackDouble()).toBe(-0.25);
    expect(u.unpackDouble()).toBe(5);
  });

  it('should round-trip strings around the fixstr boundary', () => {
    for (const length of [0, 31, 32]) {
      const s = 'k'.repeat(length);
      expect(unpackerOf((b, o) => packString(b, o, s)).unpackString()).toBe(s);
    }
  });

  it('should round-trip array and map headers', () => {
    for (const size of [0, 15, 16, 65535, 65536]) {
      expect(unpackerOf((b, o) => packArrayHeader(b, o, size)).unpackArrayHeader()).toBe(size);
      expect(unpackerOf((b, o) => packMapHeader(b, o, size)).unpackMapHeader()).toBe(size);
    }
  });

  it('should round-trip binaries', () => {
    for (const size of [0, 255, 256]) {
      const payload = new Uint8Array(size).fill(9);
      const u = unpackerOf(
        (b, o) => packBinaryHeader(b, o, size),
        (b, o) => writePayload(b, o, payload),
      );
      expect(u.unpackBinary()).toEqual(payload);
    }
  });

  it('should read extension headers with a signed type', () => {
    const u = unpackerOf(
      (b, o) => packExtensionTypeHeader(b, o, -1, 3),
      (b, o) => writePayload(b, o, Uint8Array.of(1, 2, 3)),
    );
    expect(u.unpackExtensionTypeHeader()).toEqual({ extType: -1, byteLength: 3 });
    expect(Array.from(u.readPayload(3))).toEqual([1, 2, 3]);
  });

  it('should decode nested values', () => {
    const u = unpackerOf(
      (b, o) => packArrayHeader(b, o, 4),
      (b, o) => packLong(b, o, 1),
      (b, o) => packString(b, o, 'a'),
      packNil,
      (b, o) => packMapHeader(b, o, 1),
      (b, o) => packString(b, o, 'k'),
      (b, o) => packBoolean(b, o, true),
    );
    expect(u.unpackValue()).toEqual([1, 'a', null, new Map([['k', true]])]);
  });

  it('should decode extensions as values', () => {
    const u = unpackerOf(
      (b, o) => packExtensionTypeHeader(b, o, 5, 2),
      (b, o) => writePayload(b, o, Uint8Array.of(7, 8)),
    );
    expect(u.unpackValue()).toEqual({ extType: 5, data: Uint8Array.of(7, 8) });
  });

  it('should skip nested values', () => {
    const u = unpackerOf(
      (b, o) => packArrayHeader(b, o, 3),
      (b, o) => packString(b, o, 'x'),
      (b, o) => packArrayHeader(b, o, 2),
      (b, o) => packLong(b, o, 1),
      (b, o) => packLong(b, o, 2),
      (b, o) => packMapHeader(b, o, 1),
      (b, o) => packLong(b, o, 1),
      (b, o) => packLong(b, o, 2),
      (b, o) => packLong(b, o, 7),
    );
    u.skipValue();
    expect(u.unpackInt()).toBe(7);
    expect(u.hasNext()).toBe(false);
  });

  it('should read a region of a MessageBuffer', () => {
    const buf = new MessageBuffer(0);
    let pos = packLong(buf, 0, 1);
    pos += packLong(buf, pos, 2);
    packLong(buf, pos, 3);

    const u = new MessageUnpacker(buf, 1, 2);
    expect(u.unpackInt()).toBe(2);
    expect(u.hasNext()).toBe(false);
    expect(() => u.unpackInt()).toThrow(InsufficientDataError);
  });
});
