import { Code } from "./format";
import { InvalidArgumentError } from "./errors";
import { utf8Bytes } from "./internal/buffer";
import type { MessageBuffer } from "./MessageBuffer";

/*
 * Writes one MessagePack unit at a given position of the buffer and returns the written
 * byte length. When several formats can hold a value, the shortest one is chosen.
 */

const INT64_MIN = -(2n ** 63n);
const UINT64_MAX = 2n ** 64n - 1n;
// Lengths of str32, bin32, array32, map32 and ext32 are unsigned 32-bit
const MAX_LENGTH = 0xffffffff;

export function packNil(buf: MessageBuffer, index: number): number {
  return buf.writeByte(index, Code.NIL);
}

export function packBoolean(buf: MessageBuffer, index: number, v: boolean): number {
  return buf.writeByte(index, v ? Code.TRUE : Code.FALSE);
}

function checkIntRange(v: number, bits: number): void {
  const limit = 2 ** (bits - 1);
  if (!Number.isInteger(v) || v < -limit || v >= limit) {
    throw new InvalidArgumentError(`${v} is not a signed ${bits}-bit integer`, {
      context: { value: v, bits },
    });
  }
}

export function packByte(buf: MessageBuffer, index: number, v: number): number {
  checkIntRange(v, 8);
  return packLong(buf, index, v);
}

export function packShort(buf: MessageBuffer, index: number, v: number): number {
  checkIntRange(v, 16);
  return packLong(buf, index, v);
}

export function packInt(buf: MessageBuffer, index: number, v: number): number {
  checkIntRange(v, 32);
  return packLong(buf, index, v);
}

/**
 * Packs an integer with the smallest of fixint, int8..int64 and uint8..uint64.
 *
 * Accepts any integral number or bigint in [-2^63, 2^64).
 */
export function packLong(buf: MessageBuffer, index: number, v: number | bigint): number {
  if (typeof v === "bigint") {
    if (v < INT64_MIN || v > UINT64_MAX) {
      throw new InvalidArgumentError(`${v} is outside the 64-bit integer range`, {
        context: { value: v.toString() },
      });
    }
    // Narrow values take the number path
    if (v >= -(2n ** 31n) && v < 2n ** 32n) {
      return packLong(buf, index, Number(v));
    }
    return buf.writeByteAndLong(index, v < 0n ? Code.INT64 : Code.UINT64, v);
  }

  if (!Number.isInteger(v)) {
    throw new InvalidArgumentError(`${v} is not an integer`, { context: { value: v } });
  }

  if (v < -(2 ** 5)) {
    if (v < -(2 ** 15)) {
      if (v < -(2 ** 31)) {
        return packLong(buf, index, BigInt(v));
      }
      return buf.writeByteAndInt(index, Code.INT32, v);
    } else if (v < -(2 ** 7)) {
      return buf.writeByteAndShort(index, Code.INT16, v);
    }
    return buf.writeByteAndByte(index, Code.INT8, v);
  } else if (v < 2 ** 7) {
    // positive or negative fixnum
    return buf.writeByte(index, v);
  } else if (v < 2 ** 16) {
    if (v < 2 ** 8) {
      return buf.writeByteAndByte(index, Code.UINT8, v);
    }
    return buf.writeByteAndShort(index, Code.UINT16, v);
  } else if (v < 2 ** 32) {
    return buf.writeByteAndInt(index, Code.UINT32, v);
  }
  return packLong(buf, index, BigInt(v));
}

/**
 * Packs an arbitrary-size bigint. Values need at most 63 bits plus sign, or exactly 64 bits
 * when positive; anything larger cannot be represented in MessagePack.
 */
export function packBigInt(buf: MessageBuffer, index: number, v: bigint): number {
  const bitLength = bigIntBitLength(v);
  if (bitLength <= 63) {
    return packLong(buf, index, v);
  } else if (bitLength === 64 && v > 0n) {
    return buf.writeByteAndLong(index, Code.UINT64, v);
  }
  throw new InvalidArgumentError("MessagePack cannot serialize a bigint larger than 2^64-1", {
    context: { value: v.toString(), bitLength },
  });
}

/**
 * Bit length in two's complement, excluding the sign bit.
 */
export function bigIntBitLength(v: bigint): number {
  const magnitude = v < 0n ? -v - 1n : v;
  return magnitude === 0n ? 0 : magnitude.toString(2).length;
}

export function packFloat(buf: MessageBuffer, index: number, v: number): number {
  return buf.writeByteAndFloat(index, Code.FLOAT32, v);
}

export function packDouble(buf: MessageBuffer, index: number, v: number): number {
  return buf.writeByteAndDouble(index, Code.FLOAT64, v);
}

export function packString(buf: MessageBuffer, index: number, s: string): number {
  const bytes = utf8Bytes(s);
  const len = packRawStringHeader(buf, index, bytes.length);
  writePayload(buf, index + len, bytes);
  return len + bytes.length;
}

function checkLength(kind: string, len: number): void {
  if (!Number.isInteger(len) || len < 0) {
    throw new InvalidArgumentError(`${kind} size must be >= 0: ${len}`, {
      context: { kind, size: len },
    });
  }
  if (len > MAX_LENGTH) {
    throw new InvalidArgumentError(`${kind} size must be < 2^32: ${len}`, {
      context: { kind, size: len },
    });
  }
}

export function packRawStringHeader(buf: MessageBuffer, index: number, len: number): number {
  checkLength("string", len);
  if (len < 2 ** 5) {
    return buf.writeByte(index, Code.FIXSTR_PREFIX | len);
  } else if (len < 2 ** 8) {
    return buf.writeByteAndByte(index, Code.STR8, len);
  } else if (len < 2 ** 16) {
    return buf.writeByteAndShort(index, Code.STR16, len);
  }
  return buf.writeByteAndInt(index, Code.STR32, len);
}

export function packArrayHeader(buf: MessageBuffer, index: number, arraySize: number): number {
  checkLength("array", arraySize);
  if (arraySize < 2 ** 4) {
    return buf.writeByte(index, Code.FIXARRAY_PREFIX | arraySize);
  } else if (arraySize < 2 ** 16) {
    return buf.writeByteAndShort(index, Code.ARRAY16, arraySize);
  }
  return buf.writeByteAndInt(index, Code.ARRAY32, arraySize);
}

export function packMapHeader(buf: MessageBuffer, index: number, mapSize: number): number {
  checkLength("map", mapSize);
  if (mapSize < 2 ** 4) {
    return buf.writeByte(index, Code.FIXMAP_PREFIX | mapSize);
  } else if (mapSize < 2 ** 16) {
    return buf.writeByteAndShort(index, Code.MAP16, mapSize);
  }
  return buf.writeByteAndInt(index, Code.MAP32, mapSize);
}

const FIXEXT_CODES: ReadonlyMap<number, number> = new Map([
  [1, Code.FIXEXT1],
  [2, Code.FIXEXT2],
  [4, Code.FIXEXT4],
  [8, Code.FIXEXT8],
  [16, Code.FIXEXT16],
]);

/**
 * Payloads of exactly 1, 2, 4, 8 or 16 bytes use a fixext code (2 header bytes); other
 * lengths use ext8 (3), ext16 (4) or ext32 (6). Payloads of 2^32 bytes or more are rejected.
 */
export function packExtensionTypeHeader(
  buf: MessageBuffer,
  index: number,
  extType: number,
  payloadLen: number,
): number {
  if (!Number.isInteger(extType) || extType < -128 || extType > 127) {
    throw new InvalidArgumentError(`Extension type must be a signed byte: ${extType}`, {
      context: { extType },
    });
  }
  checkLength("extension", payloadLen);

  if (payloadLen < 2 ** 8) {
    const fixext = FIXEXT_CODES.get(payloadLen);
    if (fixext !== undefined) {
      return buf.writeByteAndByte(index, fixext, extType);
    }
    buf.writeByteAndByte(index, Code.EXT8, payloadLen);
    buf.writeByte(index + 2, extType);
    return 3;
  } else if (payloadLen < 2 ** 16) {
    buf.writeByteAndShort(index, Code.EXT16, payloadLen);
    buf.writeByte(index + 3, extType);
    return 4;
  }
  buf.writeByteAndInt(index, Code.EXT32, payloadLen);
  buf.writeByte(index + 5, extType);
  return 6;
}

export function packBinaryHeader(buf: MessageBuffer, index: number, len: number): number {
  checkLength("binary", len);
  if (len < 2 ** 8) {
    return buf.writeByteAndByte(index, Code.BIN8, len);
  } else if (len < 2 ** 16) {
    return buf.writeByteAndShort(index, Code.BIN16, len);
  }
  return buf.writeByteAndInt(index, Code.BIN32, len);
}

export function writePayload(
  buf: MessageBuffer,
  index: number,
  v: Uint8Array,
  vOffset?: number,
  length?: number,
): number {
  return buf.writeBytes(index, v, vOffset, length);
}
