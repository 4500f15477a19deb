import type { CodecEntry, MessageCodec } from "./interfaces";
import { MessageBuffer, type MessageBufferOptions } from "./MessageBuffer";
import { MessageUnpacker } from "./unpacker";
import { Surfaces, surfaceName, type Surface } from "./surface";
import { IntegerOverflowError, TypeMismatchError } from "./errors";
import {
  packBigInt,
  packBinaryHeader,
  packBoolean,
  packByte,
  packDouble,
  packFloat,
  packInt,
  packLong,
  packNil,
  packShort,
  packString,
  writePayload,
} from "./packer";

/**
 * Rejects a value whose runtime type does not match the codec.
 */
export function typeMismatch(surface: Surface, expected: string, value: unknown): TypeMismatchError {
  const actual = value === null ? "null" : Array.isArray(value) ? "array" : typeof value;
  return new TypeMismatchError(
    `Cannot encode ${actual} as ${surfaceName(surface)}: expected ${expected}`,
    { context: { surface: surfaceName(surface), expected, actual } },
  );
}

function decodeRangedInt(unpacker: MessageUnpacker, bits: number): number {
  const start = unpacker.position;
  const v = unpacker.unpackInt();
  const limit = 2 ** (bits - 1);
  if (v < -limit || v >= limit) {
    throw new IntegerOverflowError(`${v} does not fit in a signed ${bits}-bit integer`, {
      context: { value: v, bits, position: start },
    });
  }
  return v;
}

/**
 * Nil Codec: Always encodes nil.
 */
export const NilCodec: MessageCodec<null> = {
  surface: Surfaces.nil,
  encode(_value: null, buffer: MessageBuffer, offset: number): number {
    return packNil(buffer, offset);
  },
  decode(unpacker: MessageUnpacker): null {
    return unpacker.unpackNil();
  },
};

export const BooleanCodec: MessageCodec<boolean> = {
  surface: Surfaces.boolean,
  encode(value: boolean, buffer: MessageBuffer, offset: number): number {
    if (typeof value !== "boolean") throw typeMismatch(this.surface, "boolean", value);
    return packBoolean(buffer, offset, value);
  },
  decode(unpacker: MessageUnpacker): boolean {
    return unpacker.unpackBoolean();
  },
};

/**
 * Byte Codec: 8-bit signed integers, packed in the smallest integer format.
 */
export const ByteCodec: MessageCodec<number> = {
  surface: Surfaces.byte,
  encode(value: number, buffer: MessageBuffer, offset: number): number {
    if (typeof value !== "number") throw typeMismatch(this.surface, "number", value);
    return packByte(buffer, offset, value);
  },
  decode(unpacker: MessageUnpacker): number {
    return decodeRangedInt(unpacker, 8);
  },
};

export const ShortCodec: MessageCodec<number> = {
  surface: Surfaces.short,
  encode(value: number, buffer: MessageBuffer, offset: number): number {
    if (typeof value !== "number") throw typeMismatch(this.surface, "number", value);
    return packShort(buffer, offset, value);
  },
  decode(unpacker: MessageUnpacker): number {
    return decodeRangedInt(unpacker, 16);
  },
};

export const IntCodec: MessageCodec<number> = {
  surface: Surfaces.int,
  encode(value: number, buffer: MessageBuffer, offset: number): number {
    if (typeof value !== "number") throw typeMismatch(this.surface, "number", value);
    return packInt(buffer, offset, value);
  },
  decode(unpacker: MessageUnpacker): number {
    return unpacker.unpackInt();
  },
};

/**
 * Long Codec: 64-bit signed integers as bigints.
 */
export const LongCodec: MessageCodec<bigint> = {
  surface: Surfaces.long,
  encode(value: bigint, buffer: MessageBuffer, offset: number): number {
    if (typeof value !== "bigint") throw typeMismatch(this.surface, "bigint", value);
    if (value >= 2n ** 63n) {
      throw new IntegerOverflowError(`${value} does not fit in a signed 64-bit integer`, {
        context: { value: value.toString() },
      });
    }
    return packLong(buffer, offset, value);
  },
  decode(unpacker: MessageUnpacker): bigint {
    return unpacker.unpackLong();
  },
};

/**
 * BigInt Codec: Integers in [-2^63, 2^64), the full MessagePack integer range.
 */
export const BigIntCodec: MessageCodec<bigint> = {
  surface: Surfaces.bigint,
  encode(value: bigint, buffer: MessageBuffer, offset: number): number {
    if (typeof value !== "bigint") throw typeMismatch(this.surface, "bigint", value);
    return packBigInt(buffer, offset, value);
  },
  decode(unpacker: MessageUnpacker): bigint {
    return unpacker.unpackBigInt();
  },
};

/**
 * Float Codec: IEEE-754 single precision (float32), 5 bytes.
 */
export const FloatCodec: MessageCodec<number> = {
  surface: Surfaces.float,
  encode(value: number, buffer: MessageBuffer, offset: number): number {
    if (typeof value !== "number") throw typeMismatch(this.surface, "number", value);
    return packFloat(buffer, offset, value);
  },
  decode(unpacker: MessageUnpacker): number {
    return unpacker.unpackFloat();
  },
};

/**
 * Double Codec: IEEE-754 double precision (float64), 9 bytes.
 */
export const DoubleCodec: MessageCodec<number> = {
  surface: Surfaces.double,
  encode(value: number, buffer: MessageBuffer, offset: number): number {
    if (typeof value !== "number") throw typeMismatch(this.surface, "number", value);
    return packDouble(buffer, offset, value);
  },
  decode(unpacker: MessageUnpacker): number {
    return unpacker.unpackDouble();
  },
};

/**
 * String Codec: Encodes strings as UTF-8 behind the smallest str header.
 */
export const StringCodec: MessageCodec<string> = {
  surface: Surfaces.string,
  encode(value: string, buffer: MessageBuffer, offset: number): number {
    if (typeof value !== "string") throw typeMismatch(this.surface, "string", value);
    return packString(buffer, offset, value);
  },
  decode(unpacker: MessageUnpacker): string {
    return unpacker.unpackString();
  },
};

/**
 * Binary Codec: Encodes byte arrays (Buffer included) as bin8/16/32.
 * Decoding returns a copy.
 */
export const BinaryCodec: MessageCodec<Uint8Array> = {
  surface: Surfaces.binary,
  encode(value: Uint8Array, buffer: MessageBuffer, offset: number): number {
    if (!(value instanceof Uint8Array)) throw typeMismatch(this.surface, "Uint8Array", value);
    const len = packBinaryHeader(buffer, offset, value.length);
    return len + writePayload(buffer, offset + len, value);
  },
  decode(unpacker: MessageUnpacker): Uint8Array {
    return unpacker.unpackBinary();
  },
};

/**
 * The codecs of every primitive surface, used as the known codecs of
 * `MessageCodecFactory.defaultFactory`.
 */
export const StandardCodecs: readonly CodecEntry[] = [
  NilCodec,
  BooleanCodec,
  ByteCodec,
  ShortCodec,
  IntCodec,
  LongCodec,
  BigIntCodec,
  FloatCodec,
  DoubleCodec,
  StringCodec,
  BinaryCodec,
].map((codec): CodecEntry => [codec.surface, codec]);

export interface PackOptions extends MessageBufferOptions {
  /**
   * Starting size of the buffer. It grows as needed.
   */
  initialSize?: number;
}

/**
 * Encodes a value into a new byte array.
 */
export function toMessagePack<T>(codec: MessageCodec<T>, value: T, options: PackOptions = {}): Uint8Array {
  const buffer = MessageBuffer.allocate(options.initialSize, options);
  const written = codec.encode(value, buffer, 0);
  return buffer.toBytes(written);
}

/**
 * Decodes one value from the start of `bytes`.
 */
export function fromMessagePack<T>(codec: MessageCodec<T>, bytes: Uint8Array): T {
  return codec.decode(new MessageUnpacker(bytes));
}
