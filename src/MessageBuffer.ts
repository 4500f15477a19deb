import { Buffer } from "./internal/buffer";
import { InsufficientDataError, InvalidArgumentError } from "./errors";
import { DEFAULT_INITIAL_BUFFER_SIZE, DEFAULT_MAX_BUFFER_SIZE } from "./config";

export interface MessageBufferOptions {
  /**
   * Upper bound for growth in bytes. Defaults to 4GB.
   */
  maxSize?: number;
}

/**
 * MessageBuffer: a growable byte region with offset-addressed, big-endian access.
 *
 * Every write first makes sure the region is large enough (doubling the backing Buffer)
 * and returns the number of bytes it wrote. Reads are bounds-checked against the
 * current size.
 */
export class MessageBuffer {
  private buf: Buffer;
  private readonly maxSize: number;

  constructor(initialSize: number = DEFAULT_INITIAL_BUFFER_SIZE, options: MessageBufferOptions = {}) {
    this.maxSize = options.maxSize ?? DEFAULT_MAX_BUFFER_SIZE;
    if (!Number.isInteger(initialSize) || initialSize < 0 || initialSize > this.maxSize) {
      throw new InvalidArgumentError(`Invalid buffer size: ${initialSize}`, {
        context: { initialSize, maxSize: this.maxSize },
      });
    }
    this.buf = Buffer.alloc(initialSize);
  }

  static allocate(initialSize?: number, options?: MessageBufferOptions): MessageBuffer {
    return new MessageBuffer(initialSize, options);
  }

  /**
   * Wraps a copy of existing bytes, e.g. for decoding.
   */
  static wrap(bytes: Uint8Array): MessageBuffer {
    const mb = new MessageBuffer(bytes.length);
    mb.buf.set(bytes, 0);
    return mb;
  }

  get size(): number {
    return this.buf.length;
  }

  /**
   * Resizes the backing storage. Shrinking truncates, growing keeps existing bytes.
   */
  resize(newSize: number): void {
    if (newSize === this.buf.length) return;
    if (!Number.isInteger(newSize) || newSize < 0 || newSize > this.maxSize) {
      throw new InvalidArgumentError(`Cannot resize buffer to ${newSize} bytes`, {
        context: { newSize, maxSize: this.maxSize },
      });
    }
    const next = Buffer.alloc(newSize);
    this.buf.copy(next, 0, 0, Math.min(newSize, this.buf.length));
    this.buf = next;
  }

  private ensureCapacity(index: number, length: number): void {
    const required = index + length;
    if (required <= this.buf.length) return;

    let capacity = Math.max(this.buf.length, 16);
    while (capacity < required) capacity *= 2;
    this.resize(Math.min(Math.max(capacity, required), this.maxSize));

    if (required > this.buf.length) {
      throw new InvalidArgumentError(
        `Write of ${length} bytes at ${index} exceeds the maximum buffer size`,
        { context: { index, length, maxSize: this.maxSize } },
      );
    }
  }

  private checkReadable(index: number, length: number): void {
    if (index < 0 || index + length > this.buf.length) {
      throw new InsufficientDataError(
        `Cannot read ${length} bytes at ${index}: buffer holds ${this.buf.length} bytes`,
        { context: { index, length, size: this.buf.length } },
      );
    }
  }

  // Writes

  writeByte(index: number, b: number): number {
    this.ensureCapacity(index, 1);
    this.buf.writeUInt8(b & 0xff, index);
    return 1;
  }

  writeByteAndByte(index: number, b: number, v: number): number {
    this.ensureCapacity(index, 2);
    this.buf.writeUInt8(b & 0xff, index);
    this.buf.writeUInt8(v & 0xff, index + 1);
    return 2;
  }

  writeByteAndShort(index: number, b: number, v: number): number {
    this.ensureCapacity(index, 3);
    this.buf.writeUInt8(b & 0xff, index);
    this.buf.writeUInt16BE(v & 0xffff, index + 1);
    return 3;
  }

  writeByteAndInt(index: number, b: number, v: number): number {
    this.ensureCapacity(index, 5);
    this.buf.writeUInt8(b & 0xff, index);
    this.buf.writeUInt32BE(v >>> 0, index + 1);
    return 5;
  }

  /**
   * Writes the two's complement 64-bit form of `v`, so signed and unsigned inputs share it.
   */
  writeByteAndLong(index: number, b: number, v: bigint): number {
    this.ensureCapacity(index, 9);
    const bits = BigInt.asUintN(64, v);
    this.buf.writeUInt8(b & 0xff, index);
    this.buf.writeUInt32BE(Number(bits >> 32n), index + 1);
    this.buf.writeUInt32BE(Number(bits & 0xffffffffn), index + 5);
    return 9;
  }

  writeByteAndFloat(index: number, b: number, v: number): number {
    this.ensureCapacity(index, 5);
    this.buf.writeUInt8(b & 0xff, index);
    this.buf.writeFloatBE(v, index + 1);
    return 5;
  }

  writeByteAndDouble(index: number, b: number, v: number): number {
    this.ensureCapacity(index, 9);
    this.buf.writeUInt8(b & 0xff, index);
    this.buf.writeDoubleBE(v, index + 1);
    return 9;
  }

  writeBytes(
    index: number,
    src: Uint8Array,
    srcOffset: number = 0,
    length: number = src.length - srcOffset,
  ): number {
    if (srcOffset < 0 || length < 0 || srcOffset + length > src.length) {
      throw new InvalidArgumentError(
        `Invalid payload range [${srcOffset}, ${srcOffset + length}) of ${src.length} bytes`,
        { context: { srcOffset, length, srcLength: src.length } },
      );
    }
    this.ensureCapacity(index, length);
    this.buf.set(src.subarray(srcOffset, srcOffset + length), index);
    return length;
  }

  // Reads

  readByte(index: number): number {
    this.checkReadable(index, 1);
    return this.buf.readUInt8(index);
  }

  readUInt8(index: number): number {
    return this.readByte(index);
  }

  readInt8(index: number): number {
    this.checkReadable(index, 1);
    return this.buf.readInt8(index);
  }

  readUInt16(index: number): number {
    this.checkReadable(index, 2);
    return this.buf.readUInt16BE(index);
  }

  readInt16(index: number): number {
    this.checkReadable(index, 2);
    return this.buf.readInt16BE(index);
  }

  readUInt32(index: number): number {
    this.checkReadable(index, 4);
    return this.buf.readUInt32BE(index);
  }

  readInt32(index: number): number {
    this.checkReadable(index, 4);
    return this.buf.readInt32BE(index);
  }

  readUInt64(index: number): bigint {
    this.checkReadable(index, 8);
    const hi = BigInt(this.buf.readUInt32BE(index));
    const lo = BigInt(this.buf.readUInt32BE(index + 4));
    return (hi << 32n) | lo;
  }

  readInt64(index: number): bigint {
    return BigInt.asIntN(64, this.readUInt64(index));
  }

  readFloat(index: number): number {
    this.checkReadable(index, 4);
    return this.buf.readFloatBE(index);
  }

  readDouble(index: number): number {
    this.checkReadable(index, 8);
    return this.buf.readDoubleBE(index);
  }

  /**
   * Copies `length` bytes starting at `index` into a new array.
   */
  readBytes(index: number, length: number): Uint8Array {
    this.checkReadable(index, length);
    const out = new Uint8Array(length);
    out.set(this.buf.subarray(index, index + length));
    return out;
  }

  readString(index: number, length: number): string {
    this.checkReadable(index, length);
    return this.buf.toString("utf8", index, index + length);
  }

  /**
   * A copy of the first `length` bytes, typically the encoded message.
   */
  toBytes(length: number = this.buf.length): Uint8Array {
    return this.readBytes(0, length);
  }
}
