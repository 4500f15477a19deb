import {
  Code,
  formatName,
  isFixStr,
  isFixedArray,
  isFixedMap,
  isNegFixInt,
  isPosFixInt,
  valueTypeOf,
  type ValueType,
} from "./format";
import { InsufficientDataError, IntegerOverflowError, TypeMismatchError } from "./errors";
import { MessageBuffer } from "./MessageBuffer";

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

export interface ExtensionTypeHeader {
  extType: number;
  byteLength: number;
}

export interface ExtensionValue {
  extType: number;
  data: Uint8Array;
}

/**
 * Any decoded MessagePack value.
 */
export type MessageValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | ExtensionValue
  | MessageValue[]
  | Map<MessageValue, MessageValue>;

/**
 * MessageUnpacker: reads MessagePack values sequentially from a MessageBuffer.
 *
 * The cursor only advances when a value was read successfully.
 */
export class MessageUnpacker {
  private readonly buf: MessageBuffer;
  private pos: number;
  private readonly limit: number;

  /**
   * @param source Encoded bytes, or a MessageBuffer holding them
   * @param offset Position of the first value
   * @param limit End of the readable region. Defaults to the end of the source.
   */
  constructor(source: MessageBuffer | Uint8Array, offset: number = 0, limit?: number) {
    this.buf = source instanceof MessageBuffer ? source : MessageBuffer.wrap(source);
    this.pos = offset;
    this.limit = limit ?? this.buf.size;
  }

  get position(): number {
    return this.pos;
  }

  hasNext(): boolean {
    return this.pos < this.limit;
  }

  private ensure(length: number): void {
    if (this.pos + length > this.limit) {
      throw new InsufficientDataError(
        `Need ${length} bytes at position ${this.pos}, but only ${this.limit - this.pos} remain`,
        { context: { position: this.pos, length, limit: this.limit } },
      );
    }
  }

  /**
   * Peeks the next format byte without consuming it.
   */
  getNextFormat(): number {
    this.ensure(1);
    return this.buf.readByte(this.pos);
  }

  getNextValueType(): ValueType {
    return valueTypeOf(this.getNextFormat());
  }

  private mismatch(expected: string, b: number): TypeMismatchError {
    return new TypeMismatchError(
      `Expected ${expected}, but found ${formatName(b)} at position ${this.pos}`,
      { context: { expected, found: formatName(b), position: this.pos } },
    );
  }

  private readUInt8At(offset: number): number {
    this.ensure(offset + 1);
    return this.buf.readUInt8(this.pos + offset);
  }

  private readUInt16At(offset: number): number {
    this.ensure(offset + 2);
    return this.buf.readUInt16(this.pos + offset);
  }

  private readUInt32At(offset: number): number {
    this.ensure(offset + 4);
    return this.buf.readUInt32(this.pos + offset);
  }

  tryUnpackNil(): boolean {
    if (this.getNextFormat() === Code.NIL) {
      this.pos += 1;
      return true;
    }
    return false;
  }

  unpackNil(): null {
    const b = this.getNextFormat();
    if (b !== Code.NIL) throw this.mismatch("nil", b);
    this.pos += 1;
    return null;
  }

  unpackBoolean(): boolean {
    const b = this.getNextFormat();
    if (b === Code.TRUE || b === Code.FALSE) {
      this.pos += 1;
      return b === Code.TRUE;
    }
    throw this.mismatch("boolean", b);
  }

  /**
   * Reads any integer format as a bigint.
   */
  unpackBigInt(): bigint {
    const b = this.getNextFormat();
    if (isPosFixInt(b)) {
      this.pos += 1;
      return BigInt(b);
    }
    if (isNegFixInt(b)) {
      this.pos += 1;
      return BigInt(b - 0x100);
    }

    let value: bigint;
    let size: number;
    switch (b) {
      case Code.UINT8:
        value = BigInt(this.readUInt8At(1));
        size = 2;
        break;
      case Code.UINT16:
        value = BigInt(this.readUInt16At(1));
        size = 3;
        break;
      case Code.UINT32:
        value = BigInt(this.readUInt32At(1));
        size = 5;
        break;
      case Code.UINT64:
        this.ensure(9);
        value = this.buf.readUInt64(this.pos + 1);
        size = 9;
        break;
      case Code.INT8:
        this.ensure(2);
        value = BigInt(this.buf.readInt8(this.pos + 1));
        size = 2;
        break;
      case Code.INT16:
        this.ensure(3);
        value = BigInt(this.buf.readInt16(this.pos + 1));
        size = 3;
        break;
      case Code.INT32:
        this.ensure(5);
        value = BigInt(this.buf.readInt32(this.pos + 1));
        size = 5;
        break;
      case Code.INT64:
        this.ensure(9);
        value = this.buf.readInt64(this.pos + 1);
        size = 9;
        break;
      default:
        throw this.mismatch("integer", b);
    }
    this.pos += size;
    return value;
  }

  unpackLong(): bigint {
    const start = this.pos;
    const v = this.unpackBigInt();
    if (v > INT64_MAX || v < INT64_MIN) {
      this.pos = start;
      throw new IntegerOverflowError(`${v} does not fit in a signed 64-bit integer`, {
        context: { value: v.toString(), position: start },
      });
    }
    return v;
  }

  unpackInt(): number {
    const start = this.pos;
    const v = this.unpackBigInt();
    if (v > BigInt(INT32_MAX) || v < BigInt(INT32_MIN)) {
      this.pos = start;
      throw new IntegerOverflowError(`${v} does not fit in a signed 32-bit integer`, {
        context: { value: v.toString(), position: start },
      });
    }
    return Number(v);
  }

  /**
   * Reads an integer as a number when it is a safe integer, otherwise as a bigint.
   */
  unpackNumber(): number | bigint {
    const v = this.unpackBigInt();
    return v >= BigInt(Number.MIN_SAFE_INTEGER) && v <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(v)
      : v;
  }

  unpackFloat(): number {
    return Math.fround(this.unpackDouble());
  }

  /**
   * Reads float32 or float64; integer formats are widened.
   */
  unpackDouble(): number {
    const b = this.getNextFormat();
    switch (b) {
      case Code.FLOAT32: {
        this.ensure(5);
        const v = this.buf.readFloat(this.pos + 1);
        this.pos += 5;
        return v;
      }
      case Code.FLOAT64: {
        this.ensure(9);
        const v = this.buf.readDouble(this.pos + 1);
        this.pos += 9;
        return v;
      }
      default:
        if (valueTypeOf(b) === "integer") {
          return Number(this.unpackBigInt());
        }
        throw this.mismatch("float", b);
    }
  }

  unpackRawStringHeader(): number {
    const b = this.getNextFormat();
    if (isFixStr(b)) {
      this.pos += 1;
      return b & 0x1f;
    }
    switch (b) {
      case Code.STR8: {
        const len = this.readUInt8At(1);
        this.pos += 2;
        return len;
      }
      case Code.STR16: {
        const len = this.readUInt16At(1);
        this.pos += 3;
        return len;
      }
      case Code.STR32: {
        const len = this.readUInt32At(1);
        this.pos += 5;
        return len;
      }
      default:
        throw this.mismatch("string", b);
    }
  }

  unpackString(): string {
    const start = this.pos;
    const len = this.unpackRawStringHeader();
    try {
      this.ensure(len);
    } catch (e) {
      this.pos = start;
      throw e;
    }
    const s = this.buf.readString(this.pos, len);
    this.pos += len;
    return s;
  }

  unpackArrayHeader(): number {
    const b = this.getNextFormat();
    if (isFixedArray(b)) {
      this.pos += 1;
      return b & 0x0f;
    }
    switch (b) {
      case Code.ARRAY16: {
        const len = this.readUInt16At(1);
        this.pos += 3;
        return len;
      }
      case Code.ARRAY32: {
        const len = this.readUInt32At(1);
        this.pos += 5;
        return len;
      }
      default:
        throw this.mismatch("array", b);
    }
  }

  unpackMapHeader(): number {
    const b = this.getNextFormat();
    if (isFixedMap(b)) {
      this.pos += 1;
      return b & 0x0f;
    }
    switch (b) {
      case Code.MAP16: {
        const len = this.readUInt16At(1);
        this.pos += 3;
        return len;
      }
      case Code.MAP32: {
        const len = this.readUInt32At(1);
        this.pos += 5;
        return len;
      }
      default:
        throw this.mismatch("map", b);
    }
  }

  unpackExtensionTypeHeader(): ExtensionTypeHeader {
    const b = this.getNextFormat();
    const signed = (v: number) => (v > 127 ? v - 256 : v);
    let header: ExtensionTypeHeader;
    let size: number;
    switch (b) {
      case Code.FIXEXT1:
      case Code.FIXEXT2:
      case Code.FIXEXT4:
      case Code.FIXEXT8:
      case Code.FIXEXT16:
        header = { extType: signed(this.readUInt8At(1)), byteLength: 1 << (b - Code.FIXEXT1) };
        size = 2;
        break;
      case Code.EXT8:
        header = { extType: signed(this.readUInt8At(2)), byteLength: this.readUInt8At(1) };
        size = 3;
        break;
      case Code.EXT16:
        header = { extType: signed(this.readUInt8At(3)), byteLength: this.readUInt16At(1) };
        size = 4;
        break;
      case Code.EXT32:
        header = { extType: signed(this.readUInt8At(5)), byteLength: this.readUInt32At(1) };
        size = 6;
        break;
      default:
        throw this.mismatch("extension", b);
    }
    this.pos += size;
    return header;
  }

  unpackBinaryHeader(): number {
    const b = this.getNextFormat();
    switch (b) {
      case Code.BIN8: {
        const len = this.readUInt8At(1);
        this.pos += 2;
        return len;
      }
      case Code.BIN16: {
        const len = this.readUInt16At(1);
        this.pos += 3;
        return len;
      }
      case Code.BIN32: {
        const len = this.readUInt32At(1);
        this.pos += 5;
        return len;
      }
      default:
        throw this.mismatch("binary", b);
    }
  }

  readPayload(length: number): Uint8Array {
    this.ensure(length);
    const bytes = this.buf.readBytes(this.pos, length);
    this.pos += length;
    return bytes;
  }

  unpackBinary(): Uint8Array {
    const start = this.pos;
    const len = this.unpackBinaryHeader();
    try {
      return this.readPayload(len);
    } catch (e) {
      this.pos = start;
      throw e;
    }
  }

  /**
   * Decodes the next value whatever its format.
   */
  unpackValue(): MessageValue {
    switch (this.getNextValueType()) {
      case "nil":
        return this.unpackNil();
      case "boolean":
        return this.unpackBoolean();
      case "integer":
        return this.unpackNumber();
      case "float":
        return this.unpackDouble();
      case "string":
        return this.unpackString();
      case "binary":
        return this.unpackBinary();
      case "array": {
        const size = this.unpackArrayHeader();
        const values: MessageValue[] = [];
        for (let i = 0; i < size; i++) values.push(this.unpackValue());
        return values;
      }
      case "map": {
        const size = this.unpackMapHeader();
        const entries = new Map<MessageValue, MessageValue>();
        for (let i = 0; i < size; i++) {
          const k = this.unpackValue();
          entries.set(k, this.unpackValue());
        }
        return entries;
      }
      case "extension": {
        const { extType, byteLength } = this.unpackExtensionTypeHeader();
        return { extType, data: this.readPayload(byteLength) };
      }
      case "never_used":
        throw this.mismatch("a value", this.getNextFormat());
    }
  }

  /**
   * Skips the next value, including every nested element of arrays and maps.
   */
  skipValue(): void {
    let remaining = 1;
    while (remaining > 0) {
      const type = this.getNextValueType();
      remaining--;
      switch (type) {
        case "array":
          remaining += this.unpackArrayHeader();
          break;
        case "map":
          remaining += this.unpackMapHeader() * 2;
          break;
        case "string":
          this.readPayload(this.unpackRawStringHeader());
          break;
        case "binary":
          this.readPayload(this.unpackBinaryHeader());
          break;
        case "extension":
          this.readPayload(this.unpackExtensionTypeHeader().byteLength);
          break;
        default:
          this.unpackValue();
      }
    }
  }
}
