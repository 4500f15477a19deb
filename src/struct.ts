import type { MessageCodec } from "./interfaces";
import type { MessageBuffer } from "./MessageBuffer";
import type { MessageUnpacker } from "./unpacker";
import {
  Surfaces,
  surfaceName,
  type EnumSurface,
  type EnumValue,
  type OptionSurface,
  type RecordSurface,
  type TupleSurface,
} from "./surface";
import { InvalidArgumentError, TypeMismatchError } from "./errors";
import { packArrayHeader, packLong, packNil, packString } from "./packer";
import { typeMismatch } from "./codecs";
import { defineEntry } from "./internal/properties";

/**
 * Option Codec: `undefined` and `null` are written as nil, anything else by the element codec.
 * Nil decodes to `undefined`.
 */
export class OptionCodec<T> implements MessageCodec<T | undefined> {
  readonly surface: OptionSurface;

  constructor(
    private readonly element: MessageCodec<T>,
    surface?: OptionSurface,
  ) {
    this.surface = surface ?? Surfaces.option(element.surface);
  }

  encode(value: T | undefined, buffer: MessageBuffer, offset: number): number {
    if (value === undefined || value === null) {
      return packNil(buffer, offset);
    }
    return this.element.encode(value, buffer, offset);
  }

  decode(unpacker: MessageUnpacker): T | undefined {
    return unpacker.tryUnpackNil() ? undefined : this.element.decode(unpacker);
  }
}

/**
 * Tuple Codec: a fixed-arity array, one codec per position.
 */
export class TupleCodec implements MessageCodec<readonly unknown[]> {
  readonly surface: TupleSurface;

  constructor(
    private readonly elements: readonly MessageCodec<unknown>[],
    surface?: TupleSurface,
  ) {
    this.surface = surface ?? Surfaces.tuple(...elements.map((c) => c.surface));
  }

  encode(value: readonly unknown[], buffer: MessageBuffer, offset: number): number {
    if (!Array.isArray(value)) throw typeMismatch(this.surface, "array", value);
    if (value.length !== this.elements.length) {
      throw new InvalidArgumentError(
        `Expected a tuple of ${this.elements.length} elements, got ${value.length}`,
        { context: { surface: surfaceName(this.surface), length: value.length } },
      );
    }
    let pos = offset + packArrayHeader(buffer, offset, value.length);
    this.elements.forEach((codec, i) => {
      pos += codec.encode(value[i], buffer, pos);
    });
    return pos - offset;
  }

  decode(unpacker: MessageUnpacker): unknown[] {
    const start = unpacker.position;
    const size = unpacker.unpackArrayHeader();
    if (size !== this.elements.length) {
      throw new TypeMismatchError(
        `Expected a tuple of ${this.elements.length} elements, found ${size}`,
        { context: { surface: surfaceName(this.surface), size, position: start } },
      );
    }
    return this.elements.map((codec) => codec.decode(unpacker));
  }
}

/**
 * Enum Codec: writes the member value itself, a string or an integer.
 */
export class EnumCodec implements MessageCodec<EnumValue> {
  private readonly members: ReadonlySet<EnumValue>;

  constructor(readonly surface: EnumSurface) {
    this.members = new Set(surface.values);
  }

  encode(value: EnumValue, buffer: MessageBuffer, offset: number): number {
    if (!this.members.has(value)) {
      throw new InvalidArgumentError(`${String(value)} is not a member of ${this.surface.name}`, {
        context: { surface: this.surface.name, value },
      });
    }
    return typeof value === "string"
      ? packString(buffer, offset, value)
      : packLong(buffer, offset, value);
  }

  decode(unpacker: MessageUnpacker): EnumValue {
    const start = unpacker.position;
    const type = unpacker.getNextValueType();
    let value: EnumValue;
    if (type === "string") {
      value = unpacker.unpackString();
    } else if (type === "integer") {
      const n = unpacker.unpackNumber();
      value = typeof n === "bigint" ? Number(n) : n;
    } else {
      throw new TypeMismatchError(`Expected a member of ${this.surface.name}, found ${type}`, {
        context: { surface: this.surface.name, found: type, position: start },
      });
    }
    if (!this.members.has(value)) {
      throw new TypeMismatchError(`${String(value)} is not a member of ${this.surface.name}`, {
        context: { surface: this.surface.name, value, position: start },
      });
    }
    return value;
  }
}

export type RecordValue = Readonly<Record<string, unknown>>;

/**
 * Record Codec: field values as an array in declaration order.
 *
 * Decoding also accepts a map keyed by field name; unknown keys are skipped and missing
 * optional fields decode to `undefined`.
 */
export class RecordCodec implements MessageCodec<RecordValue> {
  constructor(
    readonly surface: RecordSurface,
    private readonly fieldCodecs: readonly MessageCodec<unknown>[],
  ) {
    if (surface.fields.length !== fieldCodecs.length) {
      throw new InvalidArgumentError(
        `${surface.name} has ${surface.fields.length} fields but ${fieldCodecs.length} codecs were given`,
        { context: { surface: surface.name } },
      );
    }
  }

  encode(value: RecordValue, buffer: MessageBuffer, offset: number): number {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
      throw typeMismatch(this.surface, "object", value);
    }
    const fields = this.surface.fields;
    let pos = offset + packArrayHeader(buffer, offset, fields.length);
    fields.forEach((field, i) => {
      const fieldValue = Object.hasOwn(value, field.name) ? value[field.name] : undefined;
      pos += this.fieldCodecs[i].encode(fieldValue, buffer, pos);
    });
    return pos - offset;
  }

  decode(unpacker: MessageUnpacker): Record<string, unknown> {
    const start = unpacker.position;
    const type = unpacker.getNextValueType();
    if (type === "map") return this.decodeMap(unpacker);
    if (type !== "array") {
      throw new TypeMismatchError(`Expected ${this.surface.name} as an array or map, found ${type}`, {
        context: { surface: this.surface.name, found: type, position: start },
      });
    }

    const fields = this.surface.fields;
    const size = unpacker.unpackArrayHeader();
    if (size !== fields.length) {
      throw new TypeMismatchError(
        `Expected ${fields.length} fields for ${this.surface.name}, found ${size}`,
        { context: { surface: this.surface.name, size, position: start } },
      );
    }
    const result: Record<string, unknown> = {};
    fields.forEach((field, i) => {
      defineEntry(result, field.name, this.fieldCodecs[i].decode(unpacker));
    });
    return result;
  }

  private decodeMap(unpacker: MessageUnpacker): Record<string, unknown> {
    const fields = this.surface.fields;
    const index = new Map(fields.map((f, i) => [f.name, i]));
    const result: Record<string, unknown> = {};

    const size = unpacker.unpackMapHeader();
    for (let n = 0; n < size; n++) {
      const name = unpacker.unpackString();
      const i = index.get(name);
      if (i === undefined) {
        unpacker.skipValue();
      } else {
        defineEntry(result, name, this.fieldCodecs[i].decode(unpacker));
      }
    }

    for (const field of fields) {
      if (Object.hasOwn(result, field.name)) continue;
      if (field.surface.kind !== "option") {
        throw new TypeMismatchError(`Missing field ${field.name} of ${this.surface.name}`, {
          context: { surface: this.surface.name, field: field.name },
        });
      }
      defineEntry(result, field.name, undefined);
    }
    return result;
  }
}
