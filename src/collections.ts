import type { MessageCodec } from "./interfaces";
import type { MessageBuffer } from "./MessageBuffer";
import type { MessageUnpacker } from "./unpacker";
import {
  Surfaces,
  surfaceName,
  type DictSurface,
  type MapSurface,
  type SeqSurface,
  type SetSurface,
  type Surface,
} from "./surface";
import { TypeMismatchError } from "./errors";
import { packArrayHeader, packMapHeader } from "./packer";
import { typeMismatch } from "./codecs";
import { defineEntry } from "./internal/properties";

function encodeElements<T>(
  codec: MessageCodec<T>,
  values: Iterable<T>,
  size: number,
  buffer: MessageBuffer,
  offset: number,
): number {
  let pos = offset + packArrayHeader(buffer, offset, size);
  for (const v of values) {
    pos += codec.encode(v, buffer, pos);
  }
  return pos - offset;
}

function decodeElements<T>(codec: MessageCodec<T>, unpacker: MessageUnpacker): T[] {
  const size = unpacker.unpackArrayHeader();
  const out: T[] = new Array(size);
  for (let i = 0; i < size; i++) {
    out[i] = codec.decode(unpacker);
  }
  return out;
}

/**
 * Seq Codec: an array on the wire, decoded as a frozen array.
 */
export class SeqCodec<T> implements MessageCodec<readonly T[]> {
  readonly surface: SeqSurface;

  constructor(
    private readonly element: MessageCodec<T>,
    surface?: SeqSurface,
  ) {
    this.surface = surface ?? Surfaces.seq(element.surface);
  }

  encode(value: readonly T[], buffer: MessageBuffer, offset: number): number {
    if (!Array.isArray(value)) throw typeMismatch(this.surface, "array", value);
    return encodeElements(this.element, value, value.length, buffer, offset);
  }

  decode(unpacker: MessageUnpacker): readonly T[] {
    return Object.freeze(decodeElements(this.element, unpacker));
  }
}

/**
 * IndexedSeq Codec: same wire form as {@link SeqCodec}, decoded as a mutable array.
 */
export class IndexedSeqCodec<T> implements MessageCodec<T[]> {
  readonly surface: SeqSurface;

  constructor(
    private readonly element: MessageCodec<T>,
    surface?: SeqSurface,
  ) {
    this.surface = surface ?? Surfaces.indexedSeq(element.surface);
  }

  encode(value: readonly T[], buffer: MessageBuffer, offset: number): number {
    if (!Array.isArray(value)) throw typeMismatch(this.surface, "array", value);
    return encodeElements(this.element, value, value.length, buffer, offset);
  }

  decode(unpacker: MessageUnpacker): T[] {
    return decodeElements(this.element, unpacker);
  }
}

/**
 * Set Codec: elements as an array, in iteration order.
 */
export class SetCodec<T> implements MessageCodec<ReadonlySet<T>> {
  readonly surface: SetSurface;

  constructor(
    private readonly element: MessageCodec<T>,
    surface?: SetSurface,
  ) {
    this.surface = surface ?? Surfaces.set(element.surface);
  }

  encode(value: ReadonlySet<T>, buffer: MessageBuffer, offset: number): number {
    if (!(value instanceof Set)) throw typeMismatch(this.surface, "Set", value);
    return encodeElements(this.element, value, value.size, buffer, offset);
  }

  decode(unpacker: MessageUnpacker): Set<T> {
    return new Set(decodeElements(this.element, unpacker));
  }
}

/**
 * Map Codec: a MessagePack map, decoded as a Map.
 */
export class MapCodec<K, V> implements MessageCodec<ReadonlyMap<K, V>> {
  readonly surface: MapSurface;

  constructor(
    private readonly key: MessageCodec<K>,
    private readonly value: MessageCodec<V>,
    surface?: MapSurface,
  ) {
    this.surface = surface ?? Surfaces.map(key.surface, value.surface);
  }

  encode(value: ReadonlyMap<K, V>, buffer: MessageBuffer, offset: number): number {
    if (!(value instanceof Map)) throw typeMismatch(this.surface, "Map", value);
    let pos = offset + packMapHeader(buffer, offset, value.size);
    for (const [k, v] of value) {
      pos += this.key.encode(k, buffer, pos);
      pos += this.value.encode(v, buffer, pos);
    }
    return pos - offset;
  }

  decode(unpacker: MessageUnpacker): Map<K, V> {
    const size = unpacker.unpackMapHeader();
    const out = new Map<K, V>();
    for (let i = 0; i < size; i++) {
      const k = this.key.decode(unpacker);
      out.set(k, this.value.decode(unpacker));
    }
    return out;
  }
}

const NUMERIC_KEYS = new Set(["byte", "short", "int", "float", "double"]);
const BIGINT_KEYS = new Set(["long", "bigint"]);

/**
 * Turns an object property name back into a value of the key surface.
 */
function fromPropertyName(name: string, key: Surface): unknown {
  if (key.kind === "primitive" && NUMERIC_KEYS.has(key.name)) return Number(name);
  if (key.kind === "primitive" && BIGINT_KEYS.has(key.name)) return BigInt(name);
  if (key.kind === "enum") {
    return key.values.find((v) => String(v) === name) ?? name;
  }
  return name;
}

/**
 * Dict Codec: a plain object used as a dictionary, written as a MessagePack map.
 * Property names are converted to and from the key surface (numbers, bigints, enum members).
 */
export class DictCodec<V> implements MessageCodec<Readonly<Record<string, V>>> {
  readonly surface: DictSurface;

  constructor(
    private readonly key: MessageCodec<unknown>,
    private readonly value: MessageCodec<V>,
    surface?: DictSurface,
  ) {
    this.surface = surface ?? Surfaces.dict(key.surface, value.surface);
  }

  encode(value: Readonly<Record<string, V>>, buffer: MessageBuffer, offset: number): number {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
      throw typeMismatch(this.surface, "object", value);
    }
    const entries = Object.entries(value);
    let pos = offset + packMapHeader(buffer, offset, entries.length);
    for (const [name, v] of entries) {
      pos += this.key.encode(fromPropertyName(name, this.key.surface), buffer, pos);
      pos += this.value.encode(v, buffer, pos);
    }
    return pos - offset;
  }

  decode(unpacker: MessageUnpacker): Record<string, V> {
    const size = unpacker.unpackMapHeader();
    const out: Record<string, V> = {};
    for (let i = 0; i < size; i++) {
      const start = unpacker.position;
      const k = this.key.decode(unpacker);
      if (typeof k !== "string" && typeof k !== "number" && typeof k !== "bigint") {
        throw new TypeMismatchError(
          `Dictionary keys of ${surfaceName(this.surface)} must decode to strings or numbers`,
          { context: { surface: surfaceName(this.surface), position: start } },
        );
      }
      defineEntry(out, String(k), this.value.decode(unpacker));
    }
    return out;
  }
}
