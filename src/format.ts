/**
 * MessagePack format bytes.
 * See https://github.com/msgpack/msgpack/blob/master/spec.md#formats
 */
export const Code = {
  POSFIXINT_MASK: 0x80,
  FIXMAP_PREFIX: 0x80,
  FIXARRAY_PREFIX: 0x90,
  FIXSTR_PREFIX: 0xa0,

  NIL: 0xc0,
  NEVER_USED: 0xc1,
  FALSE: 0xc2,
  TRUE: 0xc3,
  BIN8: 0xc4,
  BIN16: 0xc5,
  BIN32: 0xc6,
  EXT8: 0xc7,
  EXT16: 0xc8,
  EXT32: 0xc9,
  FLOAT32: 0xca,
  FLOAT64: 0xcb,
  UINT8: 0xcc,
  UINT16: 0xcd,
  UINT32: 0xce,
  UINT64: 0xcf,
  INT8: 0xd0,
  INT16: 0xd1,
  INT32: 0xd2,
  INT64: 0xd3,
  FIXEXT1: 0xd4,
  FIXEXT2: 0xd5,
  FIXEXT4: 0xd6,
  FIXEXT8: 0xd7,
  FIXEXT16: 0xd8,
  STR8: 0xd9,
  STR16: 0xda,
  STR32: 0xdb,
  ARRAY16: 0xdc,
  ARRAY32: 0xdd,
  MAP16: 0xde,
  MAP32: 0xdf,

  NEGFIXINT_PREFIX: 0xe0,
} as const;

export type ValueType =
  | "nil"
  | "boolean"
  | "integer"
  | "float"
  | "string"
  | "binary"
  | "array"
  | "map"
  | "extension"
  | "never_used";

export function isPosFixInt(b: number): boolean {
  return (b & Code.POSFIXINT_MASK) === 0;
}

export function isNegFixInt(b: number): boolean {
  return (b & 0xe0) === Code.NEGFIXINT_PREFIX;
}

export function isFixInt(b: number): boolean {
  return isPosFixInt(b) || isNegFixInt(b);
}

export function isFixStr(b: number): boolean {
  return (b & 0xe0) === Code.FIXSTR_PREFIX;
}

export function isFixedArray(b: number): boolean {
  return (b & 0xf0) === Code.FIXARRAY_PREFIX;
}

export function isFixedMap(b: number): boolean {
  return (b & 0xf0) === Code.FIXMAP_PREFIX;
}

/**
 * Classifies a format byte.
 */
export function valueTypeOf(b: number): ValueType {
  const code = b & 0xff;
  if (isFixInt(code)) return "integer";
  if (isFixStr(code)) return "string";
  if (isFixedArray(code)) return "array";
  if (isFixedMap(code)) return "map";

  switch (code) {
    case Code.NIL:
      return "nil";
    case Code.FALSE:
    case Code.TRUE:
      return "boolean";
    case Code.BIN8:
    case Code.BIN16:
    case Code.BIN32:
      return "binary";
    case Code.EXT8:
    case Code.EXT16:
    case Code.EXT32:
    case Code.FIXEXT1:
    case Code.FIXEXT2:
    case Code.FIXEXT4:
    case Code.FIXEXT8:
    case Code.FIXEXT16:
      return "extension";
    case Code.FLOAT32:
    case Code.FLOAT64:
      return "float";
    case Code.UINT8:
    case Code.UINT16:
    case Code.UINT32:
    case Code.UINT64:
    case Code.INT8:
    case Code.INT16:
    case Code.INT32:
    case Code.INT64:
      return "integer";
    case Code.STR8:
    case Code.STR16:
    case Code.STR32:
      return "string";
    case Code.ARRAY16:
    case Code.ARRAY32:
      return "array";
    case Code.MAP16:
    case Code.MAP32:
      return "map";
    default:
      return "never_used";
  }
}

/**
 * Readable name of a format byte, used in error messages.
 */
export function formatName(b: number): string {
  const code = b & 0xff;
  if (isPosFixInt(code)) return "POSFIXINT";
  if (isNegFixInt(code)) return "NEGFIXINT";
  if (isFixStr(code)) return "FIXSTR";
  if (isFixedArray(code)) return "FIXARRAY";
  if (isFixedMap(code)) return "FIXMAP";
  for (const [name, value] of Object.entries(Code)) {
    if (value === code && !name.endsWith("_PREFIX") && !name.endsWith("_MASK")) {
      return name;
    }
  }
  return `0x${code.toString(16)}`;
}
