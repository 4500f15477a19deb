import { InvalidArgumentError, UnimplementedShapeError } from "./errors";

/**
 * Scalar types with a standard codec.
 */
export type PrimitiveName =
  | "nil"
  | "boolean"
  | "byte"
  | "short"
  | "int"
  | "long"
  | "bigint"
  | "float"
  | "double"
  | "string"
  | "binary";

export type EnumValue = string | number;

export interface PrimitiveSurface {
  readonly kind: "primitive";
  readonly name: PrimitiveName;
}

/**
 * A value that may be absent (`undefined` or `null`).
 */
export interface OptionSurface {
  readonly kind: "option";
  readonly element: Surface;
}

export interface TupleSurface {
  readonly kind: "tuple";
  readonly elements: readonly Surface[];
}

/**
 * A closed set of string or number members, e.g. the values of a TypeScript enum.
 */
export interface EnumSurface {
  readonly kind: "enum";
  readonly name: string;
  readonly values: readonly EnumValue[];
}

/**
 * An ordered sequence (Array). `indexed` sequences decode to mutable arrays, others to
 * frozen ones; both share one wire form.
 */
export interface SeqSurface {
  readonly kind: "seq";
  readonly element: Surface;
  readonly indexed: boolean;
}

/**
 * A list-like collection that is not an Array (Set), encoded as an array.
 */
export interface SetSurface {
  readonly kind: "set";
  readonly element: Surface;
}

export interface MapSurface {
  readonly kind: "map";
  readonly key: Surface;
  readonly value: Surface;
}

/**
 * A map-like collection that is not a Map: a plain object used as a dictionary.
 */
export interface DictSurface {
  readonly kind: "dict";
  readonly key: Surface;
  readonly value: Surface;
}

export interface Field {
  readonly name: string;
  readonly surface: Surface;
}

export interface RecordSurface {
  readonly kind: "record";
  readonly name: string;
  readonly fields: readonly Field[];
}

/**
 * Structural description of a type. Surfaces are immutable; two surfaces are equal
 * when their {@link surfaceKey}s are.
 */
export type Surface =
  | PrimitiveSurface
  | OptionSurface
  | TupleSurface
  | EnumSurface
  | SeqSurface
  | SetSurface
  | MapSurface
  | DictSurface
  | RecordSurface;

export type SurfaceKind = Surface["kind"];

function primitive(name: PrimitiveName): PrimitiveSurface {
  return Object.freeze({ kind: "primitive", name });
}

/**
 * Builds a record surface. Pass the fields as a function when the record refers to
 * itself or to a record declared later; it is evaluated once, on first access.
 */
function record(
  name: string,
  fields: Record<string, Surface> | readonly Field[] | (() => Record<string, Surface> | readonly Field[]),
): RecordSurface {
  let resolved: readonly Field[] | undefined;
  const toFields = (
    f: Record<string, Surface> | readonly Field[],
  ): readonly Field[] =>
    Object.freeze(
      isFieldList(f)
        ? f.map((x) => Object.freeze({ name: x.name, surface: x.surface }))
        : Object.entries(f).map(([n, s]) => Object.freeze({ name: n, surface: s })),
    );

  return Object.freeze({
    kind: "record",
    name,
    get fields(): readonly Field[] {
      if (resolved === undefined) {
        resolved = toFields(typeof fields === "function" ? fields() : fields);
      }
      return resolved;
    },
  });
}

function isFieldList(
  f: Record<string, Surface> | readonly Field[],
): f is readonly Field[] {
  return Array.isArray(f);
}

/**
 * Surface constructors.
 *
 * @example
 * ```ts
 * const Person = Surfaces.record("Person", {
 *   name: Surfaces.string,
 *   age: Surfaces.option(Surfaces.int),
 *   tags: Surfaces.seq(Surfaces.string),
 * });
 * ```
 */
export const Surfaces = {
  nil: primitive("nil"),
  boolean: primitive("boolean"),
  byte: primitive("byte"),
  short: primitive("short"),
  int: primitive("int"),
  long: primitive("long"),
  bigint: primitive("bigint"),
  float: primitive("float"),
  double: primitive("double"),
  string: primitive("string"),
  binary: primitive("binary"),

  option(element: Surface): OptionSurface {
    return Object.freeze({ kind: "option", element });
  },
  tuple(...elements: Surface[]): TupleSurface {
    return Object.freeze({ kind: "tuple", elements: Object.freeze([...elements]) });
  },
  enumeration(name: string, values: readonly EnumValue[] | Readonly<Record<string, EnumValue>>): EnumSurface {
    const members = isEnumValueList(values) ? [...values] : enumMembers(values);
    return Object.freeze({ kind: "enum", name, values: Object.freeze(members) });
  },
  seq(element: Surface): SeqSurface {
    return Object.freeze({ kind: "seq", element, indexed: false });
  },
  indexedSeq(element: Surface): SeqSurface {
    return Object.freeze({ kind: "seq", element, indexed: true });
  },
  set(element: Surface): SetSurface {
    return Object.freeze({ kind: "set", element });
  },
  map(key: Surface, value: Surface): MapSurface {
    return Object.freeze({ kind: "map", key, value });
  },
  dict(key: Surface, value: Surface): DictSurface {
    return Object.freeze({ kind: "dict", key, value });
  },
  record,
};

function isEnumValueList(
  v: readonly EnumValue[] | Readonly<Record<string, EnumValue>>,
): v is readonly EnumValue[] {
  return Array.isArray(v);
}

/**
 * Member values of a TypeScript enum object. Numeric enums carry a reverse mapping
 * (value -> name) that is skipped.
 */
function enumMembers(e: Readonly<Record<string, EnumValue>>): EnumValue[] {
  return Object.keys(e)
    .filter((k) => !/^\d+$/.test(k))
    .map((k) => e[k]);
}

const keyCache = new WeakMap<Surface, string>();

/**
 * Canonical structural key of a surface. A record that reappears inside its own
 * description is written as a back-reference (`@Name`), so cyclic surfaces have finite keys.
 */
export function surfaceKey(surface: Surface): string {
  const cached = keyCache.get(surface);
  if (cached !== undefined) return cached;
  const key = buildKey(surface, new Set());
  keyCache.set(surface, key);
  return key;
}

function buildKey(s: Surface, path: Set<Surface>): string {
  const k = (x: Surface) => buildKey(x, path);
  switch (s.kind) {
    case "primitive":
      return s.name;
    case "option":
      return `option<${k(s.element)}>`;
    case "tuple":
      return `tuple<${s.elements.map(k).join(",")}>`;
    case "enum":
      return `enum:${s.name}[${s.values.map((v) => JSON.stringify(v)).join("|")}]`;
    case "seq":
      return `${s.indexed ? "indexedSeq" : "seq"}<${k(s.element)}>`;
    case "set":
      return `set<${k(s.element)}>`;
    case "map":
      return `map<${k(s.key)},${k(s.value)}>`;
    case "dict":
      return `dict<${k(s.key)},${k(s.value)}>`;
    case "record": {
      if (path.has(s)) return `@${s.name}`;
      path.add(s);
      const fields = s.fields.map((f) => `${f.name}:${k(f.surface)}`).join(",");
      path.delete(s);
      return `${s.name}{${fields}}`;
    }
    default:
      throw unknownShape(s);
  }
}

function unknownShape(s: never): UnimplementedShapeError {
  return new UnimplementedShapeError(`Unknown surface: ${JSON.stringify(s)}`, {
    context: { surface: s },
  });
}

/**
 * Short readable name for logs and error messages. Records are named, not expanded.
 */
export function surfaceName(s: Surface): string {
  switch (s.kind) {
    case "primitive":
      return s.name;
    case "option":
      return `option<${surfaceName(s.element)}>`;
    case "tuple":
      return `tuple<${s.elements.map(surfaceName).join(",")}>`;
    case "enum":
    case "record":
      return s.name;
    case "seq":
      return `${s.indexed ? "indexedSeq" : "seq"}<${surfaceName(s.element)}>`;
    case "set":
      return `set<${surfaceName(s.element)}>`;
    case "map":
    case "dict":
      return `${s.kind}<${surfaceName(s.key)},${surfaceName(s.value)}>`;
    default:
      throw unknownShape(s);
  }
}

export function surfaceEquals(a: Surface, b: Surface): boolean {
  return a === b || surfaceKey(a) === surfaceKey(b);
}

/**
 * A class whose instances are described by a surface.
 */
export type TypeHandle = abstract new (...args: never[]) => unknown;

/**
 * Source of surfaces for type handles and type names.
 */
export interface TypeIntrospector {
  surfaceOf(type: TypeHandle): Surface;
  surfaceOfName(name: string): Surface;
}

/**
 * SurfaceRegistry: an explicit table from classes and type names to surfaces.
 */
export class SurfaceRegistry implements TypeIntrospector {
  private readonly byType = new Map<TypeHandle, Surface>();
  private readonly byName = new Map<string, Surface>();

  /**
   * Registers a class; it is also registered under `name`, which defaults to the class name.
   */
  register(type: TypeHandle, surface: Surface, name: string = type.name): this {
    this.byType.set(type, surface);
    this.byName.set(name, surface);
    return this;
  }

  registerName(name: string, surface: Surface): this {
    this.byName.set(name, surface);
    return this;
  }

  surfaceOf(type: TypeHandle): Surface {
    const surface = this.byType.get(type);
    if (surface === undefined) {
      throw new InvalidArgumentError(`No surface registered for type ${type.name}`, {
        context: { type: type.name },
      });
    }
    return surface;
  }

  surfaceOfName(name: string): Surface {
    const surface = this.byName.get(name);
    if (surface === undefined) {
      throw new InvalidArgumentError(`No surface registered for type name ${name}`, {
        context: { name },
      });
    }
    return surface;
  }
}
