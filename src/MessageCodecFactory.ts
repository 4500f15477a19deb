import type { CodecEntry, MessageCodec } from "./interfaces";
import { StandardCodecs, fromMessagePack, toMessagePack, type PackOptions } from "./codecs";
import { EnumCodec, OptionCodec, RecordCodec, TupleCodec } from "./struct";
import { DictCodec, IndexedSeqCodec, MapCodec, SeqCodec, SetCodec } from "./collections";
import {
  SurfaceRegistry,
  surfaceKey,
  surfaceName,
  type Surface,
  type TypeHandle,
  type TypeIntrospector,
} from "./surface";
import { UnimplementedShapeError, UnsupportedStructureError } from "./errors";
import { NullLogger, PinoLogger, type Logger } from "./logger";
import { loadCodecConfig, type CodecConfig } from "./config";

export interface MessageCodecFactoryOptions {
  /**
   * Receives a trace entry per derived codec. Defaults to a NullLogger.
   */
  logger?: Logger;
  /**
   * Resolves type handles and names for {@link MessageCodecFactory.ofType} and
   * {@link MessageCodecFactory.ofTypeName}. Defaults to an empty SurfaceRegistry.
   */
  introspector?: TypeIntrospector;
  /**
   * Buffer sizes used by {@link MessageCodecFactory.pack}.
   */
  packOptions?: PackOptions;
}

/**
 * MessageCodecFactory: finds the codec of a surface.
 *
 * Known codecs always win. Any other surface gets a codec derived from its structure,
 * recursively, and cached for the lifetime of the factory. Surfaces that contain
 * themselves are rejected.
 *
 * @example
 * ```ts
 * const codec = MessageCodecFactory.defaultFactory.of(
 *   Surfaces.record("Point", { x: Surfaces.int, y: Surfaces.int }),
 * );
 * const bytes = toMessagePack(codec, { x: 1, y: 2 });
 * ```
 */
export class MessageCodecFactory {
  private readonly knownCodecs: ReadonlyMap<string, CodecEntry>;
  private readonly cache = new Map<string, MessageCodec<unknown>>();
  private readonly logger: Logger;
  private readonly introspector: TypeIntrospector;

  constructor(
    knownCodecs: Iterable<CodecEntry> = [],
    private readonly options: MessageCodecFactoryOptions = {},
  ) {
    const known = new Map<string, CodecEntry>();
    for (const entry of knownCodecs) {
      known.set(surfaceKey(entry[0]), entry);
    }
    this.knownCodecs = known;
    this.logger = (options.logger ?? new NullLogger()).child({ component: "MessageCodecFactory" });
    this.introspector = options.introspector ?? new SurfaceRegistry();
  }

  /**
   * A factory that knows the standard primitive codecs.
   */
  static readonly defaultFactory = new MessageCodecFactory(StandardCodecs);

  /**
   * A factory with the standard codecs that logs through pino at the configured level and
   * packs into buffers of the configured sizes.
   */
  static fromConfig(
    config: CodecConfig = loadCodecConfig(),
    options: Omit<MessageCodecFactoryOptions, "logger" | "packOptions"> = {},
  ): MessageCodecFactory {
    return new MessageCodecFactory(StandardCodecs, {
      ...options,
      logger: new PinoLogger({ level: config.logLevel }),
      packOptions: { initialSize: config.initialBufferSize, maxSize: config.maxBufferSize },
    });
  }

  /**
   * Returns a new factory that also knows `additionalCodecs`. On conflicting surfaces the
   * additional codec wins. The new factory starts with an empty cache.
   */
  withCodecs(additionalCodecs: Iterable<CodecEntry>): MessageCodecFactory {
    return new MessageCodecFactory(
      [...this.knownCodecs.values(), ...additionalCodecs],
      this.options,
    );
  }

  /**
   * Codec for a surface.
   */
  of(surface: Surface): MessageCodec<unknown> {
    return this.ofSurface(surface, new Set());
  }

  /**
   * Codec for a class, looked up through the introspector.
   */
  ofType(type: TypeHandle): MessageCodec<unknown> {
    return this.of(this.introspector.surfaceOf(type));
  }

  /**
   * Codec for a registered type name, looked up through the introspector.
   */
  ofTypeName(name: string): MessageCodec<unknown> {
    return this.of(this.introspector.surfaceOfName(name));
  }

  /**
   * Encodes a value of the surface into a new byte array.
   */
  pack(surface: Surface, value: unknown): Uint8Array {
    return toMessagePack(this.of(surface), value, this.options.packOptions);
  }

  /**
   * Decodes one value of the surface from the start of `bytes`.
   */
  unpack(surface: Surface, bytes: Uint8Array): unknown {
    return fromMessagePack(this.of(surface), bytes);
  }

  /**
   * Whether a codec for the surface has been derived and cached.
   */
  isCached(surface: Surface): boolean {
    return this.cache.has(surfaceKey(surface));
  }

  private ofSurface(surface: Surface, seen: ReadonlySet<string>): MessageCodec<unknown> {
    const key = surfaceKey(surface);

    const known = this.knownCodecs.get(key);
    if (known !== undefined) return known[1];

    const cached = this.cache.get(key);
    if (cached !== undefined) return cached;

    if (seen.has(key)) {
      this.logger.debug("Recursive surface", { surface: surfaceName(surface) });
      throw new UnsupportedStructureError(
        `Codec for recursive types is not supported: ${surfaceName(surface)}`,
        { context: { surface: surfaceName(surface) } },
      );
    }

    const seenSet = new Set(seen).add(key);
    this.logger.trace("Deriving codec", { surface: surfaceName(surface) });
    const codec = this.derive(surface, seenSet);

    // Entries are never replaced once set
    const existing = this.cache.get(key);
    if (existing !== undefined) return existing;
    this.cache.set(key, codec);
    return codec;
  }

  private derive(surface: Surface, seen: ReadonlySet<string>): MessageCodec<unknown> {
    const resolve = (s: Surface) => this.ofSurface(s, seen);

    switch (surface.kind) {
      case "option":
        return new OptionCodec(resolve(surface.element), surface);
      case "tuple":
        return new TupleCodec(surface.elements.map(resolve), surface);
      case "enum":
        return new EnumCodec(surface);
      case "seq":
        return surface.indexed
          ? new IndexedSeqCodec(resolve(surface.element), surface)
          : new SeqCodec(resolve(surface.element), surface);
      case "set":
        return new SetCodec(resolve(surface.element), surface);
      case "map":
        return new MapCodec(resolve(surface.key), resolve(surface.value), surface);
      case "dict":
        return new DictCodec(resolve(surface.key), resolve(surface.value), surface);
      case "record":
        return new RecordCodec(surface, surface.fields.map((f) => resolve(f.surface)));
      case "primitive":
        throw new UnimplementedShapeError(
          `No codec is registered for primitive ${surface.name}`,
          { context: { surface: surface.name } },
        );
      default: {
        const unknownShape: never = surface;
        throw new UnimplementedShapeError(`Unknown surface: ${JSON.stringify(unknownShape)}`, {
          context: { surface: unknownShape },
        });
      }
    }
  }
}
