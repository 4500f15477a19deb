import type { MessageBuffer } from "./MessageBuffer";
import type { MessageUnpacker } from "./unpacker";
import type { Surface } from "./surface";

/**
 * Encoder/decoder for the values of one surface.
 * The codec factory derives these for composite surfaces; callers may supply their own
 * as known codecs.
 */
export interface MessageCodec<T> {
  /**
   * The surface this codec is bound to.
   */
  readonly surface: Surface;

  /**
   * Encodes the value into the buffer at the given offset.
   * Returns the number of bytes written.
   */
  encode(value: T, buffer: MessageBuffer, offset: number): number;

  /**
   * Decodes one value at the unpacker's position, advancing it past the value.
   */
  decode(unpacker: MessageUnpacker): T;
}

/**
 * A surface paired with the codec that handles it.
 */
export type CodecEntry = readonly [Surface, MessageCodec<unknown>];
