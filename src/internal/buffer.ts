import { Buffer as BufferPolyfill } from "buffer";

/**
 * Byte storage used by MessageBuffer.
 * Node.js gets its native Buffer; other hosts get the `buffer` package.
 */
const nativeBuffer =
  typeof process !== "undefined" &&
  process.versions?.node !== undefined &&
  typeof global !== "undefined"
    ? global.Buffer
    : undefined;

export const Buffer: typeof BufferPolyfill =
  (nativeBuffer as unknown as typeof BufferPolyfill | undefined) ??
  BufferPolyfill;

export type Buffer = BufferPolyfill;

/**
 * UTF-8 bytes of a string.
 */
export function utf8Bytes(value: string): Buffer {
  return Buffer.from(value, "utf8");
}
