export * from "./errors";
export * from "./format";
export * from "./packer";
export * from "./surface";
export * from "./codecs";
export * from "./struct";
export * from "./collections";
export { MessageBuffer } from "./MessageBuffer";
export type { MessageBufferOptions } from "./MessageBuffer";
export { MessageUnpacker } from "./unpacker";
export type { ExtensionTypeHeader, ExtensionValue, MessageValue } from "./unpacker";
export type { CodecEntry, MessageCodec } from "./interfaces";
export { MessageCodecFactory } from "./MessageCodecFactory";
export type { MessageCodecFactoryOptions } from "./MessageCodecFactory";
export { LOG_LEVELS, NullLogger, PinoLogger, createLogger } from "./logger";
export type { LogLevelName, LogMeta, Logger, LoggerOptions } from "./logger";
export {
  DEFAULT_INITIAL_BUFFER_SIZE,
  DEFAULT_MAX_BUFFER_SIZE,
  loadCodecConfig,
} from "./config";
export type { CodecConfig } from "./config";
