import { z } from "zod";
import { InvalidArgumentError } from "./errors";
import { LOG_LEVELS, type LogLevelName } from "./logger";

export const DEFAULT_INITIAL_BUFFER_SIZE = 256;
// ext32/str32/bin32 lengths top out at 2^32 - 1
export const DEFAULT_MAX_BUFFER_SIZE = 2 ** 32;

const levelSchema = z.enum(LOG_LEVELS);

const configSchema = z.object({
  TYPEPACK_LOG_LEVEL: levelSchema.default("info"),
  TYPEPACK_INITIAL_BUFFER_SIZE: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_INITIAL_BUFFER_SIZE),
  TYPEPACK_MAX_BUFFER_SIZE: z.coerce
    .number()
    .int()
    .positive()
    .default(DEFAULT_MAX_BUFFER_SIZE),
});

/**
 * Runtime settings for buffers and logging.
 */
export interface CodecConfig {
  logLevel: LogLevelName;
  initialBufferSize: number;
  maxBufferSize: number;
}

/**
 * Reads the TYPEPACK_* variables from the given environment (process.env by default).
 * Unset or empty variables fall back to their defaults.
 */
export function loadCodecConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
): CodecConfig {
  const input: Record<string, string> = {};
  for (const key of Object.keys(configSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== "") {
      input[key] = value.trim();
    }
  }

  const result = configSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidArgumentError(
      `Configuration validation failed:\n${z.prettifyError(result.error)}`,
      { cause: result.error },
    );
  }

  const data = result.data;
  if (data.TYPEPACK_INITIAL_BUFFER_SIZE > data.TYPEPACK_MAX_BUFFER_SIZE) {
    throw new InvalidArgumentError(
      "TYPEPACK_INITIAL_BUFFER_SIZE must not exceed TYPEPACK_MAX_BUFFER_SIZE",
      {
        context: {
          initialBufferSize: data.TYPEPACK_INITIAL_BUFFER_SIZE,
          maxBufferSize: data.TYPEPACK_MAX_BUFFER_SIZE,
        },
      },
    );
  }

  return {
    logLevel: data.TYPEPACK_LOG_LEVEL,
    initialBufferSize: data.TYPEPACK_INITIAL_BUFFER_SIZE,
    maxBufferSize: data.TYPEPACK_MAX_BUFFER_SIZE,
  };
}
