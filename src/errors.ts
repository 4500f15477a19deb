/**
 * Error codes raised by the encoder, decoder and codec factory.
 */
export type CodecErrorCode =
  | "invalid_argument"
  | "unsupported_structure"
  | "unimplemented_shape"
  | "type_mismatch"
  | "integer_overflow"
  | "insufficient_data";

/**
 * Structured metadata attached to an error (sizes, offsets, surface names).
 */
export type ErrorContext = Readonly<Record<string, unknown>>;

export interface CodecErrorOptions {
  context?: ErrorContext;
  cause?: unknown;
}

/**
 * JSON-safe shape of a {@link CodecError}, for logging.
 */
export interface SerializedCodecError {
  name: string;
  code: CodecErrorCode;
  message: string;
  context: Record<string, unknown>;
  timestamp: string;
}

/**
 * Base class of every error thrown by typepack.
 * Errors are raised synchronously where they are detected and never downgraded.
 */
export class CodecError extends Error {
  readonly code: CodecErrorCode;
  readonly context: ErrorContext;
  readonly timestamp: Date;

  constructor(
    code: CodecErrorCode,
    message: string,
    options: CodecErrorOptions = {},
  ) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = code;
    this.context = Object.freeze({ ...options.context });
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): SerializedCodecError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: { ...this.context },
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * Caller error: negative sizes, out-of-range integers, oversized payloads.
 */
export class InvalidArgumentError extends CodecError {
  constructor(message: string, options?: CodecErrorOptions) {
    super("invalid_argument", message, options);
  }
}

/**
 * A surface that refers back to itself before its codec could be derived.
 */
export class UnsupportedStructureError extends CodecError {
  constructor(message: string, options?: CodecErrorOptions) {
    super("unsupported_structure", message, options);
  }
}

/**
 * A surface shape the factory has no derivation for.
 */
export class UnimplementedShapeError extends CodecError {
  constructor(message: string, options?: CodecErrorOptions) {
    super("unimplemented_shape", message, options);
  }
}

/**
 * The next format byte is not the one the reader asked for.
 */
export class TypeMismatchError extends CodecError {
  constructor(message: string, options?: CodecErrorOptions) {
    super("type_mismatch", message, options);
  }
}

export class IntegerOverflowError extends CodecError {
  constructor(message: string, options?: CodecErrorOptions) {
    super("integer_overflow", message, options);
  }
}

export class InsufficientDataError extends CodecError {
  constructor(message: string, options?: CodecErrorOptions) {
    super("insufficient_data", message, options);
  }
}

export function isCodecError(err: unknown): err is CodecError {
  return err instanceof CodecError;
}
