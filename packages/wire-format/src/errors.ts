/**
 * Error types for message construction and wire format decoding.
 */

/**
 * Error codes for invalid messages.
 */
export type InvalidMessageErrorCode =
  | "invalid_msgpack"
  | "not_a_mapping"
  | "missing_type"
  | "unknown_type"
  | "unregistered_type"
  | "wrong_type"
  | "missing_field"
  | "invalid_field"

export type InvalidMessageErrorOptions = {
  cause?: unknown
  /** Where the raw bytes of an undecodable message were saved */
  dumpPath?: string
}

/**
 * Error thrown when a message violates its structural invariants, either at
 * construction or while decoding wire data.
 */
export class InvalidMessageError extends Error {
  override readonly name = "InvalidMessageError"

  /** The message without the dump location suffix */
  readonly reason: string
  readonly dumpPath?: string

  constructor(
    public readonly code: InvalidMessageErrorCode,
    reason: string,
    options: InvalidMessageErrorOptions = {},
  ) {
    super(
      options.dumpPath === undefined
        ? reason
        : `${reason} (raw bytes saved to ${options.dumpPath})`,
      { cause: options.cause },
    )
    this.reason = reason
    this.dumpPath = options.dumpPath
    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidMessageError)
    }
  }
}
