/**
 * Errors raised while talking to dtnd.
 *
 * None of these are recovered from locally; they reach the caller of the
 * operation unchanged.
 */

/**
 * Data received from dtnd is inconsistent: a bad length prefix, a truncated
 * reply, or a reply of the wrong kind.
 */
export class DataError extends Error {
  override readonly name = "DataError"
}

/**
 * dtnd answered with a well-formed reply whose error field was set.
 */
export class DTNDError extends Error {
  override readonly name = "DTNDError"
}

/**
 * The socket path does not resolve to a listening dtnd.
 */
export class ConnectionNotFoundError extends Error {
  override readonly name = "ConnectionNotFoundError"

  constructor(
    public readonly socketPath: string,
    options?: { cause?: unknown },
  ) {
    super(`No dtnd socket at ${socketPath}`, options)
  }
}

export type TransportErrorCode = "timeout" | "io"

/**
 * The connection failed underneath the protocol: the caller's deadline
 * expired, or the socket reported an I/O error.
 */
export class TransportError extends Error {
  override readonly name = "TransportError"

  constructor(
    public readonly code: TransportErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
  }
}

/**
 * Client configuration failed validation.
 */
export class ConfigError extends Error {
  override readonly name = "ConfigError"

  constructor(public readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`)
  }
}
