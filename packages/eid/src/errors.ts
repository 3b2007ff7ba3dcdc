/**
 * Error thrown when endpoint identifier text cannot be parsed or normalized.
 */
export class EIDError extends Error {
  override readonly name = "EIDError"

  constructor(
    message: string,
    public readonly input?: string,
  ) {
    super(message)
    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EIDError)
    }
  }
}
