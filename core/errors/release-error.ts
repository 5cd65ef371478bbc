import type { ReleaseErrorKind } from '../../types/release-error-kind'

/** Extra data attached to a ReleaseError. */
interface ReleaseErrorDetails {
  /** Raw response body of a failed request. */
  body?: string

  /** HTTP status of a failed request. */
  status?: number

  /** Underlying error. */
  cause?: unknown
}

/** Error raised by every release operation, tagged with its kind. */
export class ReleaseError extends Error {
  public readonly kind: ReleaseErrorKind
  public readonly status: number | null
  public readonly body: string | null

  /**
   * Creates a new ReleaseError.
   *
   * @param kind - What went wrong.
   * @param message - Single-line message shown to the user.
   * @param details - Response status, body and cause, when known.
   */
  public constructor(
    kind: ReleaseErrorKind,
    message: string,
    details: ReleaseErrorDetails = {},
  ) {
    super(message, { cause: details.cause })
    this.name = 'ReleaseError'
    this.kind = kind
    this.status = details.status ?? null
    this.body = details.body ?? null
  }
}

/**
 * Check whether a value is a ReleaseError, optionally of a given kind.
 *
 * @param error - Caught value.
 * @param kind - Kind to match.
 * @returns True when the value is a matching ReleaseError.
 */
export function isReleaseError(
  error: unknown,
  kind?: ReleaseErrorKind,
): error is ReleaseError {
  return error instanceof ReleaseError && (!kind || error.kind === kind)
}
