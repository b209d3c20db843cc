/**
 * Error types raised by the client.
 *
 * Every failure the client reports is a subclass of {@link ClientError}. The
 * `kind` field carries the taxonomy so callers can switch on it without
 * chains of `instanceof` checks.
 */

/**
 * Discriminator for {@link ClientError} subclasses.
 */
export type ClientErrorKind =
  | 'badRequest'
  | 'unauthorized'
  | 'rateLimited'
  | 'overloaded'
  | 'apiError'
  | 'unknown'
  | 'responseParseError'
  | 'transportError'
  | 'streamError'
  | 'configError'
  | 'unsupportedOperation'

/**
 * Base class for all errors raised by the client.
 */
export abstract class ClientError extends Error {
  /**
   * Taxonomy discriminator.
   */
  abstract readonly kind: ClientErrorKind

  /**
   * HTTP status that produced the error, when there was one.
   */
  readonly status: number | undefined

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = new.target.name
    this.status = options?.status
  }

  /**
   * Whether repeating the same request later may succeed.
   */
  get isRetryable(): boolean {
    return false
  }
}

/**
 * The request was malformed or violated a caller contract.
 */
export class BadRequestError extends ClientError {
  readonly kind = 'badRequest' as const
}

/**
 * The credential was rejected or lacks permission.
 */
export class UnauthorizedError extends ClientError {
  readonly kind = 'unauthorized' as const
}

/**
 * The API rejected the request because of rate limiting.
 */
export class RateLimitedError extends ClientError {
  readonly kind = 'rateLimited' as const

  override get isRetryable(): boolean {
    return true
  }
}

/**
 * The API is temporarily overloaded.
 */
export class OverloadedError extends ClientError {
  readonly kind = 'overloaded' as const

  override get isRetryable(): boolean {
    return true
  }
}

/**
 * Generic server-side failure reported by the API.
 */
export class ApiError extends ClientError {
  readonly kind = 'apiError' as const
}

/**
 * An API error of a class this client does not know, or a not-found error.
 */
export class UnknownApiError extends ClientError {
  readonly kind = 'unknown' as const

  /**
   * The error class string the API reported.
   */
  readonly errorType: string

  constructor(message: string, errorType: string, options?: { status?: number; cause?: unknown }) {
    super(message, options)
    this.errorType = errorType
  }
}

/**
 * A response body or stream event did not match the expected shape.
 */
export class ResponseParseError extends ClientError {
  readonly kind = 'responseParseError' as const
}

/**
 * The HTTP request itself failed (DNS, TLS, connection reset).
 */
export class TransportError extends ClientError {
  readonly kind = 'transportError' as const

  override get isRetryable(): boolean {
    return true
  }
}

/**
 * The live event subscription failed.
 */
export class StreamError extends ClientError {
  readonly kind = 'streamError' as const

  override get isRetryable(): boolean {
    return true
  }
}

/**
 * Credential or configuration could not be resolved.
 */
export class ConfigError extends ClientError {
  readonly kind = 'configError' as const
}

/**
 * The stream asked for an operation the merge engine does not implement.
 *
 * Raised when a delta targets a tool use block: applying partial JSON to the
 * tool input is not supported, and dropping it would leave a truncated input.
 */
export class UnsupportedOperationError extends ClientError {
  readonly kind = 'unsupportedOperation' as const
}

/**
 * Maps an API error body (`error.type` and `error.message`) to the matching
 * {@link ClientError} subclass.
 *
 * @param errorType - The `error.type` string from the API
 * @param message - The `error.message` string from the API
 * @param status - HTTP status, when known
 * @returns The classified error
 */
export function classifyApiError(errorType: string, message: string, status?: number): ClientError {
  const options = status !== undefined ? { status } : undefined
  switch (errorType) {
    case 'invalid_request_error':
    case 'request_too_large':
      return new BadRequestError(message, options)
    case 'authentication_error':
    case 'permission_error':
      return new UnauthorizedError(message, options)
    case 'rate_limit_error':
      return new RateLimitedError(message, options)
    case 'overloaded_error':
      return new OverloadedError(message, options)
    case 'api_error':
      return new ApiError(message, options)
    default:
      return new UnknownApiError(message, errorType, options)
  }
}

/**
 * Normalizes an unknown thrown value into an Error.
 *
 * @param error - The caught value
 * @returns An Error instance
 */
export function normalizeError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
