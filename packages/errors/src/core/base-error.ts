import type {
  AppError,
  ErrorCode,
  ErrorContext,
  SerializedError,
} from "../ports/app-error"
import { serializeError } from "./serialize-error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

/**
 * Root of every error the application throws on purpose.
 *
 * Subclasses narrow `C` to a closed union of codes and usually expose static
 * factories, so call sites read `HouseholdError.pollClosed(pollId)` rather
 * than assembling options by hand.
 */
export class BaseError<C extends ErrorCode = ErrorCode>
  extends Error
  implements AppError
{
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })

    this.name = new.target.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    Error.captureStackTrace?.(this, new.target)
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}
