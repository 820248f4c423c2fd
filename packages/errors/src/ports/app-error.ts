/** Lowercase, snake_case by convention: `bill_already_paid`, `cache_unavailable`. */
export type ErrorCode = Lowercase<string>

/** Structured metadata carried by an error (ids, keys, channel names). */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** `true` when repeating the same call may succeed (timeouts, unreachable stores). */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (not found, rejected state transition,
   * store unavailable). `false` for programmer errors and broken invariants.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/** JSON-safe error shape used by loggers and API error bodies. */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
