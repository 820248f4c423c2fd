import type { AppError, SerializedError } from "../ports/app-error"
import { isAppError } from "./is-app-error"

export type SerializeOptions = Readonly<{
  /** @default false */
  includeStack?: boolean
}>

/**
 * Turn any thrown value into a {@link SerializedError}.
 *
 * App errors keep their code and context. Plain `Error`s get the code
 * `"unknown"` and are flagged non-operational; anything else is reported as
 * `NonErrorThrown` with the raw value under `context.value`.
 */
export function serializeError(
  err: unknown,
  options: SerializeOptions = {},
): SerializedError {
  const includeStack = options.includeStack ?? false

  if (isAppError(err)) {
    return {
      ...baseFields(err, includeStack, options),
      code: err.code,
      context: { ...err.context },
      timestamp: err.timestamp.toISOString(),
      isRetryable: err.isRetryable,
      isOperational: err.isOperational,
    }
  }

  if (err instanceof Error) {
    return {
      ...baseFields(err, includeStack, options),
      code: "unknown",
      context: {},
      timestamp: new Date().toISOString(),
      isRetryable: false,
      isOperational: false,
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: typeof err === "string" ? {} : { value: err },
    timestamp: new Date().toISOString(),
    isRetryable: false,
    isOperational: false,
  }
}

function baseFields(
  err: Error | AppError,
  includeStack: boolean,
  options: SerializeOptions,
): Pick<SerializedError, "name" | "message" | "cause" | "stack"> {
  return {
    name: err.name,
    message: err.message,
    ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
    ...(includeStack && err.stack !== undefined && { stack: err.stack }),
  }
}
