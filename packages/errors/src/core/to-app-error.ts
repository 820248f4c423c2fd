import type { AppError, ErrorCode } from "../ports/app-error"
import { BaseError } from "./base-error"
import { isAppError } from "./is-app-error"

/**
 * Normalise a caught value. App errors pass through untouched; anything else
 * is wrapped as a non-operational `BaseError` carrying `fallbackCode`.
 */
export function toAppError(err: unknown, fallbackCode: ErrorCode = "unknown"): AppError {
  if (isAppError(err)) return err

  if (err instanceof Error) {
    return new BaseError(err.message, {
      code: fallbackCode,
      cause: err,
      isOperational: false,
    })
  }

  return new BaseError(typeof err === "string" ? err : "Unknown error", {
    code: fallbackCode,
    context: typeof err === "string" ? {} : { value: err },
    isOperational: false,
  })
}
