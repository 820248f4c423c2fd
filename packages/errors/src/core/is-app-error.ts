import type { AppError } from "../ports/app-error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Structural check, so errors created by another copy of this package (or
 * rehydrated from a worker) are still recognised.
 */
export function isAppError(e: unknown): e is AppError {
  if (!(e instanceof Error) || !isRecord(e)) return false

  return (
    typeof e["code"] === "string" &&
    isRecord(e["context"]) &&
    typeof e["isRetryable"] === "boolean" &&
    typeof e["isOperational"] === "boolean" &&
    isValidDate(e["timestamp"])
  )
}
