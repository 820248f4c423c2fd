import { BaseError } from "@hearth/errors"
import type { Milliseconds } from "../ports/time"

export type DeadlineErrorCode = "deadline_exceeded" | "operation_aborted"

export class DeadlineError extends BaseError<DeadlineErrorCode> {
  static exceeded(timeoutMs: Milliseconds): DeadlineError {
    return new DeadlineError(`Operation did not finish within ${timeoutMs}ms`, {
      code: "deadline_exceeded",
      context: { timeoutMs },
      isRetryable: true,
    })
  }

  static aborted(reason: unknown): DeadlineError {
    return new DeadlineError("Operation aborted by caller", {
      code: "operation_aborted",
      cause: reason,
    })
  }
}
