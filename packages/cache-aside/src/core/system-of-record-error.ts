import { BaseError } from "@hearth/errors"

export type SystemOfRecordErrorCode = "system_of_record_failure"

export class SystemOfRecordError extends BaseError<SystemOfRecordErrorCode> {
  /**
   * Application errors raised by a repository (a rejected vote, a missing
   * row) pass through unchanged. Anything else is wrapped.
   */
  static wrap(operation: string, cause: unknown): BaseError {
    if (cause instanceof BaseError) return cause

    return new SystemOfRecordError(`${operation} failed in the system of record`, {
      code: "system_of_record_failure",
      context: { operation },
      cause,
      isOperational: false,
    })
  }
}
