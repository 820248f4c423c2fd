import { BaseError } from "../base-error"
import { serializeError } from "../serialize-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("serializes app errors with their code and flags", () => {
    const err = new BaseError("cache down", {
      code: "cache_unavailable",
      context: { key: "bill:42" },
      isRetryable: true,
    })

    expect(serializeError(err)).toEqual({
      name: "BaseError",
      code: "cache_unavailable",
      message: "cache down",
      context: { key: "bill:42" },
      timestamp: "2024-01-15T10:30:00.000Z",
      isRetryable: true,
      isOperational: true,
    })
  })

  it("omits the stack unless asked", () => {
    const err = new BaseError("x", { code: "x" })

    expect(serializeError(err).stack).toBeUndefined()
    expect(serializeError(err, { includeStack: true }).stack).toContain("BaseError")
  })

  it("marks plain errors as unknown and non-operational", () => {
    const result = serializeError(new TypeError("bad"))

    expect(result).toMatchObject({
      name: "TypeError",
      code: "unknown",
      message: "bad",
      isOperational: false,
    })
  })

  it("serializes the cause chain", () => {
    const root = new Error("ECONNRESET")
    const err = new BaseError("write failed", {
      code: "system_of_record_failure",
      cause: root,
    })

    expect(serializeError(err).cause).toMatchObject({
      name: "Error",
      message: "ECONNRESET",
    })
  })

  it("wraps thrown strings", () => {
    expect(serializeError("boom")).toMatchObject({
      name: "NonErrorThrown",
      message: "boom",
      context: {},
    })
  })

  it("keeps other thrown values in context", () => {
    expect(serializeError({ status: 503 })).toMatchObject({
      message: "Unknown error",
      context: { value: { status: 503 } },
    })
  })
})
