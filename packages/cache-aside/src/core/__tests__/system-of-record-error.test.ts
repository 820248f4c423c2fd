import { BaseError } from "@hearth/errors"
import { SystemOfRecordError } from "../system-of-record-error"

describe("SystemOfRecordError.wrap", () => {
  it("wraps plain errors as non-operational failures", () => {
    const cause = new Error("connection reset")
    const err = SystemOfRecordError.wrap("createTask", cause)

    expect(err).toBeInstanceOf(SystemOfRecordError)
    expect(err.message).toBe("createTask failed in the system of record")
    expect(err.cause).toBe(cause)
    expect(err.isOperational).toBe(false)
  })

  it("wraps non-error throwables", () => {
    expect(SystemOfRecordError.wrap("createTask", "boom").toJSON()).toMatchObject({
      code: "system_of_record_failure",
      context: { operation: "createTask" },
    })
  })

  it("returns application errors as they are", () => {
    const closed = new BaseError("Poll 3 is closed", { code: "poll_closed" })

    expect(SystemOfRecordError.wrap("vote", closed)).toBe(closed)
  })
})
