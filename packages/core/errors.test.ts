import {
  TimeoutError,
  getErrorCode,
  getErrorMessage,
  isTimeoutError,
} from "./errors"

describe("Errors", () => {
  it("Should carry the timeout", () => {
    const err = new TimeoutError("waited", 25)

    expect(isTimeoutError(err)).toBeTruthy()
    expect(isTimeoutError(new Error("waited"))).toBeFalsy()
    expect(err.name).toBe("TimeoutError")
    expect(err.timeoutMs).toBe(25)
  })

  it("Should read messages and codes from unknown values", () => {
    expect(getErrorMessage(new Error("boom"))).toBe("boom")
    expect(getErrorMessage("boom")).toBeUndefined()
    expect(getErrorCode({ code: "23505" })).toBe("23505")
    expect(getErrorCode({ code: 1 })).toBeUndefined()
  })
})
