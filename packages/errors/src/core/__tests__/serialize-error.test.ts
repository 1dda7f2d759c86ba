import { BaseError } from "../base-error"
import { serializeError } from "../serialize-error"

describe("serializeError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-03-01T12:00:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("keeps AppError fields", () => {
    const err = new BaseError("down", {
      code: "store_unavailable",
      context: { host: "db" },
      isRetryable: true,
    })

    expect(serializeError(err)).toEqual({
      name: "BaseError",
      code: "store_unavailable",
      message: "down",
      context: { host: "db" },
      isOperational: true,
      isRetryable: true,
      timestamp: "2024-03-01T12:00:00.000Z",
    })
  })

  it("marks plain errors as unknown and non-operational", () => {
    const res = serializeError(new TypeError("bad"))

    expect(res.name).toBe("TypeError")
    expect(res.code).toBe("unknown")
    expect(res.isOperational).toBe(false)
  })

  it("follows the cause chain", () => {
    const err = new BaseError("outer", {
      code: "outer",
      cause: new Error("inner"),
    })

    expect(serializeError(err).cause?.message).toBe("inner")
  })

  it("stops following causes at maxCauseDepth", () => {
    const err = new Error("a", { cause: new Error("b", { cause: new Error("c") }) })

    const res = serializeError(err, { maxCauseDepth: 1 })

    expect(res.cause?.message).toBe("b")
    expect(res.cause?.cause).toBeUndefined()
  })

  it("includes stack only on request", () => {
    const err = new Error("with stack")

    expect(serializeError(err).stack).toBeUndefined()
    expect(serializeError(err, { includeStack: true }).stack).toBe(err.stack)
  })

  it("wraps non-Error values", () => {
    expect(serializeError("boom")).toMatchObject({
      name: "NonErrorThrown",
      message: "boom",
      context: {},
    })
    expect(serializeError(42)).toMatchObject({
      message: "Unknown error",
      context: { value: 42 },
    })
  })
})
