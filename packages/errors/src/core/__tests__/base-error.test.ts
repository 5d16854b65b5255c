import { BaseError } from "../base-error"
import { serializeError } from "../serialize-error"
import { toAppError } from "../to-app-error"

class DocumentError extends BaseError<"document_missing"> {}

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("creates error with code and message", () => {
      const err = new BaseError("boot document not found", { code: "document_missing" })

      expect(err.message).toBe("boot document not found")
      expect(err.code).toBe("document_missing")
    })

    it("sets name to the subclass name", () => {
      const err = new DocumentError("missing", { code: "document_missing" })

      expect(err.name).toBe("DocumentError")
      expect(err).toBeInstanceOf(BaseError)
    })

    it("defaults context to empty object and isOperational to true", () => {
      const err = new BaseError("x", { code: "x" })

      expect(err.context).toEqual({})
      expect(err.isOperational).toBe(true)
    })

    it("sets timestamp to current time", () => {
      const err = new BaseError("x", { code: "x" })

      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("freezes context", () => {
      const err = new BaseError("x", { code: "x", context: { fragment: "a[" } })

      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("keeps the cause", () => {
      const cause = new Error("ENOENT")
      const err = new BaseError("wrapped", { code: "x", cause })

      expect(err.cause).toBe(cause)
    })
  })

  describe("toJSON", () => {
    it("serializes code, context and cause", () => {
      const err = new BaseError("bad override", {
        code: "override_syntax",
        context: { fragment: "a[x]=1" },
        cause: new Error("not a number"),
      })

      expect(err.toJSON()).toEqual({
        name: "BaseError",
        code: "override_syntax",
        message: "bad override",
        context: { fragment: "a[x]=1" },
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
        cause: {
          name: "Error",
          code: "unknown",
          message: "not a number",
          context: {},
          isOperational: false,
          timestamp: "2024-01-15T10:30:00.000Z",
        },
      })
    })
  })
})

describe("serializeError", () => {
  it("wraps non-error values", () => {
    expect(serializeError(42)).toEqual({
      name: "NonErrorThrown",
      code: "unknown",
      message: "Unknown error",
      context: { value: 42 },
      isOperational: false,
      timestamp: expect.any(String),
    })
  })

  it("uses string values as the message", () => {
    expect(serializeError("boom").message).toBe("boom")
  })

  it("includes the stack only when asked", () => {
    const err = new Error("with stack")

    expect(serializeError(err).stack).toBeUndefined()
    expect(serializeError(err, { includeStack: true }).stack).toBe(err.stack)
  })
})

describe("toAppError", () => {
  it("returns BaseErrors unchanged", () => {
    const err = new BaseError("x", { code: "x" })

    expect(toAppError(err)).toBe(err)
  })

  it("wraps plain errors as non-operational with the fallback code", () => {
    const cause = new Error("hook exploded")
    const result = toAppError(cause, "shutdown_hook")

    expect(result.code).toBe("shutdown_hook")
    expect(result.message).toBe("hook exploded")
    expect(result.cause).toBe(cause)
    expect(result.isOperational).toBe(false)
  })

  it("wraps thrown strings and other values", () => {
    expect(toAppError("boom").message).toBe("boom")
    expect(toAppError({ reason: 1 }).context).toEqual({ value: { reason: 1 } })
  })
})
