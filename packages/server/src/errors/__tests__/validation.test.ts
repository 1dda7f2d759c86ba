import { z } from "zod/mini"
import { isValidationError, parseOrThrow, ValidationError } from "../validation"

describe("parseOrThrow", () => {
  const schema = z.object({
    name: z.string().check(z.minLength(1, "name is required")),
    images: z.array(z.string()),
  })

  it("returns the parsed value", () => {
    expect(parseOrThrow(schema, { name: "Desk", images: [] })).toStrictEqual({
      name: "Desk",
      images: [],
    })
  })

  it("converts schema issues into a ValidationError", () => {
    let caught: unknown

    try {
      parseOrThrow(schema, { name: "", images: ["a", 2] })
    } catch (err) {
      caught = err
    }

    expect(isValidationError(caught)).toBe(true)
    expect(caught).toMatchObject({
      code: "validation_error",
      message: "name is required",
      context: {
        issues: [
          { path: "name", message: "name is required" },
          { path: "images[1]", message: expect.any(String) },
        ],
      },
    })
  })

  it("rethrows errors that are not schema errors", () => {
    const boom = new Error("boom")
    const throwing = {
      parse: () => {
        throw boom
      },
    }

    expect(() => parseOrThrow(throwing, {})).toThrow(boom)
  })
})

describe("ValidationError.fromIssues", () => {
  it("uses the first issue as the message", () => {
    const err = ValidationError.fromIssues([{ path: "q", message: "q is required" }])

    expect(err.message).toBe("q is required")
    expect(err.context).toStrictEqual({ issues: [{ path: "q", message: "q is required" }] })
  })

  it("falls back to a generic message", () => {
    expect(ValidationError.fromIssues([]).message).toBe("Invalid input")
  })
})
