import { BaseError } from "@catalog/errors"

type SchemaIssue = {
  path: readonly PropertyKey[]
  message: string
}

type SchemaError = {
  issues: readonly SchemaIssue[]
}

export type ValidationIssue = { path: string; message: string }

function formatPath(path: readonly PropertyKey[]): string {
  let out = ""
  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }
  return out
}

export class ValidationError extends BaseError<"validation_error"> {
  static fromIssues(issues: ValidationIssue[]): ValidationError {
    const message = issues[0]?.message ?? "Invalid input"

    return new ValidationError(message, {
      code: "validation_error",
      context: { issues },
    })
  }

  static fromZodError(err: SchemaError): ValidationError {
    return ValidationError.fromIssues(
      err.issues.map((i) => ({ path: formatPath(i.path), message: i.message })),
    )
  }
}

function isSchemaIssue(value: unknown): value is SchemaIssue {
  return (
    typeof value === "object" &&
    value !== null &&
    "path" in value &&
    Array.isArray(value.path) &&
    "message" in value &&
    typeof value.message === "string"
  )
}

function isSchemaError(err: unknown): err is SchemaError {
  if (typeof err !== "object" || err === null || !("issues" in err)) return false

  const { issues } = err
  return Array.isArray(issues) && issues.every(isSchemaIssue)
}

export function parseOrThrow<T>(schema: { parse: (data: unknown) => T }, data: unknown): T {
  try {
    return schema.parse(data)
  } catch (err) {
    if (isSchemaError(err)) {
      throw ValidationError.fromZodError(err)
    }
    throw err
  }
}

export function isValidationError(err: unknown): err is ValidationError {
  return err instanceof ValidationError && err.code === "validation_error"
}
