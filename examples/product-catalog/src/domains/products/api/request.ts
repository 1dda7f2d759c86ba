import { type Context, ValidationError } from "@catalog/server"
import type { AppConfig } from "../../../app/config"
import { ProductError } from "../model/product.errors"
import { ProductId } from "../model/product-id"
import type { Page } from "../model/product-repository.model"

/** Ids that could never have been derived are treated as unknown products. */
export function readProductId(c: Context): ProductId {
  const id = c.req.param("id") ?? ""
  if (!ProductId.is(id)) throw ProductError.notFound(id)

  return id
}

/** Out-of-range values fall back to the defaults instead of failing. */
export function readPage(c: Context, policy: AppConfig["pagination"]): Page {
  const limit = Number(c.req.query("limit") ?? Number.NaN)
  const offset = Number(c.req.query("offset") ?? Number.NaN)

  return {
    limit:
      Number.isInteger(limit) && limit >= 1 && limit <= policy.maxLimit
        ? limit
        : policy.defaultLimit,
    offset: Number.isInteger(offset) && offset >= 0 ? offset : 0,
  }
}

export function readSearchQuery(c: Context): string {
  const query = c.req.query("q")?.trim() ?? ""

  if (query === "") {
    throw ValidationError.fromIssues([{ path: "q", message: "Query parameter q is required" }])
  }

  return query
}

export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json()
  } catch (err) {
    if (!(err instanceof SyntaxError)) throw err

    throw ValidationError.fromIssues([{ path: "", message: "Request body must be valid JSON" }])
  }
}
