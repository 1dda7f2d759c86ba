import type { Product } from "../model/product.model"
import { ProductError } from "../model/product.errors"
import type { ProductId } from "../model/product-id"
import type {
  CreateProductResult,
  DeleteProductResult,
  FindProductResult,
  Page,
  StoreCallOptions,
  UpdateProductResult,
} from "../model/product-repository.model"
import type { ProductRepository } from "../services/product-repository"
import { isUniqueViolation, toStoreError } from "./pg-errors"
import {
  existsRowSchema,
  fromRow,
  PRODUCT_COLUMNS,
  productRowSchema,
  toInsertValues,
} from "./product-row"

export type PgQueryResult = {
  rows: unknown[]
  rowCount: number | null
}

/** The slice of `pg.Pool` the repository uses. */
export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<PgQueryResult>
}

export type PostgresProductRepositoryDeps = {
  db: PgQueryable
}

const INSERT_PRODUCT = `INSERT INTO products (${PRODUCT_COLUMNS})
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)`

const UPDATE_PRODUCT = `UPDATE products
  SET name = $1, category = $2, description = $3, sku = $4, brand = $5, stock = $6,
      images = $7, specifications = $8, version = $9, updated_at = $10
  WHERE id = $11 AND version = $12`

const DELETE_PRODUCT = "DELETE FROM products WHERE id = $1"

const SELECT_BY_ID = `SELECT ${PRODUCT_COLUMNS} FROM products WHERE id = $1`

const SELECT_ALL = `SELECT ${PRODUCT_COLUMNS} FROM products
  ORDER BY created_at DESC, id ASC LIMIT $1 OFFSET $2`

const SELECT_BY_CATEGORY = `SELECT ${PRODUCT_COLUMNS} FROM products
  WHERE LOWER(category) = LOWER($1) ORDER BY created_at DESC, id ASC LIMIT $2 OFFSET $3`

const SELECT_BY_NAME = `SELECT ${PRODUCT_COLUMNS} FROM products
  WHERE LOWER(name) LIKE LOWER($1) ESCAPE '\\' ORDER BY name COLLATE "C" ASC, id ASC
  LIMIT $2 OFFSET $3`

const SELECT_EXISTS = "SELECT EXISTS(SELECT 1 FROM products WHERE id = $1) AS exists"

const CREATED: CreateProductResult = { kind: "created" }
const ALREADY_EXISTS: CreateProductResult = { kind: "already_exists" }
const NOT_FOUND = { kind: "not_found" } as const

/** Makes `%`, `_` and `\` match themselves in a LIKE pattern. */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`)
}

/**
 * Rejects with the signal's reason once it aborts. The query itself keeps
 * running on its connection; only the caller stops waiting for it.
 */
function abortable<T>(pending: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return pending

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason)

    signal.addEventListener("abort", onAbort, { once: true })
    pending.then(
      (value) => {
        signal.removeEventListener("abort", onAbort)
        resolve(value)
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort)
        reject(err)
      },
    )
  })
}

export class PostgresProductRepository implements ProductRepository {
  public constructor(private readonly deps: PostgresProductRepositoryDeps) {}

  async create(product: Product, opts: StoreCallOptions = {}): Promise<CreateProductResult> {
    opts.signal?.throwIfAborted()

    try {
      await abortable(this.deps.db.query(INSERT_PRODUCT, toInsertValues(product)), opts.signal)
      return CREATED
    } catch (err) {
      if (isUniqueViolation(err)) return ALREADY_EXISTS
      throw toStoreError("create", err)
    }
  }

  async update(
    product: Product,
    expectedVersion: number,
    opts: StoreCallOptions = {},
  ): Promise<UpdateProductResult> {
    const res = await this.query("update", UPDATE_PRODUCT, opts, [
      product.name,
      product.category,
      product.description,
      product.sku,
      product.brand,
      product.stock,
      JSON.stringify(product.images),
      JSON.stringify(product.specifications),
      product.version,
      product.updatedAt,
      product.id,
      expectedVersion,
    ])

    if ((res.rowCount ?? 0) > 0) return { kind: "updated" }

    return (await this.exists(product.id, opts)) ? { kind: "version_conflict" } : NOT_FOUND
  }

  async delete(id: ProductId, opts: StoreCallOptions = {}): Promise<DeleteProductResult> {
    const res = await this.query("delete", DELETE_PRODUCT, opts, [id])

    return (res.rowCount ?? 0) > 0 ? { kind: "deleted" } : NOT_FOUND
  }

  async findById(id: ProductId, opts: StoreCallOptions = {}): Promise<FindProductResult> {
    const res = await this.query("findById", SELECT_BY_ID, opts, [id])
    const [product] = this.toProducts("findById", res.rows)

    return product ? { kind: "found", product } : NOT_FOUND
  }

  async findAll(page: Page, opts: StoreCallOptions = {}): Promise<Product[]> {
    const res = await this.query("findAll", SELECT_ALL, opts, [page.limit, page.offset])

    return this.toProducts("findAll", res.rows)
  }

  async findByCategory(
    category: string,
    page: Page,
    opts: StoreCallOptions = {},
  ): Promise<Product[]> {
    const res = await this.query("findByCategory", SELECT_BY_CATEGORY, opts, [
      category,
      page.limit,
      page.offset,
    ])

    return this.toProducts("findByCategory", res.rows)
  }

  async findByName(query: string, page: Page, opts: StoreCallOptions = {}): Promise<Product[]> {
    const res = await this.query("findByName", SELECT_BY_NAME, opts, [
      `%${escapeLike(query)}%`,
      page.limit,
      page.offset,
    ])

    return this.toProducts("findByName", res.rows)
  }

  async exists(id: ProductId, opts: StoreCallOptions = {}): Promise<boolean> {
    const res = await this.query("exists", SELECT_EXISTS, opts, [id])
    const parsed = existsRowSchema.safeParse(res.rows[0])

    if (!parsed.success) throw ProductError.storeFailure("exists", parsed.error)

    return parsed.data.exists
  }

  async healthCheck(opts: StoreCallOptions = {}): Promise<void> {
    await this.query("healthCheck", "SELECT 1", opts)
  }

  private async query(
    operation: string,
    text: string,
    opts: StoreCallOptions,
    values?: unknown[],
  ): Promise<PgQueryResult> {
    opts.signal?.throwIfAborted()

    try {
      return await abortable(this.deps.db.query(text, values), opts.signal)
    } catch (err) {
      throw toStoreError(operation, err)
    }
  }

  private toProducts(operation: string, rows: unknown[]): Product[] {
    return rows.map((row) => {
      const parsed = productRowSchema.safeParse(row)
      if (!parsed.success) throw ProductError.storeFailure(operation, parsed.error)

      return fromRow(parsed.data)
    })
  }
}
