import { mock } from "vitest-mock-extended"
import type { Mock } from "../../../../tests/mock"
import { aProduct } from "../../../../tests/product-fixtures"
import { ProductError } from "../../model/product.errors"
import type { Product } from "../../model/product.model"
import { type PgQueryable, PostgresProductRepository } from "../product-repository.postgres"

function toRow(product: Product) {
  return {
    id: product.id,
    name: product.name,
    reference_number: product.referenceNumber,
    category: product.category,
    description: product.description,
    sku: product.sku,
    brand: product.brand,
    stock: product.stock,
    images: product.images,
    specifications: product.specifications,
    version: product.version,
    created_at: product.createdAt,
    updated_at: product.updatedAt,
  }
}

function pgError(code: string, message = "pg error"): Error {
  return Object.assign(new Error(message), { code })
}

describe("PostgresProductRepository", () => {
  let db: Mock<PgQueryable>
  let repository: PostgresProductRepository

  beforeEach(() => {
    db = mock<PgQueryable>()
    repository = new PostgresProductRepository({ db })
  })

  describe("create", () => {
    it("inserts every column in order, serializing json fields", async () => {
      const product = aProduct()
      db.query.mockResolvedValue({ rows: [], rowCount: 1 })

      await expect(repository.create(product)).resolves.toEqual({ kind: "created" })

      const [sql, values] = db.query.mock.calls[0] ?? []
      expect(sql).toContain("INSERT INTO products")
      expect(values).toEqual([
        product.id,
        "Trail Runner 3",
        "REF-100",
        "Footwear",
        "Lightweight trail shoe",
        "SKU-TR3-42",
        "Acme",
        12,
        '["https://img.example.test/tr3-front.jpg","https://img.example.test/tr3-side.jpg"]',
        '{"weight_g":280,"waterproof":false,"sizes":[41,42,43]}',
        1,
        product.createdAt,
        product.updatedAt,
      ])
    })

    it("maps a unique violation to already_exists", async () => {
      db.query.mockRejectedValue(pgError("23505", "duplicate key value"))

      await expect(repository.create(aProduct())).resolves.toEqual({ kind: "already_exists" })
    })

    it("maps connection failures to store_unavailable", async () => {
      db.query.mockRejectedValue(pgError("ECONNREFUSED"))

      await expect(repository.create(aProduct())).rejects.toMatchObject({
        code: "store_unavailable",
        isRetryable: true,
      })
    })

    it("does not query when the signal is already aborted", async () => {
      const controller = new AbortController()
      controller.abort()

      await expect(
        repository.create(aProduct(), { signal: controller.signal }),
      ).rejects.toMatchObject({ name: "AbortError" })
      expect(db.query).not.toHaveBeenCalled()
    })
  })

  describe("update", () => {
    it("writes guarded by the expected version", async () => {
      const product = { ...aProduct(), stock: 3, version: 2 }
      db.query.mockResolvedValue({ rows: [], rowCount: 1 })

      await expect(repository.update(product, 1)).resolves.toEqual({ kind: "updated" })

      const [sql, values] = db.query.mock.calls[0] ?? []
      expect(sql).toContain("WHERE id = $11 AND version = $12")
      expect(values?.slice(8)).toEqual([2, product.updatedAt, product.id, 1])
      expect(db.query).toHaveBeenCalledTimes(1)
    })

    it("reports a version conflict when the row exists at another version", async () => {
      db.query
        .mockResolvedValueOnce({ rows: [], rowCount: 0 })
        .mockResolvedValueOnce({ rows: [{ exists: true }], rowCount: 1 })

      await expect(repository.update(aProduct(), 1)).resolves.toEqual({
        kind: "version_conflict",
      })
    })

    it("reports not_found when the row is gone", async () => {
      db.query
        .mockResolvedValueOnce({ rows: [], rowCount: 0 })
        .mockResolvedValueOnce({ rows: [{ exists: false }], rowCount: 1 })

      await expect(repository.update(aProduct(), 1)).resolves.toEqual({ kind: "not_found" })
    })
  })

  describe("delete", () => {
    it("reports deleted when a row was removed", async () => {
      const product = aProduct()
      db.query.mockResolvedValue({ rows: [], rowCount: 1 })

      await expect(repository.delete(product.id)).resolves.toEqual({ kind: "deleted" })
      expect(db.query).toHaveBeenCalledWith("DELETE FROM products WHERE id = $1", [product.id])
    })

    it("reports not_found when nothing matched", async () => {
      db.query.mockResolvedValue({ rows: [], rowCount: 0 })

      await expect(repository.delete(aProduct().id)).resolves.toEqual({ kind: "not_found" })
    })
  })

  describe("reads", () => {
    it("maps a row back to a product", async () => {
      const product = aProduct()
      db.query.mockResolvedValue({ rows: [toRow(product)], rowCount: 1 })

      await expect(repository.findById(product.id)).resolves.toEqual({
        kind: "found",
        product,
      })
    })

    it("returns not_found for an empty result", async () => {
      db.query.mockResolvedValue({ rows: [], rowCount: 0 })

      await expect(repository.findById(aProduct().id)).resolves.toEqual({ kind: "not_found" })
    })

    it("fails when a row does not match the product shape", async () => {
      db.query.mockResolvedValue({ rows: [{ ...toRow(aProduct()), stock: "many" }], rowCount: 1 })

      await expect(repository.findById(aProduct().id)).rejects.toMatchObject({
        code: "store_failure",
        context: { operation: "findById" },
      })
    })

    it("pages through all products newest first", async () => {
      db.query.mockResolvedValue({ rows: [], rowCount: 0 })

      await repository.findAll({ limit: 5, offset: 10 })

      const [sql, values] = db.query.mock.calls[0] ?? []
      expect(sql).toContain("ORDER BY created_at DESC, id ASC LIMIT $1 OFFSET $2")
      expect(values).toEqual([5, 10])
    })

    it("matches categories case-insensitively", async () => {
      db.query.mockResolvedValue({ rows: [], rowCount: 0 })

      await repository.findByCategory("Footwear", { limit: 5, offset: 0 })

      const [sql, values] = db.query.mock.calls[0] ?? []
      expect(sql).toContain("WHERE LOWER(category) = LOWER($1) ORDER BY created_at DESC, id ASC")
      expect(values).toEqual(["Footwear", 5, 0])
    })

    it("searches names by substring", async () => {
      db.query.mockResolvedValue({ rows: [], rowCount: 0 })

      await repository.findByName("runner", { limit: 5, offset: 0 })

      const [sql, values] = db.query.mock.calls[0] ?? []
      expect(sql).toContain(
        "WHERE LOWER(name) LIKE LOWER($1) ESCAPE '\\' ORDER BY name COLLATE \"C\" ASC, id ASC",
      )
      expect(values).toEqual(["%runner%", 5, 0])
    })

    it("matches wildcard characters in the query literally", async () => {
      db.query.mockResolvedValue({ rows: [], rowCount: 0 })

      await repository.findByName("100%_x\\", { limit: 5, offset: 0 })

      const [, values] = db.query.mock.calls[0] ?? []
      expect(values).toEqual(["%100\\%\\_x\\\\%", 5, 0])
    })
  })

  describe("cancellation", () => {
    it("stops waiting on a pending query once the signal aborts", async () => {
      db.query.mockReturnValue(new Promise(() => {}))
      const controller = new AbortController()

      const pending = repository.findAll({ limit: 5, offset: 0 }, { signal: controller.signal })
      controller.abort()

      await expect(pending).rejects.toMatchObject({ name: "AbortError" })
      expect(db.query).toHaveBeenCalledTimes(1)
    })

    it("rejects a pending insert with the timeout reason", async () => {
      db.query.mockReturnValue(new Promise(() => {}))
      const controller = new AbortController()
      const reason = new DOMException("deadline passed", "TimeoutError")

      const pending = repository.create(aProduct(), { signal: controller.signal })
      controller.abort(reason)

      await expect(pending).rejects.toBe(reason)
    })

    it("bounds the health check by its signal", async () => {
      db.query.mockReturnValue(new Promise(() => {}))
      const controller = new AbortController()

      const pending = repository.healthCheck({ signal: controller.signal })
      controller.abort()

      await expect(pending).rejects.toMatchObject({ name: "AbortError" })
    })

    it("returns the result when the query settles before any abort", async () => {
      db.query.mockResolvedValue({ rows: [], rowCount: 0 })
      const controller = new AbortController()

      await expect(
        repository.findAll({ limit: 5, offset: 0 }, { signal: controller.signal }),
      ).resolves.toEqual([])
    })
  })

  describe("healthCheck", () => {
    it("runs a trivial query", async () => {
      db.query.mockResolvedValue({ rows: [{ "?column?": 1 }], rowCount: 1 })

      await repository.healthCheck()

      expect(db.query).toHaveBeenCalledWith("SELECT 1", undefined)
    })

    it("surfaces an unreachable database as store_unavailable", async () => {
      db.query.mockRejectedValue(new Error("Connection terminated unexpectedly"))

      await expect(repository.healthCheck()).rejects.toBeInstanceOf(ProductError)
      await expect(repository.healthCheck()).rejects.toMatchObject({
        code: "store_unavailable",
      })
    })
  })
})
