import { BaseError } from "@catalog/errors"
import type { ProductField } from "./product.model"

export type ProductErrorCode =
  | "invalid_product"
  | "product_not_found"
  | "product_already_exists"
  | "version_conflict"
  | "store_unavailable"
  | "store_failure"

export class ProductError extends BaseError<ProductErrorCode> {
  static invalid(field: ProductField, message: string): ProductError {
    return new ProductError(message, {
      code: "invalid_product",
      context: { field },
    })
  }

  static notFound(id: string): ProductError {
    return new ProductError("Product not found", {
      code: "product_not_found",
      context: { productId: id },
    })
  }

  static alreadyExists(id: string): ProductError {
    return new ProductError("Product already exists", {
      code: "product_already_exists",
      context: { productId: id },
    })
  }

  static versionConflict(id: string, expectedVersion: number): ProductError {
    return new ProductError("Product version conflict - concurrent modification detected", {
      code: "version_conflict",
      context: { productId: id, expectedVersion },
    })
  }

  static storeUnavailable(operation: string, cause: unknown): ProductError {
    return new ProductError("Product store unavailable", {
      code: "store_unavailable",
      context: { operation },
      cause,
      isRetryable: true,
    })
  }

  static storeFailure(operation: string, cause: unknown): ProductError {
    return new ProductError(`Product store ${operation} failed`, {
      code: "store_failure",
      context: { operation },
      cause,
      isOperational: false,
    })
  }
}

export function isProductError(err: unknown): err is ProductError {
  return err instanceof ProductError
}
