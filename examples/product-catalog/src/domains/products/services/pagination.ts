import type { Product } from "../model/product.model"
import type { Page } from "../model/product-repository.model"

export type ProductOrder = (a: Product, b: Product) => number

export function paginate<T>(items: readonly T[], page: Page): T[] {
  if (page.offset >= items.length) return []

  return items.slice(page.offset, Math.min(page.offset + page.limit, items.length))
}

export const newestFirst: ProductOrder = (a, b) =>
  b.createdAt.getTime() - a.createdAt.getTime() || compareIds(a, b)

// code point order, which is what the store's `COLLATE "C"` sorts by
export const byName: ProductOrder = (a, b) => compareCodePoints(a.name, b.name) || compareIds(a, b)

export function compareCodePoints(a: string, b: string): number {
  const left = [...a]
  const right = [...b]
  const shared = Math.min(left.length, right.length)

  for (let i = 0; i < shared; i++) {
    const diff = (left[i]?.codePointAt(0) ?? 0) - (right[i]?.codePointAt(0) ?? 0)
    if (diff !== 0) return diff
  }

  return left.length - right.length
}

function compareIds(a: Product, b: Product): number {
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0
}
