import type { Product, Specifications } from "../model/product.model"

export type ProductResponse = {
  id: string
  name: string
  reference_number: string
  category: string
  description: string
  sku: string
  brand: string
  stock: number
  images: string[]
  specifications: Specifications
  version: number
  created_at: string
  updated_at: string
}

export type MessageResponse = {
  message: string
}

export function toProductResponse(product: Product): ProductResponse {
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
    created_at: product.createdAt.toISOString(),
    updated_at: product.updatedAt.toISOString(),
  }
}

export function toProductResponseList(products: readonly Product[]): ProductResponse[] {
  return products.map(toProductResponse)
}
