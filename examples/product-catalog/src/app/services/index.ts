import {
  createProductServices,
  type ProductServices,
  type ProductStores,
} from "../../domains/products/composition"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"
import type { InfraClients } from "./infra"

export type DomainServices = {
  products: ProductServices
}

export type DomainOverrides = {
  productStores?: Partial<ProductStores>
}

export function createDefaultDomainServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraClients,
  overrides: DomainOverrides = {},
): DomainServices {
  return {
    products: createProductServices(config, core, infra, overrides.productStores),
  }
}

export type AppServices = {
  core: CoreServices
  domains: DomainServices
}
