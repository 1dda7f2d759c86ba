import type { IdDeriver } from "../../ports/id-generator"
import type { Brand } from "../brand"
import { withDeriver } from "../id-codec"
import type { IdType } from "../id-type"

type SkuId = Brand<string, "SkuId">

const isSkuId = (v: unknown): v is SkuId => typeof v === "string" && v.startsWith("sku_")

const SkuIdType: IdType<SkuId> = {
  kind: "SkuId",
  is: isSkuId,
  parse: (v) => {
    if (!isSkuId(v)) throw new Error("Invalid SkuId")
    return v
  },
}

const toSkuId = (v: string): SkuId => SkuIdType.parse(`sku_${v}`)

describe("withDeriver", () => {
  const deriver: IdDeriver<SkuId> = { derive: (seed) => toSkuId(seed.toLowerCase()) }

  it("combines the type with a deriver", () => {
    const codec = withDeriver(SkuIdType, deriver)

    expect(codec.derive("ABC")).toBe("sku_abc")
    expect(codec.parse("sku_x")).toBe("sku_x")
    expect(() => codec.parse("nope")).toThrow("Invalid SkuId")
    expect(codec.is(42)).toBe(false)
  })
})
