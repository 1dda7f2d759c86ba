import { generateProductId, normalizeKey, ProductId, shortId } from "../product-id"

describe("generateProductId", () => {
  it("ignores case and surrounding whitespace", () => {
    expect(generateProductId("iPhone", "REF-1")).toBe(generateProductId("IPHONE", " ref-1 "))
  })

  it("produces a 26 character ULID with a zero time component", () => {
    const id = generateProductId("Trail Runner 3", "REF-100")

    expect(id).toHaveLength(26)
    expect(id.slice(0, 10)).toBe("0000000000")
    expect(ProductId.is(id)).toBe(true)
  })

  it("is stable across calls", () => {
    const ids = new Set(Array.from({ length: 5 }, () => generateProductId("Desk Lamp", "DL-7")))

    expect(ids.size).toBe(1)
  })

  it("distinguishes different business keys", () => {
    const a = generateProductId("Desk Lamp", "DL-7")
    const b = generateProductId("Desk Lamp", "DL-8")
    const c = generateProductId("Desk Lamps", "DL-7")

    expect(new Set([a, b, c]).size).toBe(3)
  })

  it("keeps the separator between name and reference significant", () => {
    expect(generateProductId("ab", "c")).not.toBe(generateProductId("a", "bc"))
  })
})

describe("ProductId", () => {
  it("rejects values that are not ULIDs", () => {
    expect(ProductId.is("not-an-id")).toBe(false)
    expect(ProductId.is(42)).toBe(false)
    expect(() => ProductId.parse("not-an-id")).toThrow("Invalid ProductId: not-an-id")
  })
})

describe("normalizeKey", () => {
  it("trims and lowercases", () => {
    expect(normalizeKey("  Running Shoes ")).toBe("running shoes")
  })
})

describe("shortId", () => {
  it("keeps the first 8 characters", () => {
    expect(shortId("01ARZ3NDEKTSV4RRFFQ69G5FAV")).toBe("01ARZ3ND")
  })
})
