import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { EnvSource } from "../env-source"

describeConfigSourceContract({
  name: "EnvSource",
  setup: async () => {},
  make: () => new EnvSource({ env: { REDIS_URL: "redis://cache:6379" } }),
  expected: { REDIS_URL: "redis://cache:6379" },
})

describe("EnvSource", () => {
  it("returns every variable when no prefix is set", async () => {
    const source = new EnvSource({ env: { SERVER_PORT: "8080", LOG_LEVEL: "debug" } })

    expect(await source.load()).toEqual({ SERVER_PORT: "8080", LOG_LEVEL: "debug" })
  })

  it("filters by prefix and strips it", async () => {
    const source = new EnvSource({
      prefix: "CATALOG_",
      env: { CATALOG_SERVER_PORT: "9000", PATH: "/usr/bin" },
    })

    expect(await source.load()).toEqual({ SERVER_PORT: "9000" })
  })
})
