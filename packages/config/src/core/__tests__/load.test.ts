import { z } from "zod"
import { EnvSource } from "../../adapters/env/env-source"
import type { ConfigSource } from "../../ports/source"
import { ConfigError } from "../config-error"
import { loadConfig } from "../load"

const schema = z.object({
  SERVER_PORT: z.coerce.number().int().default(8080),
  REDIS_URL: z.string(),
})

describe("loadConfig", () => {
  it("coerces values and fills defaults", async () => {
    const config = await loadConfig({
      schema,
      sources: [new EnvSource({ env: { REDIS_URL: "redis://cache:6379" } })],
    })

    expect(config.value).toEqual({ SERVER_PORT: 8080, REDIS_URL: "redis://cache:6379" })
    expect(config.explain("SERVER_PORT")).toBe("default")
  })

  it("lets later sources win", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new EnvSource({ env: { SERVER_PORT: "3000", REDIS_URL: "redis://a" } }),
        new EnvSource({ env: { SERVER_PORT: "4000" } }),
      ],
    })

    expect(config.get("SERVER_PORT")).toBe(4000)
    expect(config.get("REDIS_URL")).toBe("redis://a")
  })

  it("skips undefined values", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new EnvSource({ env: { REDIS_URL: "redis://a" } }),
        new EnvSource({ env: { REDIS_URL: undefined } }),
      ],
    })

    expect(config.get("REDIS_URL")).toBe("redis://a")
  })

  it("throws invalid_config naming the failing key", async () => {
    const load = loadConfig({
      schema,
      sources: [new EnvSource({ env: { SERVER_PORT: "not-a-port" } })],
    })

    await expect(load).rejects.toBeInstanceOf(ConfigError)
    await expect(load).rejects.toMatchObject({ code: "invalid_config" })
    await expect(load).rejects.toThrow(/SERVER_PORT/)
  })

  it("wraps source failures", async () => {
    const broken: ConfigSource = {
      name: "broken",
      load: () => Promise.reject(new Error("EACCES")),
    }

    await expect(loadConfig({ schema, sources: [broken] })).rejects.toMatchObject({
      code: "config_source_failed",
      context: { source: "broken" },
    })
  })
})
