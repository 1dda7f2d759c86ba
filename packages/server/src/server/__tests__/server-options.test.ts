import { DEFAULTS, resolveOptions, type ServerOptions } from "../server-options"

const base: ServerOptions = {
  port: 8080,
  errors: { mappings: {} },
  routes: () => {},
}

describe("resolveOptions", () => {
  it("fills in defaults", () => {
    const resolved = resolveOptions(base)

    expect(resolved).toMatchObject({
      port: 8080,
      host: "0.0.0.0",
      shutdownTimeoutMs: 10_000,
      startupTimeoutMs: DEFAULTS.startupTimeoutMs,
      health: {
        enabled: true,
        livenessPath: "/health",
        readinessPath: "/ready",
        readinessChecks: [],
        checkTimeoutMs: 5_000,
      },
      requestId: { enabled: true, header: "x-request-id" },
      requestLogging: { enabled: true, level: "info", ignorePaths: ["/health", "/ready"] },
      startHooks: [],
      stopHooks: [],
    })
  })

  it("ignores the health paths using the configured ones", () => {
    const resolved = resolveOptions({
      ...base,
      health: { enabled: true, livenessPath: "/health/live", readinessPath: "/health/ready" },
    })

    expect(resolved.requestLogging).toStrictEqual({
      enabled: true,
      level: "info",
      ignorePaths: ["/health/live", "/health/ready"],
    })
  })

  it("ignores nothing when health routes are disabled", () => {
    const resolved = resolveOptions({ ...base, health: { enabled: false } })

    expect(resolved.health).toStrictEqual({ enabled: false })
    expect(resolved.requestLogging).toMatchObject({ ignorePaths: [] })
  })

  it("keeps disabled sections disabled", () => {
    const resolved = resolveOptions({
      ...base,
      requestId: { enabled: false },
      requestLogging: { enabled: false },
    })

    expect(resolved.requestId).toStrictEqual({ enabled: false })
    expect(resolved.requestLogging).toStrictEqual({ enabled: false })
  })

  it("generates UUIDv7 request ids by default", () => {
    const resolved = resolveOptions(base)
    if (!resolved.requestId.enabled) throw new Error("expected request ids to be enabled")

    expect(resolved.requestId.generate()).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
    )
  })
})
