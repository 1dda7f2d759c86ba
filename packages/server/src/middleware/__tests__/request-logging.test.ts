import type { Logger } from "@catalog/logger"
import { Hono } from "hono"
import { mock } from "vitest-mock-extended"
import type { Mock } from "../../tests/mock"
import { requestLoggerMiddleware } from "../request-logger"
import { requestLoggingMiddleware } from "../request-logging"

describe("requestLoggingMiddleware", () => {
  let logger: Mock<Logger>

  beforeEach(() => {
    logger = mock<Logger>()
  })

  function app(level: "info" | "debug" = "info"): Hono {
    const app = new Hono()

    app.use("*", async (c, next) => {
      c.set("requestId", "req-9")
      await next()
    })
    app.use(
      "*",
      requestLoggingMiddleware({ level, ignorePaths: ["/health"] }, logger),
    )
    app.get("/products/:id", (c) => c.json({ id: c.req.param("id") }))
    app.get("/broken", (c) => c.json({ ok: false }, 503))
    app.get("/health", (c) => c.json({ ok: true }))
    app.get("/health/deep", (c) => c.json({ ok: true }))

    return app
  }

  it("logs one line with the matched route", async () => {
    await app().request("/products/01ABC")

    expect(logger.info).toHaveBeenCalledExactlyOnceWith("Request completed", {
      requestId: "req-9",
      method: "GET",
      path: "/products/01ABC",
      route: "/products/:id",
      op: "GET /products/:id",
      status: 200,
      durationMs: expect.any(Number),
    })
  })

  it("uses the configured level", async () => {
    await app("debug").request("/products/01ABC")

    expect(logger.debug).toHaveBeenCalledOnce()
    expect(logger.info).not.toHaveBeenCalled()
  })

  it("logs 5xx at error", async () => {
    await app().request("/broken")

    expect(logger.error).toHaveBeenCalledWith(
      "Request completed",
      expect.objectContaining({ status: 503 }),
    )
  })

  it("skips ignored paths and their sub-paths", async () => {
    await app().request("/health")
    await app().request("/health/deep")

    expect(logger.info).not.toHaveBeenCalled()
  })

  it("includes the user agent when sent", async () => {
    await app().request("/products/1", { headers: { "user-agent": "curl/8" } })

    expect(logger.info).toHaveBeenCalledWith(
      "Request completed",
      expect.objectContaining({ userAgent: "curl/8" }),
    )
  })
})

describe("requestLoggerMiddleware", () => {
  it("binds a child logger carrying the request id", async () => {
    const child = mock<Logger>()
    const base = mock<Logger>()
    base.child.mockReturnValue(child)

    const app = new Hono()
    app.use("*", async (c, next) => {
      c.set("requestId", "req-7")
      await next()
    })
    app.use("*", requestLoggerMiddleware(base))
    app.get("/", (c) => {
      c.get("logger").info("handled")
      return c.text("ok")
    })

    await app.request("/")

    expect(base.child).toHaveBeenCalledExactlyOnceWith({ requestId: "req-7" })
    expect(child.info).toHaveBeenCalledWith("handled")
  })
})
