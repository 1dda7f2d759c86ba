import { createNullLogger } from "@catalog/logger"
import { createDefaultMiddleware } from "../create-default-middleware"

describe("createDefaultMiddleware", () => {
  const logger = createNullLogger()

  it("includes request id, logger and request logging by default", () => {
    const middleware = createDefaultMiddleware(
      {
        requestId: { enabled: true, header: "x-request-id", generate: () => "id" },
        requestLogging: { enabled: true, level: "info", ignorePaths: [] },
      },
      logger,
    )

    expect(middleware).toHaveLength(3)
  })

  it("always binds the logger even when the rest is disabled", () => {
    const middleware = createDefaultMiddleware(
      { requestId: { enabled: false }, requestLogging: { enabled: false } },
      logger,
    )

    expect(middleware).toHaveLength(1)
  })
})
