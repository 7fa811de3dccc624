import type { Logger } from "@keyfill/logger"
import { isLookupError } from "@keyfill/lookup"
import { Hono } from "hono"
import type { AppConfig } from "./config/load-app-config"
import { configHandler } from "./routes/config.handler"
import { resizeHandler } from "./routes/resize.handler"

export type AppDeps = {
  config: AppConfig
  logger: Logger
}

export function createApp({ config, logger }: AppDeps): Hono {
  const app = new Hono()
  const resize = resizeHandler(config.config.value, logger)

  app.get("/health", (c) => c.json({ status: "ok" }))
  app.get("/config", configHandler(config))
  app.get("/resize", resize)
  app.post("/resize", resize)

  app.onError((err, c) => {
    if (isLookupError(err)) {
      logger.warn("rejected request parameters", { err })
      return c.json({ error: err.code, message: err.message }, 400)
    }

    logger.error("unhandled error", { err })
    return c.json({ error: "internal_error" }, 500)
  })

  return app
}
