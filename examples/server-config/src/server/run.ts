import { serve } from "@hono/node-server"
import { createPinoLogger } from "@keyfill/logger"
import { loadAppConfig } from "../app/config/load-app-config"
import { createApp } from "../app/create-app"

export async function run(): Promise<void> {
  const bootLogger = createPinoLogger({}, { level: "info" }, { module: "boot" })
  const loaded = await loadAppConfig({ logger: bootLogger })
  const { serviceName, host, port, logLevel, logPretty } = loaded.config.value

  const logger = createPinoLogger({}, { level: logLevel, prettify: logPretty }, { service: serviceName })

  if (loaded.extraArgs.length > 0) {
    logger.warn(`ignoring arguments: ${loaded.extraArgs.join(" ")}`)
  }

  const app = createApp({ config: loaded, logger })

  serve({ fetch: app.fetch, port, hostname: host })

  logger.info(`Server listening on http://${host}:${port}`)
}
