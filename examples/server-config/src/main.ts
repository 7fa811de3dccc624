import { createPinoLogger } from "@keyfill/logger"
import { run } from "./server/run"

run().catch((err: unknown) => {
  createPinoLogger().fatal("server failed to start", { err })
  process.exitCode = 1
})
