import { isLogLevelName, type LogLevelName } from "@keyfill/logger"
import { defineRecord, field, type RecordOf, tokenScanner } from "@keyfill/lookup"

const logLevel = tokenScanner((token): LogLevelName => {
  if (!isLogLevelName(token)) {
    throw new SyntaxError(`unknown log level "${token}"`)
  }
  return token
})

export const serverConfigFields = {
  serviceName: field.string({ lookup: "SERVICE_NAME" }),
  host: field.string({ lookup: "SERVER_HOST" }),
  port: field.uint16({ lookup: "SERVER_PORT" }),

  logLevel: field.custom(logLevel, {
    zero: (): LogLevelName => "info",
    tags: { lookup: "LOG_LEVEL" },
  }),
  logPretty: field.bool({ lookup: "LOG_PRETTY,optional" }),

  apiToken: field.string({ lookup: "API_TOKEN,optional" }),
  maxImagePixels: field.uint32({ lookup: "MAX_IMAGE_PIXELS" }),
}

export type ServerConfigFields = typeof serverConfigFields

export const ServerConfig = defineRecord(serverConfigFields, { name: "server-config" })

export type ServerConfig = RecordOf<typeof ServerConfig>

/** Lowest-priority values, used when no other source has the key. */
export const serverDefaults: Readonly<Record<string, string>> = {
  SERVICE_NAME: "Image Resize Service",
  SERVER_HOST: "0.0.0.0",
  SERVER_PORT: "4663",
  LOG_LEVEL: "info",
  MAX_IMAGE_PIXELS: "40_000_000",
}

export const ResizeParams = defineRecord(
  {
    width: field.uint16({ json: "width" }),
    height: field.uint16({ json: "height" }),
    quality: field.uint8({ json: "quality,omitempty" }),
    crop: field.bool({ lookup: "crop,optional" }),
  },
  { name: "resize-params" },
)

export type ResizeParams = RecordOf<typeof ResizeParams>
