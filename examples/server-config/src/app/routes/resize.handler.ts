import type { Logger } from "@keyfill/logger"
import {
  FormSource,
  JsonRequestSource,
  type LookupSource,
  loadRecord,
  MapSource,
} from "@keyfill/lookup"
import type { Context } from "hono"
import { ResizeParams, type ServerConfig } from "../config/schema"

const resizeDefaults = new MapSource({ quality: "80" })

function requestSources(c: Context): LookupSource[] {
  const contentType = c.req.header("content-type") ?? ""

  if (contentType.startsWith("application/json")) {
    return [new JsonRequestSource(c.req), new FormSource(c.req), resizeDefaults]
  }

  return [new FormSource(c.req), resizeDefaults]
}

/**
 * Validates resize parameters from the query string, a form or a JSON body
 * and echoes the resolved job.
 */
export function resizeHandler(config: Readonly<ServerConfig>, logger: Logger) {
  return async (c: Context) => {
    const params = await loadRecord({
      schema: ResizeParams,
      sources: requestSources(c),
      logger,
    })
    const { width, height, quality, crop } = params.value
    const pixels = width * height

    if (pixels > config.maxImagePixels) {
      return c.json(
        { error: "image_too_large", message: `${pixels} pixels exceeds ${config.maxImagePixels}` },
        422,
      )
    }

    return c.json({ width, height, quality, crop, pixels })
  }
}
