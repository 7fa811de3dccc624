import type { Context } from "hono"
import type { AppConfig } from "../config/load-app-config"

/**
 * Lists the resolved configuration, secrets masked, and which source
 * supplied each field.
 */
export function configHandler({ config, entries }: AppConfig) {
  const provenance = Object.fromEntries(
    config.keys().map((name) => [name, config.explain(name)]),
  )

  return (c: Context) => c.json({ entries, provenance, sources: config.sourcesUsed() })
}
