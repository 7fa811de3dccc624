import { found, type LookupResult, type LookupSource, notFound } from "../../ports/source"

/**
 * In-memory key-value source, typically last in the list to supply
 * defaults.
 *
 * @example
 * ```ts
 * const defaults = new MapSource({ PORT: "8080", LOG_LEVEL: "info" })
 * ```
 */
export class MapSource implements LookupSource {
  private readonly entries: Readonly<Record<string, string>>

  constructor(
    entries: Readonly<Record<string, string>>,
    readonly name: string = "defaults",
  ) {
    this.entries = { ...entries }
  }

  async lookup(key: string): Promise<LookupResult> {
    if (!Object.hasOwn(this.entries, key)) return notFound()

    return found(this.entries[key] ?? "")
  }
}
