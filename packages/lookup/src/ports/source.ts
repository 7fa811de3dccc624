/**
 * Outcome of a single-key lookup.
 *
 * `found: false` with an empty value means the key is genuinely absent.
 * Failures are signalled by rejecting, not through this shape.
 */
export type LookupResult = {
  readonly value: string
  readonly found: boolean
}

/**
 * A source of configuration values, queried one key at a time.
 *
 * Sources are consulted in priority order; the first one that finds a key
 * wins. A source that parses its backing data (a file, a request body) does
 * so at most once per instance and must tolerate concurrent first use.
 */
export interface LookupSource {
  /**
   * Human-readable name for logs and provenance.
   * Example: "env", "args", "json:config.json", "defaults"
   */
  readonly name: string

  lookup(key: string): Promise<LookupResult>
}

const NOT_FOUND: LookupResult = Object.freeze({ value: "", found: false })

export function found(value: string): LookupResult {
  return { value, found: true }
}

export function notFound(): LookupResult {
  return NOT_FOUND
}
