import { found, type LookupResult, type LookupSource, notFound } from "../../ports/source"

export type EnvSourceOptions = {
  /** Prepended to every key before it is read. */
  prefix?: string
  env?: Record<string, string | undefined>
}

/**
 * Reads keys from environment variables.
 *
 * A variable that is set to the empty string counts as found.
 */
export class EnvSource implements LookupSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
  }

  async lookup(key: string): Promise<LookupResult> {
    const name = this.prefix + key
    if (!Object.hasOwn(this.env, name)) return notFound()

    const value = this.env[name]

    return typeof value === "string" ? found(value) : notFound()
  }
}
