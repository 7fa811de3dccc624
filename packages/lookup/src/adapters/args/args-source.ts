import { found, type LookupResult, type LookupSource, notFound } from "../../ports/source"

export type ArgsSourceOptions = {
  /**
   * Marks an argument as a key assignment.
   *
   * @example "-", "--env-", ""
   */
  prefix: string
  /** Default: `process.argv.slice(2)` */
  args?: readonly string[]
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

/**
 * Reads keys from command-line arguments of the form `<prefix><KEY>=<value>`.
 *
 * `<prefix><KEY>` on its own reads as `"1"`, which converts to `true` or `1`.
 * When a key is given more than once the last value wins. Arguments that do
 * not match are kept for the program in `extraArgs()`.
 *
 * @example
 * ```ts
 * const args = new ArgsSource({ prefix: "--", args: ["--PORT=9000", "--VERBOSE", "serve"] })
 * await args.lookup("PORT") // { value: "9000", found: true }
 * args.extraArgs() // ["serve"]
 * ```
 */
export class ArgsSource implements LookupSource {
  readonly name = "args"
  private readonly values = new Map<string, string>()
  private readonly extra: string[] = []

  constructor({ prefix, args = process.argv.slice(2) }: ArgsSourceOptions) {
    const assignment = new RegExp(`^${escapeRegExp(prefix)}([^=]*)(?:(=)(.*))?$`)

    for (const arg of args) {
      const match = assignment.exec(arg)

      if (!match) {
        this.extra.push(arg)
        continue
      }

      const [, key = "", equals, value = ""] = match
      this.values.set(key, equals === undefined ? "1" : value)
    }
  }

  /** Arguments that are not key assignments, in their original order. */
  extraArgs(): string[] {
    return [...this.extra]
  }

  async lookup(key: string): Promise<LookupResult> {
    const value = this.values.get(key)

    return value === undefined ? notFound() : found(value)
  }
}
