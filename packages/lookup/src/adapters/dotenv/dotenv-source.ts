import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import { SourceUnavailableError } from "../../errors/errors"
import { describeCause } from "../../errors/lookup-error"
import { found, type LookupResult, type LookupSource, notFound } from "../../ports/source"

/**
 * Options for creating a dotenv source.
 */
export type DotenvSourceOptions = {
  /**
   * Path to the .env file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example ".env", ".env.production", "./config/.env.defaults"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: Every lookup fails if the file is not found.
   * - `false`: A missing file has no keys.
   */
  required: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

export class DotenvSource implements LookupSource {
  readonly name: string
  private entries?: Promise<Record<string, string>>

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async lookup(key: string): Promise<LookupResult> {
    this.entries ??= this.read()

    const entries = await this.entries

    return Object.hasOwn(entries, key) ? found(entries[key] ?? "") : notFound()
  }

  private async read(): Promise<Record<string, string>> {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)

    try {
      const content = await fs.readFile(filePath, "utf-8")

      return parse(content)
    } catch (err) {
      if (!this.opts.required && isNotFound(err)) {
        return {}
      }
      throw new SourceUnavailableError(this.name, describeCause(err), err)
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
