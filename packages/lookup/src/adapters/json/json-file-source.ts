import fs from "node:fs/promises"
import path from "node:path"
import { SourceUnavailableError } from "../../errors/errors"
import { describeCause } from "../../errors/lookup-error"
import type { LookupResult, LookupSource } from "../../ports/source"
import { type JsonObject, lookupJsonMember, parseJsonObject } from "./json-value"

/**
 * Options for creating a JSON file source.
 */
export type JsonFileSourceOptions = {
  /**
   * Path to the JSON file.
   *
   * Can be absolute or relative to `cwd`.
   *
   * @example "config.json", "./config/app.json"
   */
  file: string

  /**
   * Whether the file must exist.
   *
   * - `true`: Every lookup fails if the file is not found.
   * - `false`: A missing file has no keys.
   *
   * @default true
   */
  required?: boolean

  /**
   * Base directory for resolving relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

/**
 * Reads keys from the top-level members of a JSON object file.
 *
 * The file is read on first lookup and only once per instance; a read or
 * parse failure is repeated on every later lookup.
 */
export class JsonFileSource implements LookupSource {
  readonly name: string
  private document?: Promise<JsonObject>

  constructor(private readonly opts: JsonFileSourceOptions) {
    this.name = `json:${opts.file}`
  }

  async lookup(key: string): Promise<LookupResult> {
    this.document ??= this.read()

    return lookupJsonMember(this.name, await this.document, key)
  }

  private async read(): Promise<JsonObject> {
    const cwd = this.opts.cwd ?? process.cwd()
    const filePath = path.resolve(cwd, this.opts.file)

    let content: string
    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (this.opts.required === false && isNotFound(err)) {
        return {}
      }
      throw new SourceUnavailableError(this.name, describeCause(err), err)
    }

    let document: unknown
    try {
      document = JSON.parse(content)
    } catch (err) {
      throw new SourceUnavailableError(this.name, describeCause(err), err)
    }

    return parseJsonObject(this.name, document)
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}
