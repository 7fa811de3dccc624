import type { HonoRequest } from "hono"
import { SourceUnavailableError } from "../../errors/errors"
import { describeCause } from "../../errors/lookup-error"
import type { LookupResult, LookupSource } from "../../ports/source"
import { type JsonObject, lookupJsonMember, parseJsonObject } from "../json/json-value"

/**
 * Reads keys from the top-level members of a JSON request body.
 *
 * The body is parsed on first lookup and only once per instance.
 *
 * @example
 * ```ts
 * app.post("/jobs", async (c) => {
 *   const job = await loadRecord({ schema: Job, sources: [new JsonRequestSource(c.req)] })
 *   return c.json(job.value)
 * })
 * ```
 */
export class JsonRequestSource implements LookupSource {
  readonly name = "json:body"
  private document?: Promise<JsonObject>

  constructor(private readonly req: HonoRequest) {}

  async lookup(key: string): Promise<LookupResult> {
    this.document ??= this.read()

    return lookupJsonMember(this.name, await this.document, key)
  }

  private async read(): Promise<JsonObject> {
    let document: unknown
    try {
      document = await this.req.json<unknown>()
    } catch (err) {
      throw new SourceUnavailableError(this.name, describeCause(err), err)
    }

    return parseJsonObject(this.name, document)
  }
}
