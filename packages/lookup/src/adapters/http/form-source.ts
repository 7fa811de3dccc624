import type { HonoRequest } from "hono"
import { SourceUnavailableError } from "../../errors/errors"
import { describeCause } from "../../errors/lookup-error"
import { found, type LookupResult, type LookupSource, notFound } from "../../ports/source"

/**
 * Reads keys from a request's form: url-encoded or multipart body fields
 * first, then query parameters.
 *
 * The first non-empty value of a key wins. A key that is present with only
 * empty values reads as `"1"`, so `?verbose` sets a bool field. Uploaded
 * files are ignored.
 */
export class FormSource implements LookupSource {
  readonly name = "form"
  private form?: Promise<Map<string, string[]>>

  constructor(private readonly req: HonoRequest) {}

  async lookup(key: string): Promise<LookupResult> {
    this.form ??= this.parse()

    const values = (await this.form).get(key)
    if (!values) return notFound()

    return found(values.find((value) => value !== "") ?? "1")
  }

  private async parse(): Promise<Map<string, string[]>> {
    const body = await this.req.parseBody({ all: true }).catch((err: unknown) => {
      throw new SourceUnavailableError(this.name, describeCause(err), err)
    })
    const form = new Map<string, string[]>()

    for (const [key, value] of Object.entries(body)) {
      const texts = (Array.isArray(value) ? value : [value]).filter(
        (item): item is string => typeof item === "string",
      )
      if (texts.length > 0) form.set(key, texts)
    }

    for (const [key, values] of Object.entries(this.req.queries())) {
      form.set(key, [...(form.get(key) ?? []), ...values])
    }

    return form
  }
}
