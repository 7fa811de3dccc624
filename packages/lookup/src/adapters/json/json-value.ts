import { z } from "zod"
import { SourceUnavailableError } from "../../errors/errors"
import { found, type LookupResult, notFound } from "../../ports/source"

export const jsonObjectSchema = z.record(z.string(), z.unknown())

export type JsonObject = z.infer<typeof jsonObjectSchema>

/**
 * Checks that a parsed JSON document is an object at the top level.
 */
export function parseJsonObject(source: string, document: unknown): JsonObject {
  const result = jsonObjectSchema.safeParse(document)

  if (!result.success) {
    throw new SourceUnavailableError(
      source,
      `expected a JSON object\n${z.prettifyError(result.error)}`,
      result.error,
    )
  }

  return result.data
}

/**
 * Renders one member of a JSON object as a lookup result.
 *
 * Strings are returned verbatim, other scalars through `String`, arrays and
 * objects as compact JSON. `null` counts as absent. Integers outside the
 * safe range were already rounded by the parser and fail the lookup.
 */
export function lookupJsonMember(source: string, data: JsonObject, key: string): LookupResult {
  if (!Object.hasOwn(data, key)) return notFound()

  const value = data[key]

  if (value === null || value === undefined) return notFound()
  if (typeof value === "string") return found(value)
  if (typeof value === "object") return found(JSON.stringify(value))
  if (typeof value === "number" && Number.isInteger(value) && !Number.isSafeInteger(value)) {
    throw new SourceUnavailableError(
      source,
      `member "${key}" is an integer beyond ${Number.MAX_SAFE_INTEGER} and lost precision when parsed`,
    )
  }

  return found(String(value))
}
