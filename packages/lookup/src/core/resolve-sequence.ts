import { createNullLogger, type Logger } from "@keyfill/logger"
import type { LookupSource } from "../ports/source"

export type SequenceResult =
  | { readonly status: "found"; readonly value: string; readonly source: string }
  | { readonly status: "absent"; readonly value: string; readonly source?: string }
  | { readonly status: "failed"; readonly error: unknown; readonly source: string }

const EMPTY_SEQUENCE: SequenceResult = Object.freeze({ status: "absent", value: "" })

/**
 * Looks `key` up in each source in priority order and returns the first hit.
 *
 * A source that fails is passed over in favor of the next one. When no
 * source has the key, the last source's outcome is returned as-is, so a
 * failure of the final source surfaces while earlier failures do not.
 */
export async function resolveKey(
  key: string,
  sources: readonly LookupSource[],
  logger: Logger = createNullLogger(),
): Promise<SequenceResult> {
  let last: SequenceResult = EMPTY_SEQUENCE

  for (const source of sources) {
    try {
      const result = await source.lookup(key)

      if (result.found) {
        return { status: "found", value: result.value, source: source.name }
      }

      last = { status: "absent", value: result.value, source: source.name }
    } catch (err) {
      logger.debug("source failed, trying next", { key, source: source.name, err })
      last = { status: "failed", error: err, source: source.name }
    }
  }

  return last
}
