import { LoadedRecord } from "./loaded-record"
import { lookup, type LookupOptions } from "./lookup"
import type { FieldMap } from "./record-schema"

export type LoadRecordOptions<S extends FieldMap> = LookupOptions<S>

/**
 * Allocates a zero-valued record of `schema`, resolves it from `sources`
 * and returns it frozen along with its provenance.
 */
export async function loadRecord<S extends FieldMap>(
  options: LoadRecordOptions<S>,
): Promise<LoadedRecord<S>> {
  const record = options.schema.zero()
  const outcomes = await lookup(record, options)

  return new LoadedRecord<S>(record, outcomes)
}
