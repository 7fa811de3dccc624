import { createNullLogger, type Logger } from "@keyfill/logger"
import {
  InvalidRecordArgumentError,
  MissingRequiredFieldError,
  SourceLookupFailedError,
  TypeCoercionFailedError,
} from "../errors/errors"
import type { Reporter } from "../ports/reporter"
import { discardReporter } from "../reporters/discard-reporter"
import type { LookupSource } from "../ports/source"
import { coerce } from "./coerce"
import { extractFieldMetadata } from "./field-metadata"
import type { FieldMap, InferRecord, RecordSchema } from "./record-schema"
import { resolveKey } from "./resolve-sequence"

export type FieldStatus = "set" | "missing"

export type FieldOutcome = {
  readonly field: string
  readonly key: string
  readonly status: FieldStatus
  /** Source that supplied the value. Absent for a missing field with no sources. */
  readonly source?: string
}

export type LookupOptions<S extends FieldMap> = {
  schema: RecordSchema<S>
  /** Sources in priority order; the first that has a key wins. */
  sources: readonly LookupSource[]
  reporter?: Reporter
  logger?: Logger
}

/**
 * Fills the tagged fields of `target` from `sources`, one field at a time in
 * declaration order.
 *
 * Resolves to the outcome of every tagged field. Rejects on the first field
 * that cannot be resolved; fields assigned before that keep their new
 * values.
 *
 * @example
 * ```ts
 * const Server = defineRecord({
 *   port: field.uint16({ lookup: "PORT" }),
 *   debug: field.bool({ lookup: "DEBUG,optional" }),
 * })
 *
 * const config = Server.zero()
 * await lookup(config, {
 *   schema: Server,
 *   sources: [new EnvSource(), new MapSource({ PORT: "8080" })],
 * })
 * ```
 */
export async function lookup<S extends FieldMap>(
  target: InferRecord<S> | null | undefined,
  { schema, sources, reporter = discardReporter, logger = createNullLogger() }: LookupOptions<S>,
): Promise<FieldOutcome[]> {
  const record = assertAssignable(target, schema)
  const log = logger.child({ module: "lookup", record: schema.name })
  const outcomes: FieldOutcome[] = []

  for (const [name, descriptor] of schema.fields) {
    const metadata = extractFieldMetadata(name, descriptor.tags)

    if (!metadata) {
      log.trace("field has no lookup tag, skipping", { field: name })
      continue
    }

    const { key, optional } = metadata
    const result = await resolveKey(key, sources, log)

    if (result.status === "failed") {
      throw new SourceLookupFailedError({
        field: name,
        key,
        source: result.source,
        cause: result.error,
      })
    }

    if (result.status === "absent") {
      if (!optional) {
        throw new MissingRequiredFieldError({ field: name, key })
      }

      log.debug("optional field missing", { field: name, key, status: "missing" })
      reporter.report(key, result.value)
      outcomes.push({
        field: name,
        key,
        status: "missing",
        ...(result.source !== undefined && { source: result.source }),
      })
      continue
    }

    let value: unknown
    try {
      value = coerce(result.value, descriptor)
    } catch (err) {
      throw new TypeCoercionFailedError({
        field: name,
        key,
        value: result.value,
        kind: descriptor.kind,
        cause: err,
      })
    }

    if (!Reflect.set(record, name, value)) {
      throw new InvalidRecordArgumentError(`field "${name}" cannot be assigned`)
    }

    log.debug("field set", { field: name, key, source: result.source, status: "set" })
    reporter.report(key, value)
    outcomes.push({ field: name, key, status: "set", source: result.source })
  }

  log.debug("lookup complete", { count: outcomes.length })

  return outcomes
}

function assertAssignable<S extends FieldMap>(
  target: InferRecord<S> | null | undefined,
  schema: RecordSchema<S>,
): InferRecord<S> {
  if (target === null || target === undefined) {
    throw new InvalidRecordArgumentError(`got ${String(target)}`)
  }
  if (typeof target !== "object") {
    throw new InvalidRecordArgumentError(`got ${typeof target}`)
  }
  if (Object.isFrozen(target)) {
    throw new InvalidRecordArgumentError("record is frozen")
  }

  for (const [name, descriptor] of schema.fields) {
    if (!extractFieldMetadata(name, descriptor.tags)) continue

    const property = Object.getOwnPropertyDescriptor(target, name)
    const assignable = property
      ? property.writable === true || property.set !== undefined
      : Object.isExtensible(target)

    if (!assignable) {
      throw new InvalidRecordArgumentError(`field "${name}" cannot be assigned`)
    }
  }

  return target
}
