import { InvalidSchemaError } from "../errors/errors"
import { type FieldDescriptor, type FieldValue, zeroValue } from "./fields"

export type FieldMap = Record<string, FieldDescriptor>

export type InferRecord<S extends FieldMap> = { [K in keyof S]: FieldValue<S[K]> }

export type NamedField = readonly [name: string, descriptor: FieldDescriptor]

/**
 * Ordered field list of one record type, built once and reused by every
 * lookup pass over records of that type.
 */
export interface RecordSchema<S extends FieldMap> {
  /** Schema name used in log entries. */
  readonly name: string
  /** Fields in declaration order. */
  readonly fields: readonly NamedField[]
  /** Allocates a record holding each field's zero value. */
  zero(): InferRecord<S>
}

/** Record type produced by a schema. */
export type RecordOf<R extends RecordSchema<FieldMap>> = ReturnType<R["zero"]>

const ARRAY_INDEX = /^(?:0|[1-9]\d*)$/

/**
 * Declares a record type from an object literal of field descriptors.
 *
 * Fields are resolved in the literal's property order. Array-index names
 * are rejected because JavaScript enumerates them first, ahead of the
 * declared order.
 */
export function defineRecord<S extends FieldMap>(
  fields: S,
  options: { name?: string } = {},
): RecordSchema<S> {
  const ordered: NamedField[] = []

  for (const [name, descriptor] of Object.entries(fields)) {
    if (ARRAY_INDEX.test(name)) {
      throw new InvalidSchemaError(name, "array-index names break declaration order")
    }
    if (descriptor.kind === "custom" && typeof descriptor.scanner?.scan !== "function") {
      throw new InvalidSchemaError(name, "custom fields need a scanner")
    }
    ordered.push([name, descriptor])
  }

  Object.freeze(ordered)

  return {
    name: options.name ?? "record",
    fields: ordered,
    zero() {
      const record: Record<string, unknown> = {}

      for (const [name, descriptor] of ordered) {
        record[name] = zeroValue(descriptor)
      }

      return record as InferRecord<S>
    },
  }
}
