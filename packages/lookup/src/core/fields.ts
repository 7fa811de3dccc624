import type { FieldScanner } from "../ports/scanner"
import { Complex } from "./complex"

export type SignedIntKind = "int" | "int8" | "int16" | "int32"
export type UnsignedIntKind = "uint" | "uint8" | "uint16" | "uint32"
export type BigIntKind = "int64" | "uint64"
export type IntegerKind = SignedIntKind | UnsignedIntKind | BigIntKind
export type FloatKind = "float32" | "float64"
export type ComplexKind = "complex64" | "complex128"

export type PrimitiveKind = "string" | "bytes" | "bool" | IntegerKind | FloatKind | ComplexKind

export type FieldKind = PrimitiveKind | "custom"

/**
 * Native value of each built-in kind.
 *
 * `int` and `uint` are bounded by the safe-integer range; 64-bit kinds are
 * bigints.
 */
export type PrimitiveValues = {
  string: string
  bytes: Uint8Array
  bool: boolean
  int: number
  int8: number
  int16: number
  int32: number
  int64: bigint
  uint: number
  uint8: number
  uint16: number
  uint32: number
  uint64: bigint
  float32: number
  float64: number
  complex64: Complex
  complex128: Complex
}

/**
 * The two tag systems a field can carry, in priority order.
 *
 * Each holds `"KEY"` or `"KEY,<marker>"`; the marker is `omitempty` for
 * `json` and `optional` for `lookup`.
 */
export type FieldTags = {
  readonly json?: string
  readonly lookup?: string
}

export type PrimitiveField<K extends PrimitiveKind = PrimitiveKind> = {
  readonly kind: K
  readonly tags: FieldTags
}

export type CustomField<T> = {
  readonly kind: "custom"
  readonly tags: FieldTags
  readonly scanner: FieldScanner<T>
  readonly zero: () => T
}

export type FieldDescriptor = PrimitiveField | CustomField<unknown>

export type FieldValue<F> =
  F extends CustomField<infer T>
    ? T
    : F extends PrimitiveField<infer K>
      ? PrimitiveValues[K]
      : never

function primitive<K extends PrimitiveKind>(kind: K) {
  return (tags: FieldTags = {}): PrimitiveField<K> => ({ kind, tags })
}

export type CustomFieldOptions<T> = {
  zero: () => T
  tags?: FieldTags
}

/**
 * Field descriptor builders.
 *
 * @example
 * ```ts
 * const Server = defineRecord({
 *   port: field.uint16({ lookup: "PORT" }),
 *   debug: field.bool({ lookup: "DEBUG,optional" }),
 *   host: field.string({ json: "HOST" }),
 * })
 * ```
 */
export const field = {
  string: primitive("string"),
  bytes: primitive("bytes"),
  bool: primitive("bool"),
  int: primitive("int"),
  int8: primitive("int8"),
  int16: primitive("int16"),
  int32: primitive("int32"),
  int64: primitive("int64"),
  uint: primitive("uint"),
  uint8: primitive("uint8"),
  uint16: primitive("uint16"),
  uint32: primitive("uint32"),
  uint64: primitive("uint64"),
  float32: primitive("float32"),
  float64: primitive("float64"),
  complex64: primitive("complex64"),
  complex128: primitive("complex128"),
  custom<T>(scanner: FieldScanner<T>, options: CustomFieldOptions<T>): CustomField<T> {
    return { kind: "custom", tags: options.tags ?? {}, scanner, zero: options.zero }
  },
}

export function zeroValue(descriptor: FieldDescriptor): unknown {
  switch (descriptor.kind) {
    case "custom":
      return descriptor.zero()
    case "string":
      return ""
    case "bytes":
      return new Uint8Array(0)
    case "bool":
      return false
    case "int64":
    case "uint64":
      return 0n
    case "complex64":
    case "complex128":
      return Complex.zero
    default:
      return 0
  }
}
