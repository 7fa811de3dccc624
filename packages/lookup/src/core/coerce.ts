import { Complex } from "./complex"
import type { ComplexKind, FieldDescriptor, FloatKind, IntegerKind } from "./fields"
import { scanLine, tokenScanner } from "./scan"

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER)

const INTEGER_RANGES: Record<IntegerKind, readonly [min: bigint, max: bigint]> = {
  int: [-MAX_SAFE, MAX_SAFE],
  int8: [-128n, 127n],
  int16: [-32768n, 32767n],
  int32: [-2147483648n, 2147483647n],
  int64: [-9223372036854775808n, 9223372036854775807n],
  uint: [0n, MAX_SAFE],
  uint8: [0n, 255n],
  uint16: [0n, 65535n],
  uint32: [0n, 4294967295n],
  uint64: [0n, 18446744073709551615n],
}

// Integer literal bodies after the sign: hex, binary, octal, legacy
// leading-zero octal, decimal. `_` may only separate digits.
const INTEGER_BODIES = [
  /^0[xX](?:_?[0-9a-fA-F])+$/,
  /^0[bB](?:_?[01])+$/,
  /^0[oO](?:_?[0-7])+$/,
  /^0(?:_?[0-7])*$/,
  /^[1-9](?:_?\d)*$/,
]
const LEGACY_OCTAL = /^0[0-7]+$/

const DIGITS = String.raw`\d(?:_?\d)*`
const FLOAT_LITERAL = new RegExp(
  `^[+-]?(?:${DIGITS}(?:\\.(?:${DIGITS})?)?|\\.${DIGITS})(?:[eE][+-]?${DIGITS})?$`,
)
const FLOAT_SPECIAL = /^([+-]?)(inf|nan)$/i

const BASE64_RAW = /^[A-Za-z0-9+/]*$/
const LINE_BREAKS = /[\r\n]/g

const TRUE_LITERALS = new Set(["1", "t", "true"])
const FALSE_LITERALS = new Set(["0", "f", "false"])

const readToken = tokenScanner((token) => token)

/**
 * Converts a raw lookup value into the native value of `descriptor`'s kind.
 *
 * @throws SyntaxError when `raw` is not a valid literal for the kind.
 * @throws RangeError when the literal does not fit the kind's width.
 */
export function coerce(raw: string, descriptor: FieldDescriptor): unknown {
  switch (descriptor.kind) {
    case "string":
      return raw
    case "bytes":
      return decodeBase64(raw)
    case "complex64":
    case "complex128":
      return parseComplex(raw, descriptor.kind)
    case "custom":
      return scanLine(raw, descriptor.scanner)
    case "bool":
      return parseBool(scanLine(raw, readToken))
    case "float32":
    case "float64":
      return parseFloatLiteral(scanLine(raw, readToken), descriptor.kind)
    default:
      return parseInteger(scanLine(raw, readToken), descriptor.kind)
  }
}

function parseBool(token: string): boolean {
  const literal = token.toLowerCase()

  if (TRUE_LITERALS.has(literal)) return true
  if (FALSE_LITERALS.has(literal)) return false

  throw new SyntaxError(`invalid boolean ${JSON.stringify(token)}`)
}

function parseInteger(token: string, kind: IntegerKind): number | bigint {
  const [min, max] = INTEGER_RANGES[kind]
  const signed = min < 0n

  let negative = false
  let body = token

  if (signed && (token.startsWith("-") || token.startsWith("+"))) {
    negative = token.startsWith("-")
    body = token.slice(1)
  }

  if (!INTEGER_BODIES.some((pattern) => pattern.test(body))) {
    throw new SyntaxError(`invalid integer ${JSON.stringify(token)}`)
  }

  const digits = body.replaceAll("_", "")
  const magnitude = LEGACY_OCTAL.test(digits) ? BigInt(`0o${digits.slice(1)}`) : BigInt(digits)
  const value = negative ? -magnitude : magnitude

  if (value < min || value > max) {
    throw new RangeError(`${token} is out of range for ${kind}`)
  }

  return kind === "int64" || kind === "uint64" ? value : Number(value)
}

function parseFloatLiteral(token: string, kind: FloatKind): number {
  const special = FLOAT_SPECIAL.exec(token)

  if (special) {
    if (special[2]?.toLowerCase() === "nan") return Number.NaN

    return special[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY
  }

  if (!FLOAT_LITERAL.test(token)) {
    throw new SyntaxError(`invalid floating-point number ${JSON.stringify(token)}`)
  }

  const value = Number(token.replaceAll("_", ""))

  if (!Number.isFinite(value) || (kind === "float32" && !Number.isFinite(Math.fround(value)))) {
    throw new RangeError(`${token} is out of range for ${kind}`)
  }

  return value
}

function parseComplex(raw: string, kind: ComplexKind): Complex {
  const parts = raw.split(",")

  if (parts.length < 2) {
    throw new SyntaxError("expected real and imaginary parts separated by a comma")
  }

  const [real = "", imag = ""] = parts
  const component = kind === "complex64" ? "float32" : "float64"

  return new Complex(
    parseFloatLiteral(real.trim(), component),
    parseFloatLiteral(imag.trim(), component),
  )
}

/**
 * Decodes unpadded standard base64. Line breaks are ignored.
 */
function decodeBase64(raw: string): Uint8Array {
  const data = raw.replace(LINE_BREAKS, "")

  if (!BASE64_RAW.test(data) || data.length % 4 === 1) {
    throw new SyntaxError("illegal base64 data")
  }

  return Uint8Array.from(Buffer.from(data, "base64"))
}
