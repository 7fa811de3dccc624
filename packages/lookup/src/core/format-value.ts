/**
 * Text form of a field value as reporters print it.
 *
 * Byte arrays print as their space-separated decimal octets in brackets;
 * complex values print through `Complex#toString`.
 */
export function formatValue(value: unknown): string {
  if (value === null || value === undefined) return ""
  if (value instanceof Uint8Array) return `[${value.join(" ")}]`

  return String(value)
}
