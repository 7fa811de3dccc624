import { LookupError, type LookupErrorCode } from "./lookup-error"

/**
 * Type guard for errors raised by keyfill, optionally narrowed to one code.
 *
 * @example
 * ```ts
 * try {
 *   await lookup(config, { schema, sources })
 * } catch (err) {
 *   if (isLookupError(err, "missing_required_field")) {
 *     console.error(`set ${err.context.key}`)
 *   }
 * }
 * ```
 */
export function isLookupError<C extends LookupErrorCode>(
  err: unknown,
  code?: C,
): err is LookupError<C> {
  if (!(err instanceof LookupError)) return false

  return code === undefined || err.code === code
}
