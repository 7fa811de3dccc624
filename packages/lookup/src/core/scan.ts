import type { FieldScanner, ScanResult } from "../ports/scanner"

const BLANKS = /^[^\S\r\n]*/
const TOKEN = /^[^\s]+/

/**
 * Length of the run of blanks (whitespace other than line breaks) at the
 * start of `input`.
 */
export function blankPrefixLength(input: string): number {
  return BLANKS.exec(input)?.[0].length ?? 0
}

/**
 * Checks that only blanks separate `rest` from the end of the line.
 */
export function expectLineEnd(rest: string): void {
  const tail = rest.slice(blankPrefixLength(rest))

  if (tail !== "" && !tail.startsWith("\n") && !tail.startsWith("\r")) {
    throw new SyntaxError("expected newline")
  }
}

/**
 * Runs `scanner` over the first line of `raw`, the way a single-operand
 * line scan does: leading blanks are skipped, the scanner must consume
 * something, and nothing but blanks may follow before the line ends.
 */
export function scanLine<T>(raw: string, scanner: FieldScanner<T>): T {
  const input = raw.slice(blankPrefixLength(raw))

  if (input === "" || input.startsWith("\n") || input.startsWith("\r")) {
    throw new SyntaxError("unexpected newline")
  }

  const { value, consumed } = scanner.scan(input)

  if (!Number.isInteger(consumed) || consumed <= 0) {
    throw new SyntaxError("scan consumed no input")
  }
  if (consumed > input.length) {
    throw new RangeError("scan consumed more than its input")
  }

  expectLineEnd(input.slice(consumed))

  return value
}

/**
 * Builds a scanner that reads one whitespace-delimited token and hands it
 * to `parse`.
 *
 * @example
 * ```ts
 * const url = field.custom(tokenScanner((token) => new URL(token)), {
 *   zero: () => new URL("http://localhost"),
 *   tags: { lookup: "UPSTREAM_URL" },
 * })
 * ```
 */
export function tokenScanner<T>(parse: (token: string) => T): FieldScanner<T> {
  return {
    scan(input: string): ScanResult<T> {
      const token = TOKEN.exec(input)?.[0] ?? ""

      if (token === "") {
        throw new SyntaxError("expected a token")
      }

      return { value: parse(token), consumed: token.length }
    },
  }
}
