import { formatValue } from "../core/format-value"
import type { Reporter } from "../ports/reporter"

export const EMPTY_SECRET = "(empty)"
export const SET_SECRET = "(not empty)"

/**
 * Hides the values of keys matching `pattern` from the wrapped reporter.
 *
 * Matching keys are forwarded as `"(empty)"` or `"(not empty)"`; every other
 * value is forwarded in its text form.
 *
 * @example
 * ```ts
 * new FilterSecretsReporter(new FmtReporter({ writer: process.stdout }), /SECRET|TOKEN|PASSWORD/)
 * ```
 */
export class FilterSecretsReporter implements Reporter {
  private readonly pattern: RegExp

  constructor(
    private readonly reporter: Reporter,
    pattern: RegExp,
  ) {
    // global and sticky patterns keep lastIndex between test() calls
    this.pattern = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""))
  }

  report(key: string, value: unknown): void {
    const text = formatValue(value)

    if (!this.pattern.test(key)) {
      this.reporter.report(key, text)
      return
    }

    this.reporter.report(key, text === "" ? EMPTY_SECRET : SET_SECRET)
  }
}
