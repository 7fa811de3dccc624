import type { Reporter } from "../ports/reporter"

/**
 * Forwards each entry to every wrapped reporter, in the order given.
 */
export class DupReporter implements Reporter {
  private readonly reporters: readonly Reporter[]

  constructor(...reporters: Reporter[]) {
    this.reporters = reporters
  }

  report(key: string, value: unknown): void {
    for (const reporter of this.reporters) {
      reporter.report(key, value)
    }
  }
}
