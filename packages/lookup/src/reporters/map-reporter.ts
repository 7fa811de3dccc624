import { formatValue } from "../core/format-value"
import type { Reporter } from "../ports/reporter"

/**
 * Collects the text form of each entry by key. A later report of the same
 * key replaces the earlier one.
 *
 * The collected entries have the shape `MapSource` takes, so a resolved
 * configuration can be replayed as defaults.
 */
export class MapReporter implements Reporter {
  private readonly collected = new Map<string, string>()

  report(key: string, value: unknown): void {
    this.collected.set(key, formatValue(value))
  }

  get(key: string): string | undefined {
    return this.collected.get(key)
  }

  entries(): Record<string, string> {
    return Object.fromEntries(this.collected)
  }
}
