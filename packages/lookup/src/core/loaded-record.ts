import type { FieldOutcome } from "./lookup"
import type { FieldMap, InferRecord } from "./record-schema"

/**
 * A record resolved by `loadRecord`, together with where each field came
 * from.
 */
export class LoadedRecord<S extends FieldMap> {
  private readonly provenance: ReadonlyMap<string, FieldOutcome>

  constructor(
    private readonly data: Readonly<InferRecord<S>>,
    outcomes: readonly FieldOutcome[],
  ) {
    Object.freeze(this.data)
    this.provenance = new Map(outcomes.map((outcome) => [outcome.field, outcome]))
  }

  get value(): Readonly<InferRecord<S>> {
    return this.data
  }

  keys(): (keyof S & string)[] {
    return Object.keys(this.data) as Array<keyof S & string>
  }

  /**
   * Name of the source that supplied `field`, `"missing"` for an optional
   * field no source had, or `"untagged"` for a field lookup never reads.
   */
  explain(field: keyof S & string): string {
    const outcome = this.provenance.get(field)

    if (!outcome) return "untagged"
    if (outcome.status === "missing") return "missing"

    return outcome.source ?? "missing"
  }

  outcomes(): FieldOutcome[] {
    return [...this.provenance.values()]
  }

  sourcesUsed(): string[] {
    const sources: string[] = []

    for (const outcome of this.provenance.values()) {
      if (outcome.status === "set" && outcome.source !== undefined) {
        sources.push(outcome.source)
      }
    }

    return [...new Set(sources)]
  }
}
