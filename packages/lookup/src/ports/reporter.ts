/**
 * Observer notified once per field that reaches a terminal state: the
 * converted value after the field is set, or the raw lookup value when an
 * optional field is missing.
 *
 * Reporting is fire-and-forget; implementations must not throw.
 */
export interface Reporter {
  report(key: string, value: unknown): void
}
