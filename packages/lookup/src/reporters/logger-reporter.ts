import type { Logger } from "@keyfill/logger"
import { formatValue } from "../core/format-value"
import type { Reporter } from "../ports/reporter"

export type LoggerReporterOptions = {
  /** Default: "info" */
  level?: "trace" | "debug" | "info" | "warn"
  /** Default: "config entry" */
  message?: string
}

/**
 * Emits one structured log entry per reported field, with the key and the
 * value's text form.
 */
export class LoggerReporter implements Reporter {
  private readonly level: NonNullable<LoggerReporterOptions["level"]>
  private readonly message: string

  constructor(
    private readonly logger: Logger,
    { level = "info", message = "config entry" }: LoggerReporterOptions = {},
  ) {
    this.level = level
    this.message = message
  }

  report(key: string, value: unknown): void {
    this.logger[this.level](this.message, { key, value: formatValue(value) })
  }
}
