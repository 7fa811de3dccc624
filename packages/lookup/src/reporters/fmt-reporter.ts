import { formatValue } from "../core/format-value"
import type { Reporter } from "../ports/reporter"

/** Anything text can be written to: a stream, a buffer, a test double. */
export type TextWriter = {
  write(chunk: string): unknown
}

export type FmtReporterOptions = {
  writer: TextWriter
  /** Prepended to every line. Default: "" */
  prefix?: string
}

/**
 * Writes one `<prefix><key>=<value>` line per entry.
 */
export class FmtReporter implements Reporter {
  private readonly writer: TextWriter
  private readonly prefix: string

  constructor({ writer, prefix = "" }: FmtReporterOptions) {
    this.writer = writer
    this.prefix = prefix
  }

  report(key: string, value: unknown): void {
    this.writer.write(`${this.prefix}${key}=${formatValue(value)}\n`)
  }
}
