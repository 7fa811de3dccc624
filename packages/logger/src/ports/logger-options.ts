import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * Adapters must honor these options but choose how to implement them.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit. Entries below it are dropped.
   */
  level: LogLevelName

  /**
   * Render entries for humans instead of as JSON lines.
   *
   * Meant for local development only.
   */
  prettify?: boolean
}
