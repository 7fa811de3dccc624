export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric log severity levels, matching pino's numbering.
 *
 * Higher is more severe.
 */
export const LogLevels = {
  Trace: 10,
  Debug: 20,
  Info: 30,
  Warn: 40,
  Error: 50,
  Fatal: 60,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]

const levelNameSet: ReadonlySet<string> = new Set(logLevelNames)

export function isLogLevelName(value: string): value is LogLevelName {
  return levelNameSet.has(value)
}
