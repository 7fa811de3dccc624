/**
 * Fields a lookup pass binds to its log entries.
 *
 * `record` names the schema being resolved, `field` and `key` the field in
 * progress and the key it was looked up under, `source` the source that
 * answered (or failed).
 */
export type LogContext = {
  service: string
  module: string

  record: string
  field: string
  key: string
  source: string
}

export type LogEvent = {
  err: unknown
  value: string
  status: string
  count: number
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
