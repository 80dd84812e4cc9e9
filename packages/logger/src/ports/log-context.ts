/**
 * Fields carried by every log entry of a graph serialization run.
 */
export type LogContext = {
  runId: string
  /** Output section a cache writes to, e.g. "targets". */
  section: string

  service: string
  module: string
  env: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
