export type LogContext = {
  /** Owning application, e.g. "billing-api". */
  service: string
  /** Component within the service that emits the line. */
  module: string

  /** Configuration field being resolved. */
  field: string
  /** Provenance of that field: "literal", "env:NAME", "unset" or "default". */
  source: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * Fields layered onto a logger's bindings by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
