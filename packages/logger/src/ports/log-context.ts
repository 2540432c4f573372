export type LogContext = {
  service: string
  module: string

  /** Config file the entry is about */
  path: string

  /** Dotted TOML key the entry is about, e.g. "jobmon.spool_dir" */
  key: string

  platform: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
