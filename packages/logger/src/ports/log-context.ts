/**
 * Fields a cache component may bind to its logger or attach to a single entry.
 */
export type LogContext = {
  service: string
  module: string
  environment: string

  /** Public operation being served, e.g. `get`, `setMulti`, `clearTags`. */
  op: string

  /** Derived storage key. */
  key: string

  /** Normalized tags involved in the operation. */
  tags: readonly string[]
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay merged into an existing context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
