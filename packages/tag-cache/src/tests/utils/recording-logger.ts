import type { LogContext, LogContextPatch, Logger, LogLevelName, LogMeta } from "@tagstash/logger"

export type RecordedEntry = {
  level: LogLevelName
  message: string
  context: LogContextPatch
  meta: Record<string, unknown>
}

/**
 * Logger that keeps every entry, shared between a logger and its children.
 */
export class RecordingLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  constructor(
    readonly entries: RecordedEntry[] = [],
    private readonly context: LogContextPatch = {},
  ) {}

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.record("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.record("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.record("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.record("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.record("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.record("fatal", message, meta)
  }

  child<U extends LogContextPatch>(context: U): Logger<TContext & U> {
    return new RecordingLogger<TContext & U>(this.entries, { ...this.context, ...context })
  }

  at(level: LogLevelName): RecordedEntry[] {
    return this.entries.filter((entry) => entry.level === level)
  }

  private record(level: LogLevelName, message: string, meta?: Record<string, unknown>): void {
    this.entries.push({ level, message, context: this.context, meta: { ...meta } })
  }
}
