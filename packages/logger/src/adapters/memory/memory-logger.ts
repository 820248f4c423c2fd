import type { LogLevelName } from "../../ports/log-level"
import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"

export type CapturedLog = {
  level: LogLevelName
  message: string
  fields: Record<string, unknown>
}

/**
 * Keeps entries in memory. Children share the parent's buffer, so a test can
 * hand a `MemoryLogger` to a composition root and inspect everything it wrote.
 */
export class MemoryLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  constructor(
    private readonly sink: CapturedLog[] = [],
    private readonly context: LogContextPatch = {},
  ) {}

  get entries(): readonly CapturedLog[] {
    return this.sink
  }

  at(level: LogLevelName): CapturedLog[] {
    return this.sink.filter((entry) => entry.level === level)
  }

  clear(): void {
    this.sink.length = 0
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.write("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.write("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.write("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.write("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.write("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.write("fatal", message, meta)
  }

  child<U extends LogContextPatch>(context: U): MemoryLogger<TContext & U> {
    return new MemoryLogger<TContext & U>(this.sink, { ...this.context, ...context })
  }

  private write(level: LogLevelName, message: string, meta?: LogMeta<TContext>): void {
    this.sink.push({ level, message, fields: { ...this.context, ...meta } })
  }
}
