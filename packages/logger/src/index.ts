export type { LogContext, LogContextPatch, LogEvent, LogMeta } from "./ports/log-context"
export {
  LogLevels,
  logLevelNames,
  type LogLevel,
  type LogLevelName,
} from "./ports/log-level"
export type { Logger } from "./ports/logger"
export type { LoggerOptions } from "./ports/logger-options"

export { MemoryLogger, type CapturedLog } from "./adapters/memory/memory-logger"
export { createNullLogger, NullLogger } from "./adapters/null/null-logger"
export {
  createPinoLogger,
  PinoLogger,
  type PinoLoggerDeps,
} from "./adapters/pino/pino-logger"
