import type { LogLevelName } from "../log-level"
import type { Logger } from "../logger"

export type HarnessEntry = {
  level: LogLevelName
  payload: Record<string, unknown>
}

export type LoggerHarness = {
  name: string
  /** Whether the adapter drops entries below `level`. */
  filtersByLevel: boolean
  make: (opts?: { level?: LogLevelName }) => {
    logger: Logger
    read: () => HarnessEntry[]
  }
}
