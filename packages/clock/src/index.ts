export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export { DeadlineError, type DeadlineErrorCode } from "./core/deadline-error"
export { withDeadline, type DeadlineOptions } from "./core/with-deadline"
export type { Clock, Sleeper, TimeSource } from "./ports/clock"
export type { Milliseconds, Seconds, UnixMs } from "./ports/time"
