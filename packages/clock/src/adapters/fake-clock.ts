import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

/** Manually driven clock. `sleep()` advances time instead of waiting. */
export class FakeClock implements Clock {
  private time: UnixMs

  constructor(start: UnixMs | Date = 0) {
    this.time = typeof start === "number" ? start : start.getTime()
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time += ms
  }

  set(ms: UnixMs): void {
    this.time = ms
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return
    this.advance(Math.max(0, ms))
  }
}
