import type { Milliseconds } from "../ports/time"
import { DeadlineError } from "./deadline-error"

export type DeadlineOptions = {
  timeoutMs: Milliseconds
  /** Caller cancellation; rejects with `operation_aborted`. */
  signal?: AbortSignal
}

/**
 * Run `task` with a time limit.
 *
 * `task` receives a signal that aborts when the deadline passes or the
 * caller's signal fires, so cooperative work can stop early. The returned
 * promise settles at the first of: task result, timeout, caller abort.
 * Work that ignores the signal keeps running in the background; its late
 * result or rejection is discarded.
 */
export function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  opts: DeadlineOptions,
): Promise<T> {
  const { timeoutMs, signal } = opts

  if (signal?.aborted) return Promise.reject(DeadlineError.aborted(signal.reason))

  const controller = new AbortController()

  return new Promise<T>((resolve, reject) => {
    const settle = (fn: () => void) => {
      clearTimeout(timer)
      signal?.removeEventListener("abort", onAbort)
      fn()
    }

    const onAbort = () => {
      controller.abort(signal?.reason)
      settle(() => reject(DeadlineError.aborted(signal?.reason)))
    }

    const timer = setTimeout(() => {
      const err = DeadlineError.exceeded(timeoutMs)
      controller.abort(err)
      settle(() => reject(err))
    }, timeoutMs)

    signal?.addEventListener("abort", onAbort, { once: true })

    task(controller.signal).then(
      (value) => settle(() => resolve(value)),
      (err: unknown) => settle(() => reject(err)),
    )
  })
}
