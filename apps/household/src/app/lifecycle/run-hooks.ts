import type { Clock, Milliseconds, UnixMs } from "@hearth/clock"
import type { Logger } from "@hearth/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"

export type HookPhase = "startup" | "shutdown"

export type RunHooksContext = {
  phase: HookPhase
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
}

export type RunHooksPolicy = {
  /** Stop at the first failure. Startup wants this; shutdown keeps going. */
  failFast?: boolean
}

export type RunHooksResult = {
  failures: HookFailure[]
  timedOut: boolean
}

type HookOutcome = {
  failure?: HookFailure
  /** The shared deadline passed while the hook ran. */
  overran: boolean
}

/** Runs hooks in order, sharing one deadline across all of them. */
export async function runHooks(
  ctx: RunHooksContext,
  hooks: readonly LifecycleHook[],
  policy: RunHooksPolicy = {},
): Promise<RunHooksResult> {
  const failures: HookFailure[] = []
  const label = ctx.phase === "startup" ? "Startup" : "Shutdown"

  for (const hook of hooks) {
    const msLeft = Math.max(0, ctx.deadlineMs - ctx.clock.nowMs())

    if (msLeft <= 0) {
      ctx.logger.warn(`Skipping remaining ${ctx.phase} hooks after deadline`)
      return { failures, timedOut: true }
    }

    const outcome = await runOne(ctx, hook, msLeft)

    if (outcome.failure !== undefined) {
      ctx.logger.error(`${label} hook failed: ${hook.name}`, {
        err: outcome.failure.error,
      })
      failures.push(outcome.failure)
    } else if (!outcome.overran) {
      ctx.logger.info(`Executed ${ctx.phase} hook: ${hook.name}`)
    }

    if (outcome.overran) {
      ctx.logger.warn(`${label} deadline passed during hook: ${hook.name}`)
      return { failures, timedOut: true }
    }

    if (outcome.failure !== undefined && policy.failFast) {
      return { failures, timedOut: false }
    }
  }

  return { failures, timedOut: false }
}

async function runOne(
  ctx: RunHooksContext,
  hook: LifecycleHook,
  msLeft: Milliseconds,
): Promise<HookOutcome> {
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), msLeft)
  const overran = () => controller.signal.aborted || ctx.clock.nowMs() >= ctx.deadlineMs

  try {
    await hook.fn({ signal: controller.signal, timeRemainingMs: msLeft })
    return { overran: overran() }
  } catch (err) {
    return { failure: { hook: hook.name, error: err }, overran: overran() }
  } finally {
    clearTimeout(timer)
  }
}
