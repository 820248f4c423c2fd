import type {
  CacheInvalidator,
  CacheKey,
  ReadThrough,
  ReadThroughOptions,
} from "@hearth/cache"
import type { EventPublisher } from "@hearth/events"
import type { Logger } from "@hearth/logger"
import type {
  DirectMutationPlan,
  MutateOptions,
  MutationPlan,
  MutationSteps,
  ResolvedMutationPlan,
} from "../ports/mutation-plan"
import { SystemOfRecordError } from "./system-of-record-error"

export type CacheAsideCoordinatorDeps = {
  invalidator: CacheInvalidator
  publisher: EventPublisher
  logger: Logger
}

/**
 * Runs reads and writes against the system of record while keeping the cache
 * and subscribers in step with it.
 *
 * A write goes: resolve, invalidate, write, publish one event, repopulate.
 * Keys are deleted before the write, so a concurrent reader that misses and
 * reloads the old row between the delete and the commit can put a stale
 * value back until its TTL runs out. There is no lock to close that window.
 */
export class CacheAsideCoordinator {
  constructor(private readonly deps: CacheAsideCoordinatorDeps) {}

  /** Cache-aside read. Loader failures surface; cache failures never do. */
  async read<T>(
    cache: ReadThrough<T>,
    key: CacheKey,
    loader: () => Promise<T>,
    opts: ReadThroughOptions<T> = {},
  ): Promise<T> {
    return cache.getThrough(
      key,
      async () => {
        try {
          return await loader()
        } catch (err) {
          throw SystemOfRecordError.wrap(`load ${key}`, err)
        }
      },
      opts,
    )
  }

  mutate<TResolved, TResult>(
    plan: ResolvedMutationPlan<TResolved, TResult>,
    opts?: MutateOptions,
  ): Promise<TResult>
  mutate<TResult>(
    plan: DirectMutationPlan<TResult>,
    opts?: MutateOptions,
  ): Promise<TResult>
  async mutate<TResolved, TResult>(
    plan: MutationPlan<TResolved, TResult>,
    opts: MutateOptions = {},
  ): Promise<TResult> {
    if (plan.resolve === undefined) {
      return this.run<undefined, TResult>(plan, undefined, opts)
    }

    let resolved: TResolved
    try {
      resolved = await plan.resolve()
    } catch (err) {
      throw SystemOfRecordError.wrap(plan.name, err)
    }

    return this.run(plan, resolved, opts)
  }

  private async run<TResolved, TResult>(
    plan: MutationSteps<TResolved, TResult>,
    resolved: TResolved,
    opts: MutateOptions,
  ): Promise<TResult> {
    const keys = plan.invalidate(resolved)
    await this.deps.invalidator.invalidateMany(keys, opts)

    let result: TResult
    try {
      result = await plan.write(resolved)
    } catch (err) {
      throw SystemOfRecordError.wrap(plan.name, err)
    }

    this.deps.logger.debug("Mutation committed", { operation: plan.name, keys })

    await this.announce(plan, result, resolved, opts)

    if (plan.repopulate !== undefined) {
      try {
        await plan.repopulate(result, resolved)
      } catch (err) {
        this.deps.logger.warn("Cache repopulation failed", { operation: plan.name, err })
      }
    }

    return result
  }

  private async announce<TResolved, TResult>(
    plan: MutationSteps<TResolved, TResult>,
    result: TResult,
    resolved: TResolved,
    opts: MutateOptions,
  ): Promise<void> {
    try {
      await this.deps.publisher.publish(plan.event(result, resolved), opts)
    } catch (err) {
      this.deps.logger.warn("Domain event dropped", { operation: plan.name, err })
    }
  }
}
