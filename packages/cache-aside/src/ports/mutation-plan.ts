import type { CacheKey } from "@hearth/cache"
import type { DomainEvent } from "@hearth/events"

export type MutationSteps<TResolved, TResult> = {
  /** Used in logs and error context, e.g. `"markBillPaid"`. */
  name: string

  /** Every key whose value may go stale because of this write. */
  invalidate: (resolved: TResolved) => readonly CacheKey[]

  /** The authoritative write. */
  write: (resolved: TResolved) => Promise<TResult>

  /** The single event announcing the committed change. */
  event: (result: TResult, resolved: TResolved) => DomainEvent

  /** Refresh hot keys after the write. Failures are logged, never surfaced. */
  repopulate?: (result: TResult, resolved: TResolved) => Promise<void>
}

/**
 * A write whose cache keys depend on data read beforehand, e.g. the home a
 * task belongs to. `resolve` also carries preconditions: throwing there
 * aborts before any key is touched.
 */
export type ResolvedMutationPlan<TResolved, TResult> = MutationSteps<
  TResolved,
  TResult
> & {
  resolve: () => Promise<TResolved>
}

/** A write whose keys follow from its input alone. */
export type DirectMutationPlan<TResult> = MutationSteps<undefined, TResult> & {
  resolve?: undefined
}

export type MutationPlan<TResolved, TResult> =
  | ResolvedMutationPlan<TResolved, TResult>
  | DirectMutationPlan<TResult>

export type MutateOptions = {
  signal?: AbortSignal
}
