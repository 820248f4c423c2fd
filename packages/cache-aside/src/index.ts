export type {
  DirectMutationPlan,
  MutateOptions,
  MutationPlan,
  MutationSteps,
  ResolvedMutationPlan,
} from "./ports/mutation-plan"

export {
  CacheAsideCoordinator,
  type CacheAsideCoordinatorDeps,
} from "./core/cache-aside-coordinator"
export {
  SystemOfRecordError,
  type SystemOfRecordErrorCode,
} from "./core/system-of-record-error"
