import type { SafeDataCache } from "@hearth/cache"
import type { CacheAsideCoordinator } from "@hearth/cache-aside"

/** Builds a typed accessor over the shared store. */
export type TypedCacheFactory = <T>() => SafeDataCache<T>

export type DomainServiceDeps<TRepository> = {
  repository: TRepository
  coordinator: CacheAsideCoordinator
  cache: TypedCacheFactory
}

export type CallOptions = {
  signal?: AbortSignal
}
