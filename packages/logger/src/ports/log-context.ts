/**
 * Well-known fields bound to a logger via `child()` or passed per call.
 *
 * `key`, `keys` and `channel` identify the cache entries or event channel a
 * degraded operation touched.
 */
export type LogContext = {
  service: string
  env: string
  module: string
  operation: string

  requestId: string
  userId: number
  homeId: number

  key: string
  keys: readonly string[]
  channel: string
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> & { readonly [field: string]: unknown }

export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
