/**
 * Prepended by an adapter to every key it touches, so several subsystems can
 * share one Redis without colliding: `hearth:prod:cache:`, `hearth:prod:locks:`.
 */
export type KeyspacePrefix = string
