function causeOf(v: unknown): unknown {
  return typeof v === "object" && v !== null && "cause" in v ? v.cause : undefined
}

/**
 * Every value on the `cause` chain, starting with `err` itself.
 * Stops on cycles and after `maxDepth` entries.
 */
export function errorChain(err: unknown, maxDepth = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()
  let current: unknown = err

  while (current !== undefined && current !== null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }
    chain.push(current)
    current = causeOf(current)
  }

  return chain
}

/** Last entry of {@link errorChain}; `err` itself when it has no cause. */
export function rootCause(err: unknown): unknown {
  const chain = errorChain(err)
  return chain.length > 0 ? chain[chain.length - 1] : err
}
