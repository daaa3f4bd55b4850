function getCause(v: unknown): unknown {
  if (typeof v !== "object" || v === null || !("cause" in v)) return undefined
  return v.cause
}

/**
 * Walk the `cause` chain of `err`, outermost first.
 * Stops at `maxDepth` entries or when a value repeats.
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)

    const next = getCause(current)

    if (next === undefined) break
    current = next
  }

  return chain
}
