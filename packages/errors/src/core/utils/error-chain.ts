function getCause(v: unknown): unknown {
  return typeof v === "object" && v !== null && "cause" in v ? v.cause : undefined
}

/**
 * Walk the error cause chain and return all values encountered, outermost first.
 *
 * Stops at `maxDepth` entries (default 50) or when a cycle is detected.
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

/**
 * Return the first value in the cause chain that satisfies `predicate`.
 *
 * @example
 * ```ts
 * const timeout = findInChain(err, (e) => e instanceof DOMException && e.name === "TimeoutError")
 * ```
 */
export function findInChain<T>(
  err: unknown,
  predicate: (value: unknown) => value is T,
): T | undefined
export function findInChain(
  err: unknown,
  predicate: (value: unknown) => boolean,
): unknown
export function findInChain(
  err: unknown,
  predicate: (value: unknown) => boolean,
): unknown {
  return errorChain(err).find(predicate)
}
