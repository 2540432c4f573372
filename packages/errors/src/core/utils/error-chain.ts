function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function getCause(v: unknown): unknown {
  return isRecord(v) && "cause" in v ? v.cause : undefined
}

/**
 * Walk the error cause chain and return all values encountered.
 *
 * Stops at `maxDepth` (default 50) and on cycles.
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
 * Render a cause chain as one line, outermost first.
 *
 * @example
 * ```ts
 * formatErrorChain(new Error("config load error", { cause: new Error("bad key") }))
 * // "config load error: bad key"
 * ```
 */
export function formatErrorChain(err: unknown, separator: string = ": "): string {
  return errorChain(err)
    .map((e) => (e instanceof Error ? e.message : String(e)))
    .filter((message) => message.length > 0)
    .join(separator)
}
