/**
 * Transitive closure computation for inheritance edges.
 *
 * Uses Warshall's algorithm for efficient closure computation.
 */

/**
 * Computes the transitive closure of a set of directed relations.
 *
 * Given relations like [A→B, B→C], computes all transitive paths [A→B, A→C, B→C].
 * Every node that appears in a relation gets an entry, possibly empty.
 *
 * @param relations - Array of [from, to] pairs representing direct relationships
 * @returns Map from each 'from' to the set of all reachable 'to' values
 */
export function computeTransitiveClosure<N>(
  relations: readonly (readonly [N, N])[],
): ReadonlyMap<N, ReadonlySet<N>> {
  const closure = new Map<N, Set<N>>();

  for (const [from, to] of relations) {
    if (!closure.has(from)) closure.set(from, new Set());
    if (!closure.has(to)) closure.set(to, new Set());
  }

  for (const [from, to] of relations) {
    closure.get(from)?.add(to);
  }

  // For each intermediate node k, i→k and k→j implies i→j
  for (const k of closure.keys()) {
    const kReaches = closure.get(k);
    if (!kReaches) continue;

    for (const indexReaches of closure.values()) {
      if (!indexReaches.has(k)) continue;

      for (const reached of kReaches) {
        indexReaches.add(reached);
      }
    }
  }

  return closure;
}

/**
 * Computes the inverse of a transitive closure map.
 *
 * Given A→{B, C}, returns B→{A}, C→{A}.
 */
export function invertClosure<N>(
  closure: ReadonlyMap<N, ReadonlySet<N>>,
): ReadonlyMap<N, ReadonlySet<N>> {
  const result = new Map<N, Set<N>>();

  for (const [from, tos] of closure) {
    for (const to of tos) {
      const existing = result.get(to) ?? new Set();
      existing.add(from);
      result.set(to, existing);
    }
  }

  return result;
}

/**
 * Checks if there's a path from source to target in the closure.
 */
export function isReachable<N>(
  closure: ReadonlyMap<N, ReadonlySet<N>>,
  source: N,
  target: N,
): boolean {
  return closure.get(source)?.has(target) ?? false;
}
