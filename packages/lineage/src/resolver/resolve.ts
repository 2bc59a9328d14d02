/**
 * Ancestor resolution over a snapshot of registered descriptors.
 */
import { type SubtypeRelation } from "../hierarchy/types";
import {
  assertTypeSet,
  emptyTypeSet,
  filter,
  pushBack,
  removeAll,
  selectBest,
  selectFirstBest,
  size,
} from "../typeset/operations";
import { type Equality, type TypeSet } from "../typeset/types";

// ============================================================
// Types
// ============================================================

/**
 * Strict ancestors of a queried descriptor, most ancient first.
 */
export type AncestorChain<D> = TypeSet<D>;

/**
 * How ties between mutually incomparable candidates are broken.
 *
 * - `fold`: back-to-front fold selection (`selectBest`). A diamond
 *   `I, J → K` registered with `I` before `J` resolves to `[F, H, J, I]`.
 * - `declaration`: the earliest undominated candidate wins
 *   (`selectFirstBest`), so siblings come out in snapshot order.
 */
export type ResolveOrder = "fold" | "declaration";

export type ResolveOptions<D> = Readonly<{
  /** Tie-break rule between siblings. Defaults to "fold". */
  order?: ResolveOrder;
  /** Descriptor equality. Defaults to `Object.is`. */
  equals?: Equality<D>;
}>;

// ============================================================
// Resolution
// ============================================================

/**
 * Computes the strict ancestors of `queried` present in `snapshot`.
 *
 * Candidates are the snapshot entries (other than `queried` itself) that
 * are ancestors of `queried`. The most ancestral remaining candidate is
 * moved to the chain, with all its duplicates, until none remain.
 * `queried` does not need to be in the snapshot.
 *
 * @example
 * ```typescript
 * const shapes = defineHierarchy([
 *   inherits("Polygon", "Shape"),
 *   inherits("Square", "Polygon"),
 * ]);
 * resolve("Square", ["Square", "Shape", "Polygon"], shapes.isAncestorOf);
 * // ["Shape", "Polygon"]
 * ```
 */
export function resolve<D>(
  queried: D,
  snapshot: TypeSet<D>,
  isAncestorOf: SubtypeRelation<D>,
  options: ResolveOptions<D> = {},
): AncestorChain<D> {
  assertTypeSet(snapshot, "resolve");
  const equals = options.equals ?? Object.is;
  const order = options.order ?? "fold";

  let candidates = filter(removeAll(queried, snapshot, equals), (entity) =>
    isAncestorOf(entity, queried),
  );
  let chain: AncestorChain<D> = emptyTypeSet;

  while (size(candidates) > 0) {
    const mostAncient =
      order === "declaration" ?
        selectFirstBest(candidates, isAncestorOf, equals)
      : selectBest(candidates, isAncestorOf);
    chain = pushBack(mostAncient, chain);
    candidates = removeAll(mostAncient, candidates, equals);
  }

  return chain;
}

/**
 * Like `resolve`, with `queried` appended as the last element of the chain.
 */
export function resolveInclusive<D>(
  queried: D,
  snapshot: TypeSet<D>,
  isAncestorOf: SubtypeRelation<D>,
  options: ResolveOptions<D> = {},
): TypeSet<D> {
  return pushBack(queried, resolve(queried, snapshot, isAncestorOf, options));
}
