import { type TypeSet } from "../typeset/types";

/**
 * "Is ancestor of" between two descriptors.
 *
 * Must be reflexive (`isAncestorOf(a, a)` holds) and transitive. It need not
 * be total: unrelated siblings are incomparable both ways.
 */
export type SubtypeRelation<D> = (ancestor: D, descendant: D) => boolean;

/**
 * One inheritance declaration: `child` directly derives from every parent.
 *
 * @example
 * ```typescript
 * // Amphibian derives from both Car and Boat
 * inherits("Amphibian", "Car", "Boat")
 * ```
 */
export type Inheritance<D> = Readonly<{
  child: D;
  parents: TypeSet<D>;
}>;

/**
 * A class constructor, including abstract ones.
 */
export type AnyClass = abstract new (...args: never[]) => unknown;
