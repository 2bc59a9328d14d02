/**
 * An ordered sequence of entity descriptors. Order is meaningful and
 * duplicates are allowed.
 */
export type TypeSet<D> = readonly D[];

/**
 * Equality between descriptors. Defaults to `Object.is`.
 */
export type Equality<D> = (a: D, b: D) => boolean;

/**
 * Keep/drop decision for `filter`.
 */
export type Predicate<D> = (descriptor: D, index: number) => boolean;

/**
 * Pairwise preference for fold selection: `prefer(a, b)` holds when `a`
 * should replace `b` as the current best. Need not be a total order.
 */
export type Preference<D> = (a: D, b: D) => boolean;

/** Index returned by `findFirst` when the descriptor is absent. */
export const NOT_FOUND = -1;
