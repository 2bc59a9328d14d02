/**
 * Set algebra over ordered type sets.
 *
 * Every operation is pure: inputs are never mutated and every returned set
 * is a frozen array. Descriptor comparisons use `Object.is` unless an
 * equality is passed.
 */
import {
  EmptySelectionError,
  InvalidTypeSetError,
  OutOfRangeError,
} from "../errors/index";
import {
  type Equality,
  NOT_FOUND,
  type Predicate,
  type Preference,
  type TypeSet,
} from "./types";

const sameDescriptor: Equality<unknown> = Object.is;

// ============================================================
// Construction & Detection
// ============================================================

/** The empty type set. */
export const emptyTypeSet: TypeSet<never> = Object.freeze([]);

/**
 * Creates a type set from descriptors, in argument order.
 *
 * @example
 * ```typescript
 * const shapes = typeSet("Shape", "Circle", "Square");
 * ```
 */
export function typeSet<D>(...descriptors: D[]): TypeSet<D> {
  return Object.freeze(descriptors);
}

/**
 * Checks if a value can be used as a type set.
 */
export function isTypeSet(value: unknown): value is TypeSet<unknown> {
  return Array.isArray(value);
}

/**
 * Throws InvalidTypeSetError unless `value` is a type set.
 */
export function assertTypeSet(value: unknown, operation: string): void {
  if (!isTypeSet(value)) {
    throw new InvalidTypeSetError(operation, value);
  }
}

function freeze<D>(descriptors: D[]): TypeSet<D> {
  return Object.freeze(descriptors);
}

// ============================================================
// Membership & Access
// ============================================================

export function size<D>(set: TypeSet<D>): number {
  assertTypeSet(set, "size");
  return set.length;
}

/**
 * Index of the first occurrence of `descriptor`, or NOT_FOUND (-1).
 */
export function findFirst<D>(
  descriptor: D,
  set: TypeSet<D>,
  equals: Equality<D> = sameDescriptor,
): number {
  assertTypeSet(set, "findFirst");
  return set.findIndex((item) => equals(item, descriptor));
}

export function contains<D>(
  descriptor: D,
  set: TypeSet<D>,
  equals: Equality<D> = sameDescriptor,
): boolean {
  return findFirst(descriptor, set, equals) !== NOT_FOUND;
}

/**
 * Descriptor at a zero-based position.
 *
 * @throws OutOfRangeError for negative, fractional or too-large indexes
 */
export function at<D>(index: number, set: TypeSet<D>): D {
  assertTypeSet(set, "at");
  if (!Number.isInteger(index) || index < 0 || index >= set.length) {
    throw new OutOfRangeError({ operation: "at", index, size: set.length });
  }
  return set[index]!;
}

export function front<D>(set: TypeSet<D>): D {
  assertTypeSet(set, "front");
  if (set.length === 0) {
    throw new OutOfRangeError({ operation: "front", index: 0, size: 0 });
  }
  return at(0, set);
}

export function back<D>(set: TypeSet<D>): D {
  assertTypeSet(set, "back");
  if (set.length === 0) {
    throw new OutOfRangeError({ operation: "back", index: -1, size: 0 });
  }
  return at(set.length - 1, set);
}

// ============================================================
// Structural Operations
// ============================================================

export function concat<D>(first: TypeSet<D>, second: TypeSet<D>): TypeSet<D> {
  assertTypeSet(first, "concat");
  assertTypeSet(second, "concat");
  return freeze([...first, ...second]);
}

/**
 * Reverses a type set. Applying it twice gives back an equal set.
 */
export function invert<D>(set: TypeSet<D>): TypeSet<D> {
  assertTypeSet(set, "invert");
  return freeze([...set].reverse());
}

export function pushFront<D>(descriptor: D, set: TypeSet<D>): TypeSet<D> {
  assertTypeSet(set, "pushFront");
  return freeze([descriptor, ...set]);
}

export function pushBack<D>(descriptor: D, set: TypeSet<D>): TypeSet<D> {
  assertTypeSet(set, "pushBack");
  return freeze([...set, descriptor]);
}

/**
 * Drops the first descriptor. The empty set pops to itself.
 */
export function popFront<D>(set: TypeSet<D>): TypeSet<D> {
  assertTypeSet(set, "popFront");
  return freeze(set.slice(1));
}

// ============================================================
// Filtering
// ============================================================

export function filter<D>(set: TypeSet<D>, keep: Predicate<D>): TypeSet<D> {
  assertTypeSet(set, "filter");
  return freeze(set.filter((item, index) => keep(item, index)));
}

/**
 * Removes every occurrence of `descriptor`, keeping the order of the rest.
 */
export function removeAll<D>(
  descriptor: D,
  set: TypeSet<D>,
  equals: Equality<D> = sameDescriptor,
): TypeSet<D> {
  assertTypeSet(set, "removeAll");
  return freeze(set.filter((item) => !equals(item, descriptor)));
}

/**
 * Removes repeats, keeping each distinct descriptor where it first appears.
 *
 * @example
 * ```typescript
 * dedup(typeSet("A", "B", "A", "C", "B")); // ["A", "B", "C"]
 * ```
 */
export function dedup<D>(
  set: TypeSet<D>,
  equals: Equality<D> = sameDescriptor,
): TypeSet<D> {
  assertTypeSet(set, "dedup");
  const result: D[] = [];
  for (const item of set) {
    if (!result.some((kept) => equals(kept, item))) {
      result.push(item);
    }
  }
  return freeze(result);
}

// ============================================================
// Selection
// ============================================================

/**
 * Picks one "best" descriptor by folding from the back of the set toward
 * the front: the last descriptor starts as best, and each earlier
 * descriptor `d` replaces the current best when `prefer(d, best)` holds.
 *
 * `prefer` need not be total. Among mutually incomparable descriptors the
 * LAST one wins, since an earlier one only displaces the current best when
 * it is preferred over it: `selectBest(["I", "J"], isAncestorOf)` is "J" for
 * siblings. See `selectFirstBest` for a variant where the earliest wins.
 *
 * @throws EmptySelectionError when the set is empty
 */
export function selectBest<D>(set: TypeSet<D>, prefer: Preference<D>): D {
  assertTypeSet(set, "selectBest");
  if (set.length === 0) {
    throw new EmptySelectionError("selectBest");
  }
  return invert(set).reduce((best, candidate) =>
    prefer(candidate, best) ? candidate : best,
  );
}

/**
 * Picks the earliest descriptor that no other descriptor in the set is
 * preferred over. Falls back to `selectBest` when every descriptor is
 * beaten by another one, which only happens for a cyclic `prefer`.
 *
 * @throws EmptySelectionError when the set is empty
 */
export function selectFirstBest<D>(
  set: TypeSet<D>,
  prefer: Preference<D>,
  equals: Equality<D> = sameDescriptor,
): D {
  assertTypeSet(set, "selectFirstBest");
  if (set.length === 0) {
    throw new EmptySelectionError("selectFirstBest");
  }
  for (const candidate of set) {
    const beaten = set.some(
      (other) => !equals(other, candidate) && prefer(other, candidate),
    );
    if (!beaten) {
      return candidate;
    }
  }
  return selectBest(set, prefer);
}
