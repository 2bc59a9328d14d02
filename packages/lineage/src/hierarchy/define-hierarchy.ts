import { describeEntity, HierarchyCycleError } from "../errors/index";
import { dedup, emptyTypeSet } from "../typeset/operations";
import { type TypeSet } from "../typeset/types";
import {
  computeTransitiveClosure,
  invertClosure,
  isReachable,
} from "./closures";
import {
  type AnyClass,
  type Inheritance,
  type SubtypeRelation,
} from "./types";

// ============================================================
// Declarations
// ============================================================

/**
 * Declares that `child` directly derives from each of `parents`.
 */
export function inherits<D>(child: D, ...parents: D[]): Inheritance<D> {
  return Object.freeze({ child, parents: Object.freeze(parents) });
}

// ============================================================
// Hierarchy
// ============================================================

/**
 * Hierarchy holds the precomputed ancestor closure of a set of inheritance
 * declarations and answers subtype queries from it.
 *
 * Computed once by `defineHierarchy` and immutable afterwards.
 */
export class Hierarchy<D> {
  /** Every entity mentioned by a declaration, in first-mention order */
  readonly entities: TypeSet<D>;

  readonly #ancestors: ReadonlyMap<D, ReadonlySet<D>>;
  readonly #descendants: ReadonlyMap<D, ReadonlySet<D>>;
  readonly #parents: ReadonlyMap<D, TypeSet<D>>;

  constructor(
    entities: TypeSet<D>,
    closures: {
      ancestors: ReadonlyMap<D, ReadonlySet<D>>;
      descendants: ReadonlyMap<D, ReadonlySet<D>>;
      parents: ReadonlyMap<D, TypeSet<D>>;
    },
  ) {
    this.entities = entities;
    this.#ancestors = closures.ancestors;
    this.#descendants = closures.descendants;
    this.#parents = closures.parents;
  }

  /**
   * Reflexive, transitive "is ancestor of". Bound, so it can be passed
   * around as a SubtypeRelation.
   */
  readonly isAncestorOf: SubtypeRelation<D> = (ancestor, descendant) =>
    Object.is(ancestor, descendant) ||
    isReachable(this.#ancestors, descendant, ancestor);

  /**
   * Checks for a strict ancestor (never true for the entity itself).
   */
  isStrictAncestorOf(ancestor: D, descendant: D): boolean {
    return isReachable(this.#ancestors, descendant, ancestor);
  }

  /**
   * Gets all strict ancestors of an entity.
   */
  getAncestors(entity: D): ReadonlySet<D> {
    return this.#ancestors.get(entity) ?? new Set();
  }

  /**
   * Gets all strict descendants of an entity.
   */
  getDescendants(entity: D): ReadonlySet<D> {
    return this.#descendants.get(entity) ?? new Set();
  }

  /**
   * Direct parents, in declaration order.
   */
  parentsOf(entity: D): TypeSet<D> {
    return this.#parents.get(entity) ?? emptyTypeSet;
  }
}

/**
 * Builds a Hierarchy from inheritance declarations.
 *
 * Declarations for the same child accumulate. Repeated parents are ignored.
 *
 * @example
 * ```typescript
 * const vehicles = defineHierarchy([
 *   inherits("Car", "Vehicle"),
 *   inherits("Boat", "Vehicle"),
 *   inherits("Amphibian", "Car", "Boat"),
 * ]);
 *
 * vehicles.isAncestorOf("Vehicle", "Amphibian"); // true
 * ```
 *
 * @throws HierarchyCycleError if an entity ends up deriving from itself
 */
export function defineHierarchy<D>(
  declarations: readonly Inheritance<D>[],
): Hierarchy<D> {
  const mentioned: D[] = [];
  const edges: (readonly [D, D])[] = [];
  const parents = new Map<D, D[]>();

  for (const { child, parents: declared } of declarations) {
    mentioned.push(child, ...declared);
    const existing = parents.get(child) ?? [];
    existing.push(...declared);
    parents.set(child, existing);
    for (const parent of declared) {
      edges.push([child, parent]);
    }
  }

  const ancestors = computeTransitiveClosure(edges);

  const cyclic: string[] = [];
  for (const [entity, reaches] of ancestors) {
    if (reaches.has(entity)) {
      cyclic.push(describeEntity(entity));
    }
  }
  if (cyclic.length > 0) {
    throw new HierarchyCycleError(cyclic);
  }

  const directParents = new Map<D, TypeSet<D>>();
  for (const [child, declared] of parents) {
    directParents.set(child, dedup(declared));
  }

  return new Hierarchy(dedup(mentioned), {
    ancestors,
    descendants: invertClosure(ancestors),
    parents: directParents,
  });
}

// ============================================================
// Class Prototype Chains
// ============================================================

/**
 * Subtype relation over class constructors, read from prototype chains.
 *
 * JavaScript classes have a single parent, so this covers single
 * inheritance only; use `defineHierarchy` to model several parents.
 */
export const classHierarchy: SubtypeRelation<AnyClass> = (
  ancestor,
  descendant,
) => ancestor === descendant || descendant.prototype instanceof ancestor;
