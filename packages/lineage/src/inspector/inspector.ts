import { z } from "zod";

import { Catalog } from "../catalog/catalog";
import { forEachAncestor, type AncestorCallback } from "../dispatch/iterator";
import { describeEntity } from "../errors/index";
import { resolveOrderSchema, validateConfig } from "../errors/validation";
import { type SubtypeRelation } from "../hierarchy/types";
import {
  type AncestorChain,
  resolve,
  type ResolveOrder,
} from "../resolver/resolve";
import { contains } from "../typeset/operations";
import { type Equality, type TypeSet } from "../typeset/types";
import { warnInDevelopment } from "../utils/environment";
import { type InspectorHooks, type InspectorOptions } from "./types";

const functionSchema = z.custom<(...args: never[]) => unknown>(
  (value) => typeof value === "function",
  { message: "Expected a function" },
);

const inspectorOptionsSchema = z.object({
  isAncestorOf: functionSchema,
  catalog: z.instanceof(Catalog).optional(),
  order: resolveOrderSchema.optional(),
  equals: functionSchema.optional(),
  hooks: z
    .object({
      onResolve: functionSchema.optional(),
    })
    .optional(),
});

/**
 * Binds a catalog and a subtype relation into one embedding API.
 *
 * @example
 * ```typescript
 * const vehicles = defineHierarchy([
 *   inherits("Car", "Vehicle"),
 *   inherits("Boat", "Vehicle"),
 *   inherits("Amphibian", "Car", "Boat"),
 * ]);
 * const inspector = createInspector({ isAncestorOf: vehicles.isAncestorOf });
 *
 * inspector.declareCatalog("Fleet");
 * for (const kind of vehicles.entities) inspector.register("Fleet", kind);
 *
 * inspector.resolveAncestors("Amphibian", "Fleet"); // ["Vehicle", "Boat", "Car"]
 * ```
 */
export class Inspector<D> {
  readonly catalog: Catalog<D>;

  readonly #isAncestorOf: SubtypeRelation<D>;
  readonly #order: ResolveOrder;
  readonly #equals: Equality<D>;
  readonly #hooks: InspectorHooks<D>;

  constructor(options: InspectorOptions<D>) {
    validateConfig(inspectorOptionsSchema, options, "inspector options");
    this.#isAncestorOf = options.isAncestorOf;
    this.#order = options.order ?? "fold";
    this.#equals = options.equals ?? Object.is;
    this.#hooks = options.hooks ?? {};
    this.catalog = options.catalog ?? new Catalog<D>({ equals: this.#equals });
  }

  // === Catalog ===

  declareCatalog(name: string): number {
    return this.catalog.declare(name);
  }

  register(name: string, entity: D): number {
    return this.catalog.register(name, entity);
  }

  snapshot(name: string, version: number): TypeSet<D> {
    return this.catalog.snapshot(name, version);
  }

  snapshotLatest(name: string): TypeSet<D> {
    return this.catalog.snapshotLatest(name);
  }

  /**
   * Membership under the inspector's equality, which may differ from the
   * equality of a catalog passed in.
   */
  containsLatest(entity: D, name: string): boolean {
    return contains(entity, this.catalog.snapshotLatest(name), this.#equals);
  }

  // === Resolution ===

  /**
   * Strict ancestors of `entity` among the latest contents of `name`.
   */
  resolveAncestors(entity: D, name: string): AncestorChain<D> {
    return this.resolveAncestorsAt(entity, name, this.catalog.version);
  }

  /**
   * Strict ancestors of `entity` among the contents of `name` as of
   * `version`.
   */
  resolveAncestorsAt(entity: D, name: string, version: number): AncestorChain<D> {
    const snapshot = this.catalog.snapshot(name, version);
    if (!contains(entity, snapshot, this.#equals)) {
      warnInDevelopment(
        `Resolving ancestors of "${describeEntity(entity)}", which is not registered to catalog "${name}" (as of ${version})`,
      );
    }

    const chain = resolve(entity, snapshot, this.#isAncestorOf, {
      order: this.#order,
      equals: this.#equals,
    });

    this.#hooks.onResolve?.({ name, version, entity, chain });
    return chain;
  }

  // === Dispatch ===

  forEachAncestor<I>(
    instance: I,
    chain: AncestorChain<D>,
    callback: AncestorCallback<D, I>,
  ): void {
    forEachAncestor(instance, chain, callback);
  }

  /**
   * Resolves the ancestors of `entity` in `name` and calls `callback` for
   * each of them with `instance`.
   *
   * @returns the chain that was visited
   */
  visit<I>(
    instance: I,
    entity: D,
    name: string,
    callback: AncestorCallback<D, I>,
  ): AncestorChain<D> {
    const chain = this.resolveAncestors(entity, name);
    forEachAncestor(instance, chain, callback);
    return chain;
  }
}

export function createInspector<D>(options: InspectorOptions<D>): Inspector<D> {
  return new Inspector(options);
}
