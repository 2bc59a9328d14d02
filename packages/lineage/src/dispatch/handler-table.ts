import { type AncestorChain } from "../resolver/resolve";
import { typeSet } from "../typeset/operations";
import { type Equality, type TypeSet } from "../typeset/types";
import { forEachAncestor } from "./iterator";

/**
 * Handles an instance at one ancestor level.
 */
export type AncestorHandler<D, I> = (instance: I, ancestor: D) => void;

export type HandlerTableOptions<D> = Readonly<{
  /** Descriptor equality for handler lookup. Defaults to `Object.is`. */
  equals?: Equality<D>;
}>;

type HandlerEntry<D, I> = {
  readonly descriptor: D;
  handler: AncestorHandler<D, I>;
};

/**
 * Handlers indexed by descriptor. Dispatching walks a resolved chain and
 * runs the handler registered for each level.
 *
 * @example
 * ```typescript
 * const table = createHandlerTable<string, Shape>()
 *   .on("Shape", (shape) => shape.validate())
 *   .on("Polygon", (shape) => shape.countSides());
 *
 * table.dispatch(square, resolveAncestors("Square", "Shapes"));
 * ```
 */
export class HandlerTable<D, I> {
  readonly #entries: HandlerEntry<D, I>[] = [];
  readonly #equals: Equality<D>;

  constructor(options: HandlerTableOptions<D> = {}) {
    this.#equals = options.equals ?? Object.is;
  }

  /**
   * Sets the handler for a descriptor, replacing any earlier one for an
   * equal descriptor.
   */
  on(descriptor: D, handler: AncestorHandler<D, I>): this {
    const existing = this.#find(descriptor);
    if (existing) {
      existing.handler = handler;
    } else {
      this.#entries.push({ descriptor, handler });
    }
    return this;
  }

  has(descriptor: D): boolean {
    return this.#find(descriptor) !== undefined;
  }

  handlerFor(descriptor: D): AncestorHandler<D, I> | undefined {
    return this.#find(descriptor)?.handler;
  }

  /**
   * Runs the handler of every chain level that has one, in chain order.
   * Levels without a handler are skipped. Handler errors propagate.
   *
   * @returns the levels that were handled
   */
  dispatch(instance: I, chain: AncestorChain<D>): TypeSet<D> {
    const handled: D[] = [];
    forEachAncestor(instance, chain, (ancestor, target) => {
      const handler = this.handlerFor(ancestor);
      if (!handler) return;
      handler(target, ancestor);
      handled.push(ancestor);
    });
    return typeSet(...handled);
  }

  #find(descriptor: D): HandlerEntry<D, I> | undefined {
    return this.#entries.find((entry) =>
      this.#equals(entry.descriptor, descriptor),
    );
  }
}

export function createHandlerTable<D, I>(
  options: HandlerTableOptions<D> = {},
): HandlerTable<D, I> {
  return new HandlerTable<D, I>(options);
}
