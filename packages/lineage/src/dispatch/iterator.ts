import { type AncestorChain } from "../resolver/resolve";
import { assertTypeSet } from "../typeset/operations";

/**
 * Called once per ancestor, with the instance viewed as that ancestor.
 */
export type AncestorCallback<D, I> = (
  ancestor: D,
  instance: I,
  index: number,
) => void;

/**
 * Invokes `callback` for every descriptor of `chain`, in chain order.
 *
 * An empty chain calls nothing. An error thrown by `callback` stops the
 * iteration and reaches the caller.
 *
 * @example
 * ```typescript
 * forEachAncestor(square, ["Shape", "Polygon"], (ancestor, instance) => {
 *   console.log(`${instance.id} as ${ancestor}`);
 * });
 * ```
 */
export function forEachAncestor<D, I>(
  instance: I,
  chain: AncestorChain<D>,
  callback: AncestorCallback<D, I>,
): void {
  assertTypeSet(chain, "forEachAncestor");
  for (const [index, ancestor] of chain.entries()) {
    callback(ancestor, instance, index);
  }
}
