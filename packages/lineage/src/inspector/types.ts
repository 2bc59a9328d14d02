import { type Catalog } from "../catalog/catalog";
import { type SubtypeRelation } from "../hierarchy/types";
import { type AncestorChain, type ResolveOrder } from "../resolver/resolve";
import { type Equality } from "../typeset/types";

/**
 * Context passed to `onResolve`.
 */
export type ResolveHookContext<D> = Readonly<{
  /** Catalog the snapshot was taken from */
  name: string;
  /** Sequence number of the snapshot */
  version: number;
  /** Queried descriptor */
  entity: D;
  /** Resolved chain */
  chain: AncestorChain<D>;
}>;

/**
 * Observability hooks for the inspector.
 */
export type InspectorHooks<D> = Readonly<{
  /** Called after every resolution */
  onResolve?: (ctx: ResolveHookContext<D>) => void;
}>;

/**
 * Options for creating an inspector.
 */
export type InspectorOptions<D> = Readonly<{
  /** The embedder's "is ancestor of" (reflexive, transitive) */
  isAncestorOf: SubtypeRelation<D>;
  /** Catalog to read and write. Defaults to a new one on the global counter. */
  catalog?: Catalog<D>;
  /** Sibling tie-break. Defaults to "fold". */
  order?: ResolveOrder;
  /** Descriptor equality. Defaults to `Object.is`. */
  equals?: Equality<D>;
  /** Observability hooks */
  hooks?: InspectorHooks<D>;
}>;
