import { type Equality, type TypeSet } from "../typeset/types";
import { type SequenceCounter } from "./sequence";

// ============================================================
// History
// ============================================================

/**
 * The contents of a catalog right after the mutation at `sequence`.
 */
export type HistoryEntry<D> = Readonly<{
  sequence: number;
  types: TypeSet<D>;
}>;

// ============================================================
// Hooks
// ============================================================

/**
 * Base context passed to every catalog hook.
 */
export type CatalogHookContext = Readonly<{
  /** Catalog name */
  name: string;
  /** Sequence number drawn by the operation */
  sequence: number;
}>;

/**
 * Context for a registration.
 */
export type RegisterHookContext<D> = CatalogHookContext &
  Readonly<{
    /** The descriptor appended */
    entity: D;
    /** Number of descriptors in the catalog after the append */
    size: number;
  }>;

/**
 * Observability hooks for catalog mutations. Called after the mutation is
 * recorded; an error thrown by a hook reaches the caller.
 *
 * @example
 * ```typescript
 * const catalog = new Catalog<string>({
 *   hooks: {
 *     onRegister: (ctx) => {
 *       console.log(`[${ctx.sequence}] ${ctx.name} += ${ctx.entity}`);
 *     },
 *   },
 * });
 * ```
 */
export type CatalogHooks<D> = Readonly<{
  /** Called after a catalog name is declared */
  onDeclare?: (ctx: CatalogHookContext) => void;
  /** Called after a descriptor is registered */
  onRegister?: (ctx: RegisterHookContext<D>) => void;
}>;

// ============================================================
// Options
// ============================================================

export type CatalogOptions<D> = Readonly<{
  /** Sequence source. Defaults to the process-wide `globalSequence`. */
  counter?: SequenceCounter;
  /** Observability hooks */
  hooks?: CatalogHooks<D>;
  /** Descriptor equality for `containsLatest`. Defaults to `Object.is`. */
  equals?: Equality<D>;
}>;
