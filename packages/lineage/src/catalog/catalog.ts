import { DuplicateDeclarationError, UnknownCatalogError } from "../errors/index";
import {
  sequenceSchema,
  validateCatalogName,
  validateConfig,
} from "../errors/validation";
import { contains, emptyTypeSet, pushBack } from "../typeset/operations";
import { type Equality, type TypeSet } from "../typeset/types";
import { globalSequence, type SequenceCounter } from "./sequence";
import {
  type CatalogHooks,
  type CatalogOptions,
  type HistoryEntry,
} from "./types";

type CatalogState<D> = {
  declaredAt: number;
  /** Sparse history, ascending by sequence. The first entry is the declaration. */
  entries: HistoryEntry<D>[];
};

/**
 * Append-only, versioned registry of named type sets.
 *
 * Every declaration and registration draws the next number from one shared
 * counter, so the history of each name is sparse: numbers taken by other
 * names leave gaps. A snapshot at any number returns the contents as of the
 * closest mutation at or before it.
 *
 * @example
 * ```typescript
 * const catalog = new Catalog<string>();
 * catalog.declare("Shapes");
 * catalog.register("Shapes", "Circle");
 * catalog.register("Shapes", "Shape");
 * catalog.snapshotLatest("Shapes"); // ["Circle", "Shape"]
 * ```
 */
export class Catalog<D> {
  readonly #counter: SequenceCounter;
  readonly #hooks: CatalogHooks<D>;
  readonly #equals: Equality<D>;
  readonly #catalogs = new Map<string, CatalogState<D>>();

  constructor(options: CatalogOptions<D> = {}) {
    this.#counter = options.counter ?? globalSequence;
    this.#hooks = options.hooks ?? {};
    this.#equals = options.equals ?? Object.is;
  }

  /** Current value of the shared counter. */
  get version(): number {
    return this.#counter.current;
  }

  // === Mutation ===

  /**
   * Declares a catalog name, empty as of the returned sequence number.
   *
   * @throws ConfigurationError for an empty or padded name
   * @throws DuplicateDeclarationError if the name is already declared
   */
  declare(name: string): number {
    validateCatalogName(name);
    const existing = this.#catalogs.get(name);
    if (existing) {
      throw new DuplicateDeclarationError(name, existing.declaredAt);
    }

    const sequence = this.#counter.next();
    this.#catalogs.set(name, {
      declaredAt: sequence,
      entries: [{ sequence, types: emptyTypeSet }],
    });

    this.#hooks.onDeclare?.({ name, sequence });
    return sequence;
  }

  /**
   * Appends a descriptor to a catalog. Duplicates are kept.
   *
   * @returns the sequence number of the new history entry
   * @throws UnknownCatalogError if the name was never declared
   */
  register(name: string, entity: D): number {
    const state = this.#require(name, "register");
    const latest = state.entries.at(-1)?.types ?? emptyTypeSet;
    const types = pushBack(entity, latest);

    const sequence = this.#counter.next();
    state.entries.push({ sequence, types });

    this.#hooks.onRegister?.({ name, sequence, entity, size: types.length });
    return sequence;
  }

  // === Reads ===

  /**
   * The contents of a catalog as of a sequence number. Numbers before the
   * declaration give the empty set.
   *
   * @throws UnknownCatalogError if the name was never declared
   */
  snapshot(name: string, version: number): TypeSet<D> {
    const state = this.#require(name, "snapshot");
    validateConfig(sequenceSchema, version, "snapshot version");

    const { entries } = state;
    let low = 0;
    let high = entries.length - 1;
    let found: HistoryEntry<D> | undefined;

    // Last entry with sequence <= version
    while (low <= high) {
      const middle = (low + high) >>> 1;
      const entry = entries[middle];
      if (entry === undefined) break;
      if (entry.sequence <= version) {
        found = entry;
        low = middle + 1;
      } else {
        high = middle - 1;
      }
    }

    return found?.types ?? emptyTypeSet;
  }

  /** The contents of a catalog as of the current counter value. */
  snapshotLatest(name: string): TypeSet<D> {
    return this.snapshot(name, this.#counter.current);
  }

  /** Checks if a descriptor has been registered to a catalog so far. */
  containsLatest(entity: D, name: string): boolean {
    this.#require(name, "containsLatest");
    return contains(entity, this.snapshotLatest(name), this.#equals);
  }

  // === Introspection ===

  has(name: string): boolean {
    return this.#catalogs.has(name);
  }

  /** Declared names, in declaration order. */
  names(): readonly string[] {
    return [...this.#catalogs.keys()];
  }

  declarationPoint(name: string): number {
    return this.#require(name, "declarationPoint").declaredAt;
  }

  /** The sparse history of a catalog, oldest first. */
  history(name: string): readonly HistoryEntry<D>[] {
    return [...this.#require(name, "history").entries];
  }

  #require(name: string, operation: string): CatalogState<D> {
    const state = this.#catalogs.get(name);
    if (!state) {
      throw new UnknownCatalogError(name, operation);
    }
    return state;
  }
}
