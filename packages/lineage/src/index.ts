/**
 * Lineage: ancestor chains over versioned type catalogs
 *
 * @example
 * ```typescript
 * import * as lineage from "lineage";
 *
 * const shapes = lineage.defineHierarchy([
 *   lineage.inherits("Polygon", "Shape"),
 *   lineage.inherits("Square", "Polygon"),
 *   lineage.inherits("Circle", "Shape"),
 * ]);
 *
 * const inspector = lineage.createInspector({
 *   isAncestorOf: shapes.isAncestorOf,
 * });
 *
 * inspector.declareCatalog("Shapes");
 * inspector.register("Shapes", "Square");
 * inspector.register("Shapes", "Shape");
 * inspector.register("Shapes", "Polygon");
 *
 * const chain = inspector.resolveAncestors("Square", "Shapes");
 * // ["Shape", "Polygon"]
 *
 * inspector.forEachAncestor(mySquare, chain, (ancestor, square) => {
 *   console.log(`visiting ${square.id} as ${ancestor}`);
 * });
 * ```
 */

// Type set algebra
export {
  assertTypeSet,
  at,
  back,
  concat,
  contains,
  dedup,
  emptyTypeSet,
  type Equality,
  filter,
  findFirst,
  front,
  invert,
  isTypeSet,
  NOT_FOUND,
  popFront,
  type Predicate,
  type Preference,
  pushBack,
  pushFront,
  removeAll,
  selectBest,
  selectFirstBest,
  size,
  typeSet,
  type TypeSet,
} from "./typeset";

// Hierarchies
export {
  type AnyClass,
  classHierarchy,
  defineHierarchy,
  Hierarchy,
  type Inheritance,
  inherits,
  type SubtypeRelation,
} from "./hierarchy";

// Resolution
export {
  type AncestorChain,
  resolve,
  resolveInclusive,
  type ResolveOptions,
  type ResolveOrder,
} from "./resolver";

// Catalog
export {
  Catalog,
  type CatalogHookContext,
  type CatalogHooks,
  type CatalogOptions,
  globalSequence,
  type HistoryEntry,
  type RegisterHookContext,
  SequenceCounter,
} from "./catalog";

// Dispatch
export {
  type AncestorCallback,
  type AncestorHandler,
  createHandlerTable,
  forEachAncestor,
  HandlerTable,
  type HandlerTableOptions,
} from "./dispatch";

// Inspector
export {
  createInspector,
  Inspector,
  type InspectorHooks,
  type InspectorOptions,
  type ResolveHookContext,
} from "./inspector";

// Errors
export {
  ConfigurationError,
  describeEntity,
  DuplicateDeclarationError,
  EmptySelectionError,
  type ErrorCategory,
  getErrorSuggestion,
  HierarchyCycleError,
  InvalidTypeSetError,
  isLineageError,
  isUserRecoverable,
  LineageError,
  type LineageErrorOptions,
  OutOfRangeError,
  UnknownCatalogError,
} from "./errors";
export {
  catalogNameSchema,
  resolveOrderSchema,
  sequenceSchema,
  validateCatalogName,
  validateConfig,
  type ValidationIssue,
} from "./errors/validation";
