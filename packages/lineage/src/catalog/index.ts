export { Catalog } from "./catalog";
export { globalSequence, SequenceCounter } from "./sequence";
export {
  type CatalogHookContext,
  type CatalogHooks,
  type CatalogOptions,
  type HistoryEntry,
  type RegisterHookContext,
} from "./types";
