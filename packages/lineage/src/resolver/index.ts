export {
  type AncestorChain,
  resolve,
  resolveInclusive,
  type ResolveOptions,
  type ResolveOrder,
} from "./resolve";
