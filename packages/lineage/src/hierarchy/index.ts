export {
  classHierarchy,
  defineHierarchy,
  Hierarchy,
  inherits,
} from "./define-hierarchy";
export {
  type AnyClass,
  type Inheritance,
  type SubtypeRelation,
} from "./types";
