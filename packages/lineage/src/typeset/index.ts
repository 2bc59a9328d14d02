export {
  assertTypeSet,
  at,
  back,
  concat,
  contains,
  dedup,
  emptyTypeSet,
  filter,
  findFirst,
  front,
  invert,
  isTypeSet,
  popFront,
  pushBack,
  pushFront,
  removeAll,
  selectBest,
  selectFirstBest,
  size,
  typeSet,
} from "./operations";
export {
  type Equality,
  NOT_FOUND,
  type Predicate,
  type Preference,
  type TypeSet,
} from "./types";
