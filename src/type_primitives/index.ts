export type { Brand } from "./brand";
export {
  is_non_negative_integer,
  is_positive_integer,
  validate_and_cast,
  unsafe_cast,
} from "./assertions";
export { TYPE_ERROR, TypeError } from "./error";
export { SparseSet, type ReadonlySparseSet } from "./sparse_set/sparse_set";
export { SlotArena, NULL_INDEX } from "./slot_arena/slot_arena";
