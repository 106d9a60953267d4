export { OrderedStore } from "./ordered_store/ordered_store";
export {
  PositionIndex,
  identity_hasher,
  type KeyHasher,
} from "./position_index/position_index";
export {
  assert_insert_position,
  assert_position,
  dev_assert,
  is_non_negative_integer,
} from "./assertions";
