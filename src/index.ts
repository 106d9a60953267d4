// Container
export { HashVec, type Entry, type HashVecOptions } from "./hash_vec/hash_vec";

// Key hashing
export type { KeyHasher } from "./type_primitives/position_index/position_index";

// Errors
export {
  AppError,
  HASH_VEC_ERROR,
  HashVecError,
  is_hash_vec_error,
} from "./utils/error";
