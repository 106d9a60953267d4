/***
 * Assertions — Position checks and dev-only invariant validation.
 *
 * Position checks are always on: an out-of-range position must throw
 * before the container is touched, in every build. dev_assert is guarded
 * by __DEV__ and tree-shaken in production builds.
 *
 ***/

import { HASH_VEC_ERROR, HashVecError } from "utils/error";

export const is_non_negative_integer = (v: number): boolean =>
  Number.isInteger(v) && v >= 0;

/** Throws unless 0 <= position < length. */
export function assert_position(
  position: number,
  length: number,
  op: string,
): void {
  if (!is_non_negative_integer(position) || position >= length) {
    throw new HashVecError(
      HASH_VEC_ERROR.INDEX_OUT_OF_RANGE,
      `${op}: position ${position} is out of range for length ${length}`,
      { op, position, length },
    );
  }
}

/** Throws unless 0 <= position <= length (one past the end is an append). */
export function assert_insert_position(
  position: number,
  length: number,
  op: string,
): void {
  if (!is_non_negative_integer(position) || position > length) {
    throw new HashVecError(
      HASH_VEC_ERROR.INDEX_OUT_OF_RANGE,
      `${op}: insert position ${position} is out of range for length ${length}`,
      { op, position, length },
    );
  }
}

export function dev_assert(
  condition: boolean,
  category: HASH_VEC_ERROR,
  message: string,
  context?: Record<string, unknown>,
): void {
  if (__DEV__ && !condition) {
    throw new HashVecError(category, message, context);
  }
}
