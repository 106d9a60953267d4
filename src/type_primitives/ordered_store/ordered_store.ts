/***
 *
 * OrderedStore — dense positional storage for key/value entries
 *
 * Two parallel dense arrays (keys and values) hold entries packed at
 * 0..size-1. Append and pop are O(1) amortised; insert_at and remove_at
 * shift the tail and cost O(size - i). Removal always preserves the
 * relative order of the remaining entries.
 *
 * The store has no notion of key lookup; callers that index keys must
 * re-sync their positions after insert_at / remove_at.
 *
 ***/

import { assert_insert_position, assert_position } from "../assertions";

export class OrderedStore<K, V> {
  private _keys: K[] = [];
  private _vals: V[] = [];

  get size(): number {
    return this._keys.length;
  }

  /** Live view of keys. Valid indices: 0..size-1. Do not mutate. */
  get keys(): readonly K[] {
    return this._keys;
  }

  /** Live view of values. Valid indices: 0..size-1. Do not mutate. */
  get values(): readonly V[] {
    return this._vals;
  }

  /** Add an entry at the end. Returns its position. */
  append(key: K, value: V): number {
    const position = this._keys.length;
    this._keys.push(key);
    this._vals.push(value);
    return position;
  }

  key_at(i: number): K {
    assert_position(i, this._keys.length, "key_at");
    return this._keys[i];
  }

  value_at(i: number): V {
    assert_position(i, this._keys.length, "value_at");
    return this._vals[i];
  }

  set_key(i: number, key: K): void {
    assert_position(i, this._keys.length, "set_key");
    this._keys[i] = key;
  }

  set_value(i: number, value: V): void {
    assert_position(i, this._keys.length, "set_value");
    this._vals[i] = value;
  }

  /**
   * Place an entry at position i, shifting [i, size) one slot later.
   * i === size is an append.
   */
  insert_at(i: number, key: K, value: V): void {
    assert_insert_position(i, this._keys.length, "insert_at");
    this._keys.splice(i, 0, key);
    this._vals.splice(i, 0, value);
  }

  /**
   * Remove the entry at position i, shifting (i, size) one slot earlier.
   * Returns the removed entry.
   */
  remove_at(i: number): [K, V] {
    assert_position(i, this._keys.length, "remove_at");
    const key = this._keys.splice(i, 1)[0];
    const value = this._vals.splice(i, 1)[0];
    return [key, value];
  }

  /** Remove the last entry, or undefined when empty. */
  pop(): [K, V] | undefined {
    const last = this._keys.length - 1;
    if (last < 0) return undefined;
    const key = this._keys[last];
    const value = this._vals[last];
    this._keys.length = last;
    this._vals.length = last;
    return [key, value];
  }

  swap(i: number, j: number): void {
    const len = this._keys.length;
    assert_position(i, len, "swap");
    assert_position(j, len, "swap");
    const k = this._keys[i];
    this._keys[i] = this._keys[j];
    this._keys[j] = k;
    const v = this._vals[i];
    this._vals[i] = this._vals[j];
    this._vals[j] = v;
  }

  clear(): void {
    this._keys.length = 0;
    this._vals.length = 0;
  }

  /**
   * Hand over both backing arrays and start again empty.
   * The caller owns the returned arrays.
   */
  detach(): [K[], V[]] {
    const detached: [K[], V[]] = [this._keys, this._vals];
    this._keys = [];
    this._vals = [];
    return detached;
  }
}
