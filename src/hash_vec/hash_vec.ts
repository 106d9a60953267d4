/***
 *
 * HashVec — insertion-ordered map with O(1) positional access
 *
 * Entries live in an OrderedStore (dense, positional) and a PositionIndex
 * maps every key to its current position. Both are private: every
 * mutation below updates them together, so after each public call
 *
 *   - index.size === store.size
 *   - index[key] === i  ⇔  store.keys[i] === key
 *   - no two entries share a key
 *
 * Each operation validates its arguments before touching either
 * structure, so a throw leaves the container as it was.
 *
 * Values are handed out by reference. Structural mutation (anything that
 * adds, removes or moves an entry) while iterating is a precondition
 * violation; dev builds detect it through _version.
 *
 ***/

import {
  OrderedStore,
  PositionIndex,
  assert_insert_position,
  assert_position,
  dev_assert,
  identity_hasher,
  type KeyHasher,
} from "type_primitives";
import { TO_STRING_PREVIEW } from "utils/constants";
import { format_value } from "utils/format";
import { HASH_VEC_ERROR, HashVecError } from "utils/error";

export type Entry<K, V> = [K, V];

export interface HashVecOptions<K> {
  /**
   * Maps a key to the value the index compares keys by. Defaults to the
   * key itself (SameValueZero, objects by reference).
   */
  hash_key?: KeyHasher<K>;
}

export class HashVec<K, V> implements Iterable<Entry<K, V>> {
  private readonly _store = new OrderedStore<K, V>();
  private readonly _index: PositionIndex<K>;
  // Bumped on every add, remove or move; read by dev-mode iterators.
  private _version = 0;

  constructor(options: HashVecOptions<K> = {}) {
    this._index = new PositionIndex<K>(options.hash_key ?? identity_hasher);
  }

  /**
   * Build from pairs with push semantics: a repeated key keeps the last
   * value, at the position of its last occurrence.
   */
  static from<K, V>(
    pairs: Iterable<readonly [K, V]>,
    options?: HashVecOptions<K>,
  ): HashVec<K, V> {
    const hv = new HashVec<K, V>(options);
    for (const pair of pairs) hv.push(pair);
    return hv;
  }

  get size(): number {
    return this._store.size;
  }

  is_empty(): boolean {
    return this._store.size === 0;
  }

  //=========================================================
  // Lookup
  //=========================================================

  contains_key(key: K): boolean {
    return this._index.has(key);
  }

  get(key: K): V | undefined {
    const i = this._index.lookup(key);
    return i === undefined ? undefined : this._store.values[i];
  }

  index_of(key: K): number | undefined {
    return this._index.lookup(key);
  }

  /** Entry at a position. Throws INDEX_OUT_OF_RANGE outside [0, size). */
  at(position: number): Entry<K, V> {
    assert_position(position, this._store.size, "at");
    return [this._store.keys[position], this._store.values[position]];
  }

  key_at(position: number): K {
    return this._store.key_at(position);
  }

  value_at(position: number): V {
    return this._store.value_at(position);
  }

  //=========================================================
  // Insertion
  //=========================================================

  /** Upsert in place: an existing key keeps its position. */
  insert(key: K, value: V): void {
    const i = this._index.lookup(key);
    if (i !== undefined) {
      this._store.set_value(i, value);
      return;
    }
    this._index.set(key, this._store.append(key, value));
    this._version++;
  }

  /** Upsert at the end: an existing key is removed first, then appended. */
  push(entry: readonly [K, V]): void {
    const [key, value] = entry;
    const i = this._index.lookup(key);
    if (i !== undefined) this._remove_at(i);
    this._index.set(key, this._store.append(key, value));
    this._version++;
  }

  /**
   * Place an entry at `position`. An existing entry with the same key is
   * removed first, and `position` is read against what remains, so it must
   * lie in [0, size] of the container without that entry.
   */
  insert_at(position: number, key: K, value: V): void {
    const existing = this._index.lookup(key);
    const remaining =
      existing === undefined ? this._store.size : this._store.size - 1;
    assert_insert_position(position, remaining, "insert_at");

    if (existing !== undefined) this._remove_at(existing);
    this._store.insert_at(position, key, value);
    this._index.shift_from(position, 1);
    this._index.set(key, position);
    this._version++;
  }

  //=========================================================
  // Mutation in place
  //=========================================================

  /**
   * Replace the value for `key` with `fn(value)`. Returns the new value,
   * or undefined when the key is absent (fn is not called).
   */
  update(key: K, fn: (value: V) => V): V | undefined {
    const i = this._index.lookup(key);
    if (i === undefined) return undefined;
    const next = fn(this._store.values[i]);
    this._store.set_value(i, next);
    return next;
  }

  set_at(position: number, value: V): void {
    this._store.set_value(position, value);
  }

  /**
   * Change an entry's key, keeping its position and value.
   * Returns false when `old_key` is absent. Throws KEY_ALREADY_EXISTS
   * when `new_key` already names a different entry.
   */
  rename(old_key: K, new_key: K): boolean {
    const i = this._index.lookup(old_key);
    if (i === undefined) return false;

    const j = this._index.lookup(new_key);
    if (j !== undefined && j !== i) {
      throw new HashVecError(
        HASH_VEC_ERROR.KEY_ALREADY_EXISTS,
        `rename: key ${format_value(new_key)} already exists at position ${j}`,
        { old_key, new_key, position: i, existing_position: j },
      );
    }

    this._store.set_key(i, new_key);
    this._index.remove(old_key);
    this._index.set(new_key, i);
    return true;
  }

  //=========================================================
  // Removal
  //=========================================================

  /** Remove by key, preserving the order of the rest. */
  remove(key: K): V | undefined {
    const entry = this.remove_entry(key);
    return entry === undefined ? undefined : entry[1];
  }

  remove_entry(key: K): Entry<K, V> | undefined {
    const i = this._index.lookup(key);
    if (i === undefined) return undefined;
    return this._remove_at(i);
  }

  pop(): Entry<K, V> | undefined {
    const entry = this._store.pop();
    if (entry === undefined) return undefined;
    this._index.remove(entry[0]);
    this._version++;
    return entry;
  }

  clear(): void {
    this._store.clear();
    this._index.clear();
    this._version++;
  }

  //=========================================================
  // Reordering
  //=========================================================

  /** Returns false, changing nothing, when either key is absent. */
  swap_keys(key_a: K, key_b: K): boolean {
    const i = this._index.lookup(key_a);
    const j = this._index.lookup(key_b);
    if (i === undefined || j === undefined) return false;
    this.swap_indices(i, j);
    return true;
  }

  /** Throws INDEX_OUT_OF_RANGE when either position is invalid. */
  swap_indices(i: number, j: number): void {
    const len = this._store.size;
    assert_position(i, len, "swap_indices");
    assert_position(j, len, "swap_indices");
    if (i === j) return;

    this._store.swap(i, j);
    this._index.set(this._store.keys[i], i);
    this._index.set(this._store.keys[j], j);
    this._version++;
  }

  /**
   * Move every entry of `other` to the end of this one, in order and with
   * push semantics. `other` is left empty.
   */
  append(other: HashVec<K, V>): void {
    if (other === this) return;
    const [keys, vals] = other._detach();
    for (let i = 0; i < keys.length; i++) this.push([keys[i], vals[i]]);
  }

  //=========================================================
  // Iteration
  //=========================================================

  [Symbol.iterator](): IterableIterator<Entry<K, V>> {
    return this.entries();
  }

  entries(): IterableIterator<Entry<K, V>> {
    const keys = this._store.keys;
    const vals = this._store.values;
    return this._walk<Entry<K, V>>(this._version, (i) => [keys[i], vals[i]]);
  }

  keys(): IterableIterator<K> {
    const keys = this._store.keys;
    return this._walk(this._version, (i) => keys[i]);
  }

  values(): IterableIterator<V> {
    const vals = this._store.values;
    return this._walk(this._version, (i) => vals[i]);
  }

  for_each(fn: (value: V, key: K, position: number) => void): void {
    const version = this._version;
    const keys = this._store.keys;
    const vals = this._store.values;
    for (let i = 0; i < keys.length; i++) {
      fn(vals[i], keys[i], i);
      this._check_version(version);
    }
  }

  /**
   * Empty the container at once and yield its former entries in order.
   * The container may be reused while the drain is being consumed.
   */
  drain(): IterableIterator<Entry<K, V>> {
    const [keys, vals] = this._detach();
    return (function* (): Generator<Entry<K, V>, void, undefined> {
      for (let i = 0; i < keys.length; i++) yield [keys[i], vals[i]];
    })();
  }

  to_array(): Entry<K, V>[] {
    const keys = this._store.keys;
    const vals = this._store.values;
    const out: Entry<K, V>[] = new Array(keys.length);
    for (let i = 0; i < keys.length; i++) out[i] = [keys[i], vals[i]];
    return out;
  }

  toString(): string {
    const n = this._store.size;
    if (n === 0) return "HashVec(0) {}";
    const shown = Math.min(n, TO_STRING_PREVIEW);
    const parts: string[] = [];
    for (let i = 0; i < shown; i++) {
      const key = format_value(this._store.keys[i]);
      parts.push(`${key} => ${format_value(this._store.values[i])}`);
    }
    const more = n > shown ? ", ..." : "";
    return `HashVec(${n}) { ${parts.join(", ")}${more} }`;
  }

  //=========================================================
  // Internal
  //=========================================================

  /** Remove position i and pull every later position down by one. */
  private _remove_at(i: number): Entry<K, V> {
    const entry = this._store.remove_at(i);
    this._index.remove(entry[0]);
    this._index.shift_from(i + 1, -1);
    this._version++;
    return entry;
  }

  private _detach(): [K[], V[]] {
    const detached = this._store.detach();
    this._index.clear();
    this._version++;
    return detached;
  }

  private *_walk<T>(
    version: number,
    project: (i: number) => T,
  ): Generator<T, void, undefined> {
    let i = 0;
    for (;;) {
      this._check_version(version);
      if (i >= this._store.size) return;
      yield project(i++);
    }
  }

  private _check_version(version: number): void {
    dev_assert(
      this._version === version,
      HASH_VEC_ERROR.CONCURRENT_MODIFICATION,
      "HashVec was structurally modified during iteration",
      { expected_version: version, actual_version: this._version },
    );
  }
}
