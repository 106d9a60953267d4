/***
 *
 * PositionIndex — key → position lookup
 *
 * A Map from the hashed key to the key's current position in an
 * OrderedStore. Positions are opaque integers here; keeping them in sync
 * with the store is the owner's job. shift_from exists to re-sync after
 * the store shifts its tail and is O(size).
 *
 * Keys go through a KeyHasher before reaching the Map. The default is
 * the identity, which gives Map's SameValueZero equality (objects by
 * reference). Structured keys compared by value need a hasher that maps
 * equal keys to the same primitive.
 *
 ***/

export type KeyHasher<K> = (key: K) => unknown;

export const identity_hasher = <K>(key: K): unknown => key;

export class PositionIndex<K> {
  private readonly _positions = new Map<unknown, number>();

  constructor(private readonly _hash: KeyHasher<K> = identity_hasher) {}

  get size(): number {
    return this._positions.size;
  }

  has(key: K): boolean {
    return this._positions.has(this._hash(key));
  }

  lookup(key: K): number | undefined {
    return this._positions.get(this._hash(key));
  }

  /** Insert or overwrite. O(1) amortised. */
  set(key: K, position: number): void {
    this._positions.set(this._hash(key), position);
  }

  /** Returns true if the key was present, false if it was absent. */
  remove(key: K): boolean {
    return this._positions.delete(this._hash(key));
  }

  /** Add delta to every recorded position >= threshold. */
  shift_from(threshold: number, delta: number): void {
    // Overwriting existing Map keys during iteration visits each once.
    for (const [hashed, position] of this._positions) {
      if (position >= threshold) this._positions.set(hashed, position + delta);
    }
  }

  clear(): void {
    this._positions.clear();
  }
}
