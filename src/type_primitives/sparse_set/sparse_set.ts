/***
 *
 * SparseSet — O(1) integer-key set with packed iteration
 *
 * Keys are non-negative integers, optionally branded (SparseSet<EntityID>).
 * A dense array holds members packed at 0..size-1; a sparse Int32Array
 * maps key → dense position for O(1) membership and O(1) deletion via
 * swap-and-pop.
 *
 * Dense order is insertion order perturbed by deletions, so it is not a
 * stable ordering. Callers that hand results to the outside world use
 * to_sorted() instead.
 *
 ***/

const ABSENT = -1;
const INITIAL_CAPACITY = 64;

/** Membership reads only; what a set's owner hands to outside code. */
export interface ReadonlySparseSet<K extends number = number> extends Iterable<K> {
  readonly size: number;
  has(key: number): boolean;
  to_sorted(): K[];
}

export class SparseSet<K extends number = number> implements ReadonlySparseSet<K> {
  private _dense: K[] = [];
  private _sparse: Int32Array;
  private _capacity: number;

  constructor(initial_capacity = INITIAL_CAPACITY) {
    this._capacity = Math.max(1, initial_capacity);
    this._sparse = new Int32Array(this._capacity).fill(ABSENT);
  }

  get size(): number {
    return this._dense.length;
  }

  /** Live view of members in dense order. Do not mutate. */
  get values(): readonly K[] {
    return this._dense;
  }

  has(key: number): boolean {
    return key >= 0 && key < this._capacity && this._sparse[key] !== ABSENT;
  }

  /** Add key. No-op if already present. */
  add(key: K): void {
    if (this.has(key)) return;
    this._ensure(key);
    this._sparse[key] = this._dense.length;
    this._dense.push(key);
  }

  /**
   * Remove key via swap-and-pop.
   * Returns true if the key was present.
   */
  delete(key: K): boolean {
    if (!this.has(key)) return false;
    const row = this._sparse[key];
    const last = this._dense[this._dense.length - 1];
    this._dense[row] = last;
    this._sparse[last] = row;
    this._dense.pop();
    this._sparse[key] = ABSENT;
    return true;
  }

  clear(): void {
    for (let i = 0; i < this._dense.length; i++) {
      this._sparse[this._dense[i]] = ABSENT;
    }
    this._dense.length = 0;
  }

  /** Fresh array of members in ascending key order. */
  to_sorted(): K[] {
    return this._dense.slice().sort((a, b) => a - b);
  }

  [Symbol.iterator](): Iterator<K> {
    return this._dense[Symbol.iterator]();
  }

  /**
   * Frozen view over this set. It tracks later changes but exposes no
   * mutators, so the owner stays the only writer.
   */
  view(): ReadonlySparseSet<K> {
    const set = this;
    return Object.freeze({
      get size(): number {
        return set.size;
      },
      has: (key: number): boolean => set.has(key),
      to_sorted: (): K[] => set.to_sorted(),
      [Symbol.iterator]: (): Iterator<K> => set[Symbol.iterator](),
    });
  }

  //=========================================================
  // Internal
  //=========================================================

  private _ensure(key: number): void {
    if (key < this._capacity) return;
    let cap = this._capacity;
    while (cap <= key) cap *= 2;
    const next = new Int32Array(cap).fill(ABSENT);
    next.set(this._sparse);
    this._sparse = next;
    this._capacity = cap;
  }
}
