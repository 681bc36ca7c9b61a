/***
 *
 * SlotArena — growable array with a FIFO queue of recycled indices.
 *
 * Index 0 is reserved as the null sentinel and is never handed out, so
 * a zero anywhere in the calling code always means "nothing". Removed
 * slots are cleared and their index queued; insert() drains the queue
 * oldest-first before growing the array.
 *
 *   insert(a) → 1, insert(b) → 2, remove(1), insert(c) → 1
 *
 ***/

export const NULL_INDEX = 0;

// Drop the consumed prefix of the free queue once it passes this size
// and makes up more than half of the queue.
const FREE_COMPACT_THRESHOLD = 32;

export class SlotArena<T extends object> {
  private items: (T | undefined)[] = [undefined];
  private free: number[] = [];
  private free_head = 0;
  private live = 0;

  /** Number of occupied slots. */
  public get size(): number {
    return this.live;
  }

  /** Highest index ever issued (0 when nothing was). */
  public get high_water(): number {
    return this.items.length - 1;
  }

  /** Number of indices waiting for reuse. */
  public get free_count(): number {
    return this.free.length - this.free_head;
  }

  public has(index: number): boolean {
    return (
      index > NULL_INDEX &&
      index < this.items.length &&
      this.items[index] !== undefined
    );
  }

  public get(index: number): T | undefined {
    if (index <= NULL_INDEX || index >= this.items.length) return undefined;
    return this.items[index];
  }

  /** Store value in the oldest free slot, or a new one. Returns its index. */
  public insert(value: T): number {
    let index: number;

    if (this.free_head < this.free.length) {
      index = this.free[this.free_head++];
      this.compact_free();
      this.items[index] = value;
    } else {
      index = this.items.length;
      this.items.push(value);
    }

    this.live++;
    return index;
  }

  /** Release a slot. Returns false if it was not occupied. */
  public remove(index: number): boolean {
    if (!this.has(index)) return false;
    this.items[index] = undefined;
    this.free.push(index);
    this.live--;
    return true;
  }

  public clear(): void {
    this.items = [undefined];
    this.free.length = 0;
    this.free_head = 0;
    this.live = 0;
  }

  //=========================================================
  // Internal
  //=========================================================

  private compact_free(): void {
    if (this.free_head === this.free.length) {
      this.free.length = 0;
      this.free_head = 0;
    } else if (
      this.free_head > FREE_COMPACT_THRESHOLD &&
      this.free_head * 2 > this.free.length
    ) {
      this.free.splice(0, this.free_head);
      this.free_head = 0;
    }
  }
}
