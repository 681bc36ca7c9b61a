/***
 *
 * DenseStore — Packed value array for one component kind.
 *
 * Values sit contiguously with no holes; each carries the id of the
 * entity that owns it. Slot numbers are 1-based: slot 0 is the reserved
 * "absent" marker that component lists use, and never holds a value.
 *
 * Removal swaps the last value into the hole and truncates, so exactly
 * one other value can change slot. remove_at() reports its owner so the
 * caller can repoint that entity's component list. Growth never moves a
 * value to a different slot; only removal does.
 *
 ***/

import { ECS_ERROR, ECSError } from "utils/error";
import { NULL_ENTITY, NULL_SLOT } from "utils/constants";
import { unsafe_cast } from "type_primitives";
import type { EntityID } from "../entity/entity";
import type { TypeID } from "../component/component";

/**
 * Type-erased view of a store: what generic code (entity destruction,
 * world reset) needs without knowing the value type.
 */
export interface StorageHandle {
  readonly type_id: TypeID;
  readonly size: number;
  remove_at(slot: number): EntityID;
  clear(): void;
}

const NO_OWNER = unsafe_cast<EntityID>(NULL_ENTITY);

export class DenseStore<T> implements StorageHandle {
  // slot s lives at index s - 1
  private readonly _values: T[] = [];
  private readonly _owners: EntityID[] = [];

  constructor(public readonly type_id: TypeID) {}

  /** Number of live values. */
  public get size(): number {
    return this._values.length;
  }

  /** Live view of values in slot order. Do not mutate the array. */
  public get values(): readonly T[] {
    return this._values;
  }

  /** Owners, parallel to values. */
  public get owners(): readonly EntityID[] {
    return this._owners;
  }

  public is_valid_slot(slot: number): boolean {
    return Number.isInteger(slot) && slot > NULL_SLOT && slot <= this._values.length;
  }

  //=========================================================
  // Access
  //=========================================================

  /** Value at `slot`, or undefined for slot 0 and out-of-range slots. */
  public at(slot: number): T | undefined {
    if (!this.is_valid_slot(slot)) return undefined;
    return this._values[slot - 1];
  }

  /** Value at a slot the caller knows is live. Range-checked in dev only. */
  public get(slot: number): T {
    if (__DEV__) this.check_slot(slot);
    return this._values[slot - 1];
  }

  /** Owner of `slot`, or the null entity. */
  public owner_at(slot: number): EntityID {
    if (!this.is_valid_slot(slot)) return NO_OWNER;
    return this._owners[slot - 1];
  }

  //=========================================================
  // Mutations
  //=========================================================

  /** Append a value owned by `owner`. Returns its slot. Amortised O(1). */
  public insert(owner: EntityID, value: T): number {
    this._values.push(value);
    this._owners.push(owner);
    return this._values.length;
  }

  /** Overwrite the value in a live slot, keeping its owner. */
  public set(slot: number, value: T): void {
    if (__DEV__) this.check_slot(slot);
    this._values[slot - 1] = value;
  }

  /**
   * Swap-remove the value at `slot`.
   *
   * Returns the owner of the value that moved into `slot`, or the null
   * entity when `slot` was the last one and nothing moved.
   */
  public remove_at(slot: number): EntityID {
    if (__DEV__) this.check_slot(slot);
    if (!this.is_valid_slot(slot)) return NO_OWNER;

    const row = slot - 1;
    const last_row = this._values.length - 1;

    if (row !== last_row) {
      this._values[row] = this._values[last_row];
      this._owners[row] = this._owners[last_row];
      this._values.pop();
      this._owners.pop();
      return this._owners[row];
    }

    this._values.pop();
    this._owners.pop();
    return NO_OWNER;
  }

  /** Drop every value; only the reserved slot 0 remains. */
  public clear(): void {
    this._values.length = 0;
    this._owners.length = 0;
  }

  //=========================================================
  // Internal
  //=========================================================

  private check_slot(slot: number): void {
    if (!this.is_valid_slot(slot)) {
      throw new ECSError(
        ECS_ERROR.SLOT_OUT_OF_RANGE,
        `Slot ${slot} is not live in store of type ${this.type_id}`,
        { type: this.type_id, slot, size: this._values.length },
      );
    }
  }
}
