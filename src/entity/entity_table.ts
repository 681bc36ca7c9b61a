/***
 *
 * EntityTable — Entity id allocator and per-entity component lists.
 *
 * Each live entity owns a ComponentList: an array indexed by TypeID whose
 * value is the entity's slot in that type's DenseStore, or 0 when the
 * entity has no such component. Lists grow lazily as higher type ids
 * are touched.
 *
 * Rows live in a SlotArena, so ids are recycled oldest-first and id 0 is
 * never issued. A recycled id always starts from a fresh, empty list.
 *
 ***/

import { SlotArena, unsafe_cast } from "type_primitives";
import { NULL_SLOT } from "utils/constants";
import { ECS_ERROR, ECSError } from "utils/error";
import type { EntityID } from "./entity";

export type ComponentList = number[];

export class EntityTable {
  private readonly rows = new SlotArena<ComponentList>();

  //=========================================================
  // Queries
  //=========================================================

  /** Number of live entities. */
  public get count(): number {
    return this.rows.size;
  }

  /** Highest entity id issued so far. */
  public get high_water(): number {
    return this.rows.high_water;
  }

  public is_alive(id: EntityID): boolean {
    return this.rows.has(id);
  }

  /**
   * Mutable component list of a live entity. When `type` is given the
   * list is zero-filled up to and including that index first.
   *
   * Throws ENTITY_NOT_ALIVE for a destroyed or never-issued id.
   */
  public component_list_of(id: EntityID, type?: number): ComponentList {
    const list = this.rows.get(id);
    if (list === undefined) {
      throw new ECSError(
        ECS_ERROR.ENTITY_NOT_ALIVE,
        `Entity ${id} is not alive`,
        { entity: id },
      );
    }
    if (type !== undefined) {
      while (list.length <= type) list.push(NULL_SLOT);
    }
    return list;
  }

  /** Slot of `id` in the store of `type`; 0 when absent or not alive. */
  public slot_of(id: EntityID, type: number): number {
    const list = this.rows.get(id);
    if (list === undefined || type >= list.length) return NULL_SLOT;
    return list[type];
  }

  //=========================================================
  // Mutations
  //=========================================================

  public create(): EntityID {
    return unsafe_cast<EntityID>(this.rows.insert([]));
  }

  /**
   * Release an id to the free queue. The caller must have removed the
   * entity's components first. Returns false if it was not alive.
   */
  public destroy(id: EntityID): boolean {
    const list = this.rows.get(id);
    if (list === undefined) return false;
    list.length = 0;
    return this.rows.remove(id);
  }

  public clear(): void {
    this.rows.clear();
  }
}
