/***
 * World — Public facade over the entity table, dense stores and
 * membership sets.
 *
 * Callers go through World only. It keeps three structures in step on
 * every change:
 *
 *   - the entity table: entity → component list (type id → slot, 0 = none)
 *   - one DenseStore per type: packed values, swap-removed
 *   - one membership set per type: exactly the entities with a slot ≠ 0
 *
 * Removing a component swap-removes it from its store; if another
 * entity's value moved into the hole, that entity's list entry is
 * repointed to the hole's slot. Destroying an entity does this for each
 * of its components, then frees the id.
 *
 * Single-threaded and synchronous. Nothing here is safe against
 * concurrent mutation; embedders must serialise writers.
 *
 * Usage:
 *
 *   const registry = new TypeRegistry();
 *   const Position = registry.register<{ x: number; y: number }>("Position");
 *   const Velocity = registry.register<{ dx: number; dy: number }>("Velocity");
 *
 *   const world = new World(registry);
 *   const e = world.create_entity();
 *   world.add_components(e, [Position, { x: 0, y: 0 }], [Velocity, { dx: 1, dy: 0 }]);
 *
 *   for (const id of world.entities_with_components(Position, Velocity)) {
 *     const pos = world.get_component(id, Position);
 *     pos.x += world.get_component(id, Velocity).dx;
 *   }
 *
 ***/

import {
  SparseSet,
  is_positive_integer,
  unsafe_cast,
  type ReadonlySparseSet,
} from "type_primitives";
import { DEFAULT_MEMBERSHIP_CAPACITY, NULL_ENTITY, NULL_SLOT } from "utils/constants";
import { ECS_ERROR, ECSError } from "utils/error";
import { child_logger, type Logger } from "utils/logger";
import { EntityTable } from "./entity/entity_table";
import type { EntityID } from "./entity/entity";
import type { ComponentList } from "./entity/entity_table";
import type {
  ComponentType,
  HookName,
  TypeID,
} from "./component/component";
import type { TypeRegistry } from "./component/type_registry";
import { DenseStore, type StorageHandle } from "./store/dense_store";
import { query_entities, type MembershipIndex } from "./query/query";

export interface WorldOptions {
  /** Initial sparse capacity of each membership set. */
  initial_capacity?: number;
  logger?: Logger;
}

/** One `[type, value]` pair per component for add_components. */
export type ComponentEntries<V extends readonly unknown[]> = {
  [K in keyof V]: readonly [ComponentType<V[K]>, V[K]];
};

/**
 * Whether destroy_entity may go ahead. A dead target throws
 * ENTITY_NOT_ALIVE when `strict` (dev builds), otherwise it is logged
 * and skipped.
 */
export function check_destroy_target(
  alive: boolean,
  entity: EntityID,
  strict: boolean,
  log: Logger,
): boolean {
  if (alive) return true;
  if (strict) {
    throw new ECSError(
      ECS_ERROR.ENTITY_NOT_ALIVE,
      `Cannot destroy entity ${entity}: not alive`,
      { entity },
    );
  }
  log.warn({ entity }, "destroy of an entity that is not alive");
  return false;
}

export class World implements MembershipIndex {
  private readonly registry: TypeRegistry;
  private readonly entities = new EntityTable();
  // Indexed by TypeID
  private readonly stores: DenseStore<unknown>[] = [];
  private readonly members: SparseSet<EntityID>[] = [];
  private readonly member_views: ReadonlySparseSet<EntityID>[] = [];
  private readonly log: Logger;

  constructor(registry: TypeRegistry, options?: WorldOptions) {
    registry.seal();
    this.registry = registry;
    this.log = options?.logger ?? child_logger("world");

    const capacity = options?.initial_capacity ?? DEFAULT_MEMBERSHIP_CAPACITY;
    if (!is_positive_integer(capacity)) {
      throw new ECSError(
        ECS_ERROR.INVALID_OPTION,
        `initial_capacity must be a positive integer, got ${capacity}`,
        { initial_capacity: capacity },
      );
    }

    for (const descriptor of registry.descriptors()) {
      const members = new SparseSet<EntityID>(capacity);
      this.stores.push(new DenseStore<unknown>(descriptor.id));
      this.members.push(members);
      this.member_views.push(members.view());
    }

    this.log.debug({ types: registry.count }, "world created");
  }

  //=========================================================
  // Entities
  //=========================================================

  /** Number of live entities. */
  public get entity_count(): number {
    return this.entities.count;
  }

  public is_alive(entity: EntityID): boolean {
    return this.entities.is_alive(entity);
  }

  /** New entity with no components. May reuse a destroyed entity's id. */
  public create_entity(): EntityID {
    return this.entities.create();
  }

  /** Remove every component of `entity`, then free its id. */
  public destroy_entity(entity: EntityID): void {
    if (!check_destroy_target(this.entities.is_alive(entity), entity, __DEV__, this.log)) {
      return;
    }

    const list = this.entities.component_list_of(entity);
    for (let type = 0; type < list.length; type++) {
      const slot = list[type];
      if (slot !== NULL_SLOT) this.detach(entity, list, type, slot);
    }
    this.entities.destroy(entity);
  }

  //=========================================================
  // Component mutation
  //=========================================================

  /**
   * Attach `value` to `entity`. If the entity already has a component
   * of this type the value is overwritten in place: no new slot, no
   * membership change.
   */
  public add_component<T>(
    entity: EntityID,
    type: ComponentType<T>,
    value: T,
  ): void {
    this.check_type(type);
    const list = this.entities.component_list_of(entity, type);
    const store = this.store_of(type);
    const slot = list[type];

    if (slot !== NULL_SLOT) {
      store.set(slot, value);
      return;
    }

    list[type] = store.insert(entity, value);
    this.members[type].add(entity);
  }

  /** Sequential add_component calls on the same entity. */
  public add_components<V extends readonly unknown[]>(
    entity: EntityID,
    ...entries: ComponentEntries<V>
  ): void {
    for (let i = 0; i < entries.length; i++) {
      const [type, value] = entries[i];
      this.add_component(entity, type, value);
    }
  }

  /** Detach the component of `type`. No-op if the entity has none. */
  public remove_component(entity: EntityID, type: TypeID): void {
    this.check_type(type);
    const list = this.entities.component_list_of(entity);
    if (type >= list.length) return;
    const slot = list[type];
    if (slot === NULL_SLOT) return;
    this.detach(entity, list, type, slot);
  }

  /** Drop every entity and component; registered types are kept. */
  public clear(): void {
    this.entities.clear();
    for (let type = 0; type < this.stores.length; type++) {
      const store: StorageHandle = this.stores[type];
      store.clear();
      this.members[type].clear();
    }
    this.log.debug("world cleared");
  }

  //=========================================================
  // Component access
  //=========================================================

  public has_component(entity: EntityID, type: TypeID): boolean {
    this.check_alive(entity);
    return this.entities.slot_of(entity, type) !== NULL_SLOT;
  }

  /** True when `entity` has every listed type. Stops at the first miss. */
  public has_components(entity: EntityID, ...types: TypeID[]): boolean {
    this.check_alive(entity);
    for (let i = 0; i < types.length; i++) {
      if (this.entities.slot_of(entity, types[i]) === NULL_SLOT) return false;
    }
    return true;
  }

  /**
   * Value of `type` on `entity`.
   *
   * Throws COMPONENT_NOT_PRESENT when the entity has none, and
   * ENTITY_NOT_ALIVE for a dead id. Hot loops that already know the
   * component exists can use get_component_unchecked.
   */
  public get_component<T>(entity: EntityID, type: ComponentType<T>): T {
    this.check_type(type);
    const list = this.entities.component_list_of(entity);
    const slot = type < list.length ? list[type] : NULL_SLOT;
    if (slot === NULL_SLOT) {
      throw new ECSError(
        ECS_ERROR.COMPONENT_NOT_PRESENT,
        `Entity ${entity} has no "${this.registry.label(type)}" component`,
        { entity, type },
      );
    }
    return this.store_of(type).get(slot);
  }

  /**
   * Value of `type` on `entity` without liveness or presence checks.
   * Undefined when the entity has no such component.
   */
  public get_component_unchecked<T>(
    entity: EntityID,
    type: ComponentType<T>,
  ): T | undefined {
    return this.store_of(type).at(this.entities.slot_of(entity, type));
  }

  /** Slot of `entity` in the store of `type`; 0 when absent. */
  public slot_of(entity: EntityID, type: TypeID): number {
    return this.entities.slot_of(entity, type);
  }

  /** Value at a raw store slot, or undefined when the slot is not live. */
  public component_at<T>(type: ComponentType<T>, slot: number): T | undefined {
    this.check_type(type);
    return this.store_of(type).at(slot);
  }

  /**
   * Every live value of `type`, in store order (not entity order). This
   * is a live view: it changes as components are added and removed.
   */
  public components_of_type<T>(type: ComponentType<T>): readonly T[] {
    this.check_type(type);
    return this.store_of(type).values;
  }

  /** Number of live components of `type`. */
  public component_count(type: TypeID): number {
    this.check_type(type);
    return this.stores[type].size;
  }

  //=========================================================
  // Queries
  //=========================================================

  /** Entities holding `type`, ascending by id. */
  public entities_with_component(type: TypeID): EntityID[] {
    this.check_type(type);
    return this.members[type].to_sorted();
  }

  /** Entities holding every listed type, ascending by id. */
  public entities_with_components(...types: TypeID[]): EntityID[] {
    for (let i = 0; i < types.length; i++) this.check_type(types[i]);
    return query_entities(types, this);
  }

  /** Read-only view of the entities holding `type`, in set order. */
  public membership(type: TypeID): ReadonlySparseSet<EntityID> {
    this.check_type(type);
    return this.member_views[type];
  }

  //=========================================================
  // Hook dispatch by id
  //=========================================================

  // Hooks run whether or not the entity holds the component, so they
  // must tolerate its absence.

  public invoke_create(type: TypeID, entity: EntityID): void {
    this.registry.describe(type).create(this, entity);
  }

  public invoke_destroy(type: TypeID, entity: EntityID): void {
    this.registry.describe(type).destroy(this, entity);
  }

  public invoke_draw(type: TypeID, entity: EntityID): void {
    this.registry.describe(type).draw(this, entity);
  }

  /** Run one hook of every registered type on `entity`, in id order. */
  public sweep(hook: HookName, entity: EntityID): void {
    const descriptors = this.registry.descriptors();
    for (let i = 0; i < descriptors.length; i++) {
      descriptors[i][hook](this, entity);
    }
  }

  //=========================================================
  // Internal
  //=========================================================

  /**
   * Swap-remove `entity`'s value of `type` and repoint whichever entity
   * owned the value that moved into its slot.
   */
  private detach(
    entity: EntityID,
    list: ComponentList,
    type: number,
    slot: number,
  ): void {
    const store: StorageHandle = this.stores[type];
    const moved = store.remove_at(slot);
    if (moved !== NULL_ENTITY) {
      this.entities.component_list_of(moved)[type] = slot;
    }
    list[type] = NULL_SLOT;
    this.members[type].delete(entity);
  }

  // Stores are created from the registry in id order, so the store at
  // index `type` was built for ComponentType<T>.
  private store_of<T>(type: ComponentType<T>): DenseStore<T> {
    return unsafe_cast<DenseStore<T>>(this.stores[type]);
  }

  private check_type(type: TypeID): void {
    if (__DEV__ && !(type >= 0 && type < this.stores.length)) {
      throw new ECSError(
        ECS_ERROR.TYPE_NOT_REGISTERED,
        `Type ${type} is not registered with this world`,
        { type, count: this.stores.length },
      );
    }
  }

  private check_alive(entity: EntityID): void {
    if (__DEV__ && !this.entities.is_alive(entity)) {
      throw new ECSError(
        ECS_ERROR.ENTITY_NOT_ALIVE,
        `Entity ${entity} is not alive`,
        { entity },
      );
    }
  }
}
