/***
 *
 * TypeRegistry — Explicit, append-only table of component kinds.
 *
 * Ids are issued in registration order starting at 0 and are never
 * reused. All registration happens in a startup phase the caller
 * controls: building a World seals the registry, and any later
 * register() call is a configuration error. Exceeding max_types is one
 * too. Both throw unconditionally.
 *
 * Usage:
 *
 *   const registry = new TypeRegistry();
 *   const Position = registry.register<{ x: number; y: number }>("Position", {
 *     create_default: () => ({ x: 0, y: 0 }),
 *   });
 *   const Name = registry.register<string>("Name");
 *
 *   const world = new World(registry);
 *
 ***/

import { is_positive_integer, unsafe_cast } from "type_primitives";
import { MAX_TYPES } from "utils/constants";
import { ECS_ERROR, ECSError } from "utils/error";
import { child_logger, type Logger } from "utils/logger";
import type {
  ComponentHook,
  ComponentHooks,
  ComponentType,
  TypeDescriptor,
  TypeID,
} from "./component";

export interface TypeRegistryOptions {
  /** Upper bound on registered kinds. Defaults to MAX_TYPES. */
  max_types?: number;
  logger?: Logger;
}

export interface RegisterOptions<T> extends ComponentHooks {
  /**
   * Builds the value the default create hook attaches. Without it (and
   * without a custom create hook) create is a no-op.
   */
  create_default?: () => T;
}

const noop_hook: ComponentHook = () => {};

export class TypeRegistry {
  private readonly entries: TypeDescriptor[] = [];
  private readonly max_types: number;
  private readonly log: Logger;
  private sealed = false;

  constructor(options?: TypeRegistryOptions) {
    const max_types = options?.max_types ?? MAX_TYPES;
    if (!is_positive_integer(max_types) || max_types > MAX_TYPES) {
      throw new ECSError(
        ECS_ERROR.INVALID_OPTION,
        `max_types must be an integer in [1, ${MAX_TYPES}], got ${max_types}`,
        { max_types },
      );
    }
    this.max_types = max_types;
    this.log = child_logger("registry", options?.logger);
  }

  //=========================================================
  // Queries
  //=========================================================

  /** Number of registered kinds. */
  public get count(): number {
    return this.entries.length;
  }

  public get is_sealed(): boolean {
    return this.sealed;
  }

  public has(id: number): boolean {
    return Number.isInteger(id) && id >= 0 && id < this.entries.length;
  }

  /** Descriptor of a registered type. Throws TYPE_NOT_REGISTERED otherwise. */
  public describe(id: TypeID): TypeDescriptor {
    if (!this.has(id)) {
      throw new ECSError(
        ECS_ERROR.TYPE_NOT_REGISTERED,
        `Type ${id} is not registered`,
        { type: id, count: this.entries.length },
      );
    }
    return this.entries[id];
  }

  public label(id: TypeID): string {
    return this.describe(id).label;
  }

  /** All descriptors in id order. */
  public descriptors(): readonly TypeDescriptor[] {
    return this.entries;
  }

  //=========================================================
  // Registration
  //=========================================================

  /**
   * Register a component kind and return its typed handle.
   *
   * Hooks left out get the defaults: create attaches
   * `create_default()` when given, destroy removes the component
   * (a no-op when the entity has none), draw does nothing.
   */
  public register<T>(
    label: string,
    options: RegisterOptions<T> = {},
  ): ComponentType<T> {
    if (this.sealed) {
      throw new ECSError(
        ECS_ERROR.REGISTRY_SEALED,
        `Cannot register "${label}": the registry is already in use by a world`,
        { label },
      );
    }
    if (this.entries.length >= this.max_types) {
      throw new ECSError(
        ECS_ERROR.TYPE_CAPACITY_EXCEEDED,
        `Cannot register "${label}": limit of ${this.max_types} component types reached`,
        { label, max_types: this.max_types },
      );
    }

    const type = unsafe_cast<ComponentType<T>>(this.entries.length);
    const { create_default } = options;

    const create: ComponentHook =
      options.create ??
      (create_default !== undefined
        ? (world, entity) => world.add_component(entity, type, create_default())
        : noop_hook);
    const destroy: ComponentHook =
      options.destroy ?? ((world, entity) => world.remove_component(entity, type));
    const draw: ComponentHook = options.draw ?? noop_hook;

    this.entries.push(Object.freeze({ id: type, label, create, destroy, draw }));
    this.log.debug({ type, label }, "component type registered");

    return type;
  }

  /** Close the registration phase. Idempotent. */
  public seal(): void {
    if (this.sealed) return;
    this.sealed = true;
    this.log.debug({ count: this.entries.length }, "type registry sealed");
  }
}
