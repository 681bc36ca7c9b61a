/***
 *
 * Component — Type ids, typed handles and hook descriptors.
 *
 * A ComponentType<T> is a phantom-typed handle: at runtime it's just a
 * TypeID (small integer), but at compile time it carries the value type
 * T, so world.add_component(e, Health, 10) and world.get_component(e,
 * Health) are checked without casts.
 *
 * Every registered type carries three hooks over (world, entity). They
 * let generic code act on "whatever this entity has of type t" knowing
 * only the id, e.g. a destroy sweep across every registered type.
 *
 ***/

import {
  type Brand,
  validate_and_cast,
  is_non_negative_integer,
} from "type_primitives";
import type { EntityID } from "../entity/entity";
import type { World } from "../world";

//=========================================================
// TypeID
//=========================================================
export type TypeID = Brand<number, "type_id">;
export const as_type_id = (value: number): TypeID =>
  validate_and_cast<number, TypeID>(
    value,
    is_non_negative_integer,
    "TypeID must be a non-negative integer",
  );

//=========================================================
// ComponentType<T> - phantom-typed handle
//=========================================================

declare const __value: unique symbol;

export type ComponentType<T> = TypeID & { readonly [__value]: T };

//=========================================================
// Hooks
//=========================================================

export type ComponentHook = (world: World, entity: EntityID) => void;

export type HookName = "create" | "destroy" | "draw";

export interface ComponentHooks {
  create?: ComponentHook;
  destroy?: ComponentHook;
  draw?: ComponentHook;
}

/** Immutable record stored for each registered type. */
export interface TypeDescriptor {
  readonly id: TypeID;
  readonly label: string;
  readonly create: ComponentHook;
  readonly destroy: ComponentHook;
  readonly draw: ComponentHook;
}
