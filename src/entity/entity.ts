/***
 * Entity — Opaque integer handle.
 *
 * An EntityID is the index of the entity's row in the entity table.
 * 0 is the null sentinel and is never issued. Freed ids are handed out
 * again (no generation counter), so holding on to a destroyed id is a
 * caller bug that the table reports in dev builds.
 *
 ***/

import {
  type Brand,
  validate_and_cast,
  is_non_negative_integer,
} from "type_primitives";
import { NULL_ENTITY } from "utils/constants";

export type EntityID = Brand<number, "entity_id">;

export const as_entity_id = (value: number): EntityID =>
  validate_and_cast<number, EntityID>(
    value,
    is_non_negative_integer,
    "EntityID must be a non-negative integer",
  );

export const NULL_ENTITY_ID: EntityID = as_entity_id(NULL_ENTITY);

export const is_null_entity = (id: EntityID): boolean => id === NULL_ENTITY;
