/***
 *
 * Query — Conjunctive "has every one of these types" lookups.
 *
 * The membership set with the fewest entities drives the scan; every
 * candidate is then checked against the remaining types through O(1)
 * component-list lookups. Results are sorted by ascending entity id, so
 * they don't depend on the sets' internal dense order.
 *
 * The engine only reads. It sees the world through MembershipIndex,
 * which keeps it testable against a hand-built index.
 *
 ***/

import { NULL_SLOT } from "utils/constants";
import type { ReadonlySparseSet } from "type_primitives";
import type { EntityID } from "../entity/entity";
import type { TypeID } from "../component/component";

export interface MembershipIndex {
  /** Entities holding a component of `type`. */
  membership(type: TypeID): ReadonlySparseSet<EntityID>;
  /** Slot of `entity` in the store of `type`, 0 when absent. */
  slot_of(entity: EntityID, type: TypeID): number;
}

/**
 * The requested type with the smallest membership set. Ties go to the
 * type requested first. `types` must not be empty.
 */
export function select_driver(
  types: readonly TypeID[],
  index: MembershipIndex,
): TypeID {
  let driver = types[0];
  let smallest = index.membership(driver).size;
  for (let i = 1; i < types.length; i++) {
    const size = index.membership(types[i]).size;
    if (size < smallest) {
      smallest = size;
      driver = types[i];
    }
  }
  return driver;
}

/** Entities that hold every type in `types`, ascending. Empty for no types. */
export function query_entities(
  types: readonly TypeID[],
  index: MembershipIndex,
): EntityID[] {
  if (types.length === 0) return [];

  const driver = select_driver(types, index);
  const matches: EntityID[] = [];

  for (const entity of index.membership(driver)) {
    let ok = true;
    for (let i = 0; i < types.length; i++) {
      const type = types[i];
      if (type !== driver && index.slot_of(entity, type) === NULL_SLOT) {
        ok = false;
        break;
      }
    }
    if (ok) matches.push(entity);
  }

  return matches.sort((a, b) => a - b);
}
