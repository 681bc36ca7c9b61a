/***
 * Brand — Nominal typing for TypeScript.
 *
 * Brand<T, Name> intersects T with a phantom readonly symbol property
 * tagged with Name. The symbol never exists at runtime; it only stops
 * structurally identical types from being assigned to one another.
 *
 * EntityID and TypeID are both plain numbers at runtime, but
 * Brand<number, "entity_id"> and Brand<number, "type_id"> do not mix
 * at compile time, so an entity can't be passed where a type id goes.
 *
 ***/

declare const brand: unique symbol;

export type Brand<T, BrandName extends string> = T & {
  readonly [brand]: BrandName;
};
