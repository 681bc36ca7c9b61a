// World
export { World, type WorldOptions, type ComponentEntries } from "./world";

// Registry
export {
  TypeRegistry,
  type TypeRegistryOptions,
  type RegisterOptions,
} from "./component/type_registry";

// Components
export { as_type_id } from "./component/component";
export type {
  TypeID,
  ComponentType,
  ComponentHook,
  ComponentHooks,
  HookName,
  TypeDescriptor,
} from "./component/component";

// Entities
export { as_entity_id, NULL_ENTITY_ID, is_null_entity } from "./entity/entity";
export type { EntityID } from "./entity/entity";

// Storage
export { DenseStore, type StorageHandle } from "./store/dense_store";

// Queries
export { query_entities, select_driver, type MembershipIndex } from "./query/query";
export type { ReadonlySparseSet } from "./type_primitives";

// Errors
export { ECSError, ECS_ERROR, AppError, is_ecs_error } from "./utils/error";

// Logging
export { create_logger, type Logger } from "./utils/logger";
