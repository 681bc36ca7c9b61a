// Entity 0 and dense slot 0 are never live
export const NULL_ENTITY = 0;
export const NULL_SLOT = 0;

// Type ids fit an unsigned 16-bit integer
export const MAX_TYPES = 0xffff;

// Initial sparse capacity of each per-type membership set
export const DEFAULT_MEMBERSHIP_CAPACITY = 64;

// Logging
export const LOG_LEVEL_ENV = "ECS_LOG_LEVEL";
export const DEFAULT_LOG_LEVEL = "warn";
