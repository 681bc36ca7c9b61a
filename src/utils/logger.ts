/***
 * Logger — pino root logger shared by the registry and every world.
 *
 * Level comes from ECS_LOG_LEVEL (default "warn", "silent" disables
 * output; unknown names fall back to the default). Modules log through a child bound to a `component` field so
 * output can be filtered per subsystem.
 *
 ***/

import pino, { type Logger } from "pino";
import { DEFAULT_LOG_LEVEL, LOG_LEVEL_ENV } from "./constants";

export type { Logger };

/** `level` when pino knows it, else the default. */
export function resolve_log_level(level: string | undefined): string {
  if (level === undefined) return DEFAULT_LOG_LEVEL;
  if (level === "silent" || level in pino.levels.values) return level;
  return DEFAULT_LOG_LEVEL;
}

export function create_logger(
  level: string | undefined = process.env[LOG_LEVEL_ENV],
): Logger {
  return pino({ name: "slot-ecs", level: resolve_log_level(level) });
}

export const logger: Logger = create_logger();

export function child_logger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
