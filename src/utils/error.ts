export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export enum ECS_ERROR {
  // Configuration: raised while registering types, before any world runs
  TYPE_CAPACITY_EXCEEDED = "TYPE_CAPACITY_EXCEEDED",
  REGISTRY_SEALED = "REGISTRY_SEALED",
  INVALID_OPTION = "INVALID_OPTION",
  // Caller precondition violations
  TYPE_NOT_REGISTERED = "TYPE_NOT_REGISTERED",
  ENTITY_NOT_ALIVE = "ENTITY_NOT_ALIVE",
  COMPONENT_NOT_PRESENT = "COMPONENT_NOT_PRESENT",
  SLOT_OUT_OF_RANGE = "SLOT_OUT_OF_RANGE",
}

const CONFIGURATION_ERRORS: ReadonlySet<ECS_ERROR> = new Set([
  ECS_ERROR.TYPE_CAPACITY_EXCEEDED,
  ECS_ERROR.REGISTRY_SEALED,
  ECS_ERROR.INVALID_OPTION,
]);

export class ECSError extends AppError {
  constructor(
    public readonly category: ECS_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }

  /** Raised during startup; the process should not carry on. */
  public get is_configuration_error(): boolean {
    return CONFIGURATION_ERRORS.has(this.category);
  }
}

export function is_ecs_error(error: unknown): error is ECSError {
  return error instanceof ECSError;
}
