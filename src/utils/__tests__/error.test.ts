import { describe, expect, it } from "vitest";
import { AppError, ECSError, ECS_ERROR, is_ecs_error } from "../error";

describe("ECSError", () => {
  //=========================================================
  // Construction & properties
  //=========================================================

  it("stores the category", () => {
    const err = new ECSError(ECS_ERROR.ENTITY_NOT_ALIVE);
    expect(err.category).toBe(ECS_ERROR.ENTITY_NOT_ALIVE);
  });

  it("uses the category as message when none is given", () => {
    const err = new ECSError(ECS_ERROR.COMPONENT_NOT_PRESENT);
    expect(err.message).toBe("COMPONENT_NOT_PRESENT");
  });

  it("uses the provided message and context", () => {
    const err = new ECSError(ECS_ERROR.SLOT_OUT_OF_RANGE, "slot 9 is not live", {
      slot: 9,
    });
    expect(err.message).toBe("slot 9 is not live");
    expect(err.context).toEqual({ slot: 9 });
  });

  it("is operational and named after its class", () => {
    const err = new ECSError(ECS_ERROR.TYPE_NOT_REGISTERED);
    expect(err.is_operational).toBe(true);
    expect(err.name).toBe("ECSError");
  });

  it("extends AppError and Error", () => {
    const err = new ECSError(ECS_ERROR.REGISTRY_SEALED);
    expect(err).toBeInstanceOf(AppError);
    expect(err).toBeInstanceOf(Error);
  });

  //=========================================================
  // Configuration errors
  //=========================================================

  it("flags registration-time categories as configuration errors", () => {
    expect(new ECSError(ECS_ERROR.TYPE_CAPACITY_EXCEEDED).is_configuration_error).toBe(true);
    expect(new ECSError(ECS_ERROR.REGISTRY_SEALED).is_configuration_error).toBe(true);
    expect(new ECSError(ECS_ERROR.INVALID_OPTION).is_configuration_error).toBe(true);
  });

  it("does not flag precondition violations as configuration errors", () => {
    expect(new ECSError(ECS_ERROR.ENTITY_NOT_ALIVE).is_configuration_error).toBe(false);
    expect(new ECSError(ECS_ERROR.COMPONENT_NOT_PRESENT).is_configuration_error).toBe(false);
  });

  it("all ECS_ERROR members are distinct strings", () => {
    const values = Object.values(ECS_ERROR);
    expect(new Set(values).size).toBe(values.length);
  });

  //=========================================================
  // is_ecs_error guard
  //=========================================================

  it("is_ecs_error recognises ECSError only", () => {
    expect(is_ecs_error(new ECSError(ECS_ERROR.ENTITY_NOT_ALIVE))).toBe(true);
    expect(is_ecs_error(new Error("plain"))).toBe(false);
    expect(is_ecs_error(null)).toBe(false);
    expect(is_ecs_error({ category: ECS_ERROR.ENTITY_NOT_ALIVE })).toBe(false);
  });
});
