import { describe, expect, it } from "vitest";
import {
  is_non_negative_integer,
  is_positive_integer,
  unsafe_cast,
  validate_and_cast,
} from "../assertions";
import { TypeError, TYPE_ERROR } from "../error";

describe("assertions", () => {
  //=========================================================
  // predicates
  //=========================================================

  it("is_non_negative_integer accepts zero and positive integers", () => {
    expect(is_non_negative_integer(0)).toBe(true);
    expect(is_non_negative_integer(65_535)).toBe(true);
  });

  it("is_non_negative_integer rejects negatives, fractions and non-finite", () => {
    expect(is_non_negative_integer(-1)).toBe(false);
    expect(is_non_negative_integer(1.5)).toBe(false);
    expect(is_non_negative_integer(NaN)).toBe(false);
    expect(is_non_negative_integer(Infinity)).toBe(false);
  });

  it("is_positive_integer rejects zero", () => {
    expect(is_positive_integer(0)).toBe(false);
    expect(is_positive_integer(1)).toBe(true);
    expect(is_positive_integer(2.5)).toBe(false);
  });

  //=========================================================
  // validate_and_cast
  //=========================================================

  it("validate_and_cast returns the value when validation passes", () => {
    expect(validate_and_cast(42, is_non_negative_integer, "id")).toBe(42);
  });

  it("validate_and_cast throws a VALIDATION_FAIL_CONDITION TypeError", () => {
    let caught: unknown;
    try {
      validate_and_cast(-1, is_non_negative_integer, "id");
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(TypeError);
    if (caught instanceof TypeError) {
      expect(caught.category).toBe(TYPE_ERROR.VALIDATION_FAIL_CONDITION);
      expect(caught.message).toBe("Expected value to meet validation: id");
      expect(caught.is_operational).toBe(false);
    }
  });

  //=========================================================
  // unsafe_cast
  //=========================================================

  it("unsafe_cast returns the same reference", () => {
    const obj = { x: 1 };
    expect(unsafe_cast<{ x: number }>(obj)).toBe(obj);
  });
});
