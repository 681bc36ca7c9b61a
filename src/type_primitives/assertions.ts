/***
 * Assertions — Dev-only runtime validation and branded casting.
 *
 * Checks run only when __DEV__ is set and are stripped from production
 * builds. validate_and_cast is how branded ids are minted from user
 * input; unsafe_cast skips every check and is reserved for places where
 * the caller already guarantees validity (fresh allocator output, type
 * erased storage lookups keyed by a phantom-typed handle).
 *
 ***/

import { TYPE_ERROR, TypeError } from "./error";

export const is_non_negative_integer = (v: number): boolean =>
  Number.isInteger(v) && v >= 0;

export const is_positive_integer = (v: number): boolean =>
  Number.isInteger(v) && v > 0;

export function validate_and_cast<T, Result extends T = T>(
  value: T,
  validator: (v: T) => boolean,
  err_message: string,
): Result {
  if (__DEV__ && !validator(value)) {
    throw new TypeError(
      TYPE_ERROR.VALIDATION_FAIL_CONDITION,
      `Expected value to meet validation: ${err_message}`,
      { value },
    );
  }
  return value as Result;
}

export function unsafe_cast<T>(value: unknown): T {
  return value as T;
}
