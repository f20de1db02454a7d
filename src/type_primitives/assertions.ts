/***
 * Assertions — Dev-only runtime validation and branded casting.
 *
 * Checks are guarded by __DEV__ and tree-shaken in production builds.
 * validate_and_cast checks a value in dev and returns it unchanged
 * (optionally as a narrower type). unsafe_cast skips every check and is
 * for callers that have already established validity.
 *
 ***/

import { TYPE_ERROR, TypeError } from "./error";

export const is_non_negative_integer = (v: number): boolean =>
  Number.isInteger(v) && v >= 0;

export const is_integer_in_range = (
  v: number,
  min: number,
  max: number,
): boolean => Number.isInteger(v) && v >= min && v <= max;

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
