import { describe, expect, it } from "vitest";
import {
  is_non_negative_integer,
  unsafe_cast,
  validate_and_cast,
} from "../assertions";
import { TypeError, TYPE_ERROR } from "../error";
import { as_entity_id } from "../../entity";
import { as_component_id } from "../../component";

describe("assertions", () => {
  //=========================================================
  // is_non_negative_integer
  //=========================================================

  it("accepts zero and positive integers", () => {
    expect(is_non_negative_integer(0)).toBe(true);
    expect(is_non_negative_integer(42)).toBe(true);
  });

  it("rejects negatives, fractions and non-finite numbers", () => {
    expect(is_non_negative_integer(-1)).toBe(false);
    expect(is_non_negative_integer(1.5)).toBe(false);
    expect(is_non_negative_integer(NaN)).toBe(false);
    expect(is_non_negative_integer(Infinity)).toBe(false);
  });

  //=========================================================
  // validate_and_cast
  //=========================================================

  it("returns the value unchanged when valid", () => {
    expect(validate_and_cast(7, is_non_negative_integer, "id")).toBe(7);
  });

  it("throws a VALIDATION_FAIL_CONDITION TypeError when invalid", () => {
    try {
      validate_and_cast(-3, is_non_negative_integer, "id");
      expect.unreachable("validate_and_cast should have thrown");
    } catch (e) {
      expect(e).toBeInstanceOf(TypeError);
      expect((e as TypeError).category).toBe(
        TYPE_ERROR.VALIDATION_FAIL_CONDITION,
      );
      expect((e as TypeError).message).toBe(
        "Expected value to meet validation: id",
      );
      expect((e as TypeError).is_operational).toBe(false);
    }
  });

  it("branded id constructors validate", () => {
    expect(as_entity_id(3)).toBe(3);
    expect(as_component_id(0)).toBe(0);
    expect(() => as_entity_id(-1)).toThrow(TypeError);
    expect(() => as_component_id(0.5)).toThrow(TypeError);
  });

  //=========================================================
  // unsafe_cast
  //=========================================================

  it("unsafe_cast returns the same reference", () => {
    const value = { x: 1 };
    expect(unsafe_cast<{ x: number }>(value)).toBe(value);
  });
});
