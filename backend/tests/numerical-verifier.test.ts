import { describe, expect, test } from "vitest";
import { relativeError, toleranceScore, verifyNumeric } from "../src/services/evaluation/numericalVerifier";

describe("relativeError", () => {
  test("is relative to the reference magnitude", () => {
    expect(relativeError(105, 100)).toBeCloseTo(0.05, 12);
    expect(relativeError(-90, -100)).toBeCloseTo(0.1, 12);
  });

  test("a zero reference only matches exactly", () => {
    expect(relativeError(0, 0)).toBe(0);
    expect(relativeError(1e-9, 0)).toBe(Number.POSITIVE_INFINITY);
  });
});

describe("toleranceScore", () => {
  test("full credit inside the tolerance band", () => {
    expect(toleranceScore(0, 0.05)).toBe(1);
    expect(toleranceScore(0.05, 0.05)).toBe(1);
  });

  test("falls linearly to zero at the falloff multiple", () => {
    expect(toleranceScore(0.1, 0.05, 4)).toBeCloseTo(2 / 3, 10);
    expect(toleranceScore(0.125, 0.05, 4)).toBeCloseTo(0.5, 10);
    expect(toleranceScore(0.2, 0.05, 4)).toBe(0);
    expect(toleranceScore(3, 0.05, 4)).toBe(0);
  });

  test("is non-increasing in the error", () => {
    const errors = [0, 0.01, 0.05, 0.06, 0.1, 0.15, 0.19, 0.2, 1, Number.POSITIVE_INFINITY];
    const scores = errors.map((e) => toleranceScore(e, 0.05));
    for (let i = 1; i < scores.length; i++) {
      expect(scores[i]).toBeLessThanOrEqual(scores[i - 1]);
    }
  });

  test("NaN error scores zero", () => {
    expect(toleranceScore(Number.NaN, 0.05)).toBe(0);
  });
});

describe("verifyNumeric", () => {
  test("exact answer earns full credit without a message", () => {
    const check = verifyNumeric(31_830_988.6, 31_830_988.6, 0.05);
    expect(check).toEqual({ score: 1, relative_error: 0, error_kind: null, message: undefined });
  });

  test("an answer outside tolerance explains the miss", () => {
    const check = verifyNumeric(110, 100, 0.05);
    expect(check.score).toBeCloseTo(2 / 3, 10);
    expect(check.message).toBe("Relative error 10.00% exceeds 5.00% tolerance");
    expect(check.error_kind).toBeNull();
  });

  test("non-numeric submissions are validation errors", () => {
    expect(verifyNumeric("31830988", 100, 0.05)).toEqual({
      score: 0,
      relative_error: null,
      error_kind: "ValidationError",
      message: "Expected a finite number, received string"
    });
    expect(verifyNumeric(undefined, 100, 0.05).message).toBe("No numeric answer submitted");
    expect(verifyNumeric(Number.NaN, 100, 0.05).error_kind).toBe("ValidationError");
    expect(verifyNumeric(Number.POSITIVE_INFINITY, 100, 0.05).score).toBe(0);
  });
});
