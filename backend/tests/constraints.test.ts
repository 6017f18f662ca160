import { describe, expect, test } from "vitest";
import {
  checkAtLeast,
  checkAtMost,
  checkMembership,
  checkSafetyFactor,
  shaftShearStress
} from "../src/services/evaluation/constraints";
import { MATERIAL_YIELD_STRENGTH_PA } from "../src/eval/tasks/materials";
import { torqueFromPower } from "../src/eval/tasks/level2ShaftDesign";

const TORQUE = torqueFromPower(10_000, 1500);

describe("checkMembership", () => {
  test("known value passes", () => {
    const r = checkMembership("Steel_1020", MATERIAL_YIELD_STRENGTH_PA, "material");
    expect(r.score).toBe(1);
    expect(r.satisfied).toBe(true);
    expect(r.error_kind).toBeNull();
  });

  test("unknown value lists the allowed ones", () => {
    const r = checkMembership("Unobtainium", MATERIAL_YIELD_STRENGTH_PA, "material");
    expect(r.score).toBe(0);
    expect(r.error_kind).toBe("ValidationError");
    expect(r.message).toBe("Unobtainium is not one of: Steel_1020, Aluminum_6061-T6, Titanium_Ti-6Al-4V");
  });

  test("membership is case-sensitive", () => {
    expect(checkMembership("steel_1020", MATERIAL_YIELD_STRENGTH_PA, "material").score).toBe(0);
  });

  test("null is a missing field", () => {
    const r = checkMembership(null, MATERIAL_YIELD_STRENGTH_PA, "material");
    expect(r.error_kind).toBe("MissingField");
    expect(r.message).toBe("material is missing");
  });
});

describe("checkAtLeast", () => {
  test("meeting the threshold scores 1", () => {
    const r = checkAtLeast(0.3, 0.25, "deflection_reduction");
    expect(r.score).toBe(1);
    expect(r.observed).toEqual({ deflection_reduction: 0.3 });
  });

  test("shortfall scores the achieved fraction", () => {
    const r = checkAtLeast(0.2, 0.25, "deflection_reduction");
    expect(r.score).toBeCloseTo(0.8, 10);
    expect(r.satisfied).toBe(false);
    expect(r.error_kind).toBeNull();
  });

  test("negative progress floors at zero", () => {
    expect(checkAtLeast(-0.1, 0.25, "deflection_reduction").score).toBe(0);
  });

  test("missing observation", () => {
    expect(checkAtLeast(null, 0.25, "deflection_reduction").error_kind).toBe("MissingField");
  });
});

describe("checkAtMost", () => {
  test("within the limit scores 1", () => {
    expect(checkAtMost(0.1, 0.15, "mass_increase").score).toBe(1);
    expect(checkAtMost(-0.05, 0.15, "mass_increase").score).toBe(1);
  });

  test("overshoot falls to zero at twice the limit", () => {
    expect(checkAtMost(0.18, 0.15, "mass_increase").score).toBeCloseTo(0.8, 10);
    expect(checkAtMost(0.3, 0.15, "mass_increase").score).toBeCloseTo(0, 10);
    expect(checkAtMost(0.5, 0.15, "mass_increase").score).toBe(0);
  });

  test("non-finite observation is a validation error", () => {
    expect(checkAtMost(Number.NaN, 0.15, "mass_increase").error_kind).toBe("ValidationError");
  });
});

describe("checkSafetyFactor", () => {
  const base = { materials: MATERIAL_YIELD_STRENGTH_PA, torqueNm: TORQUE, requiredSafetyFactor: 2 };

  test("shear stress follows 16T/(πd³)", () => {
    expect(shaftShearStress(TORQUE, 0.018)).toBeCloseTo(55_594_613.8, 0);
  });

  test("a generous diameter satisfies the factor", () => {
    const r = checkSafetyFactor({ ...base, material: "Steel_1020", diameterM: 0.018 });
    expect(r.score).toBe(1);
    expect(r.message).toBe("Safety factor 6.30 meets required 2");
    expect(r.observed?.achieved_safety_factor).toBeCloseTo(6.2956, 3);
  });

  test("an undersized shaft scores achieved over required", () => {
    const r = checkSafetyFactor({ ...base, material: "Steel_1020", diameterM: 0.01 });
    expect(r.score).toBeCloseTo(0.53974, 4);
    expect(r.message).toBe("Safety factor 1.08 is below required 2 (shear stress 324.2 MPa)");
  });

  test("unknown material fails before any stress check", () => {
    const r = checkSafetyFactor({ ...base, material: "Unobtainium", diameterM: 0.018 });
    expect(r.error_kind).toBe("ValidationError");
    expect(r.observed).toBeUndefined();
  });

  test("missing or non-positive diameter", () => {
    expect(checkSafetyFactor({ ...base, material: "Steel_1020", diameterM: null }).error_kind).toBe("MissingField");
    expect(checkSafetyFactor({ ...base, material: "Steel_1020", diameterM: -0.01 }).message).toBe(
      "Diameter must be a positive number"
    );
  });
});
