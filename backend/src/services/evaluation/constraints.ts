/**
 * Graded design-constraint checks. Missing inputs score 0 with a MissingField
 * detail; nothing here throws.
 */

import { isFiniteNumber } from "./numericalVerifier";
import type { ErrorKind } from "./types";

export type ConstraintResult = {
  score: number;
  satisfied: boolean;
  error_kind: ErrorKind | null;
  message: string;
  observed?: Record<string, number>;
};

function missing(label: string): ConstraintResult {
  return { score: 0, satisfied: false, error_kind: "MissingField", message: `${label} is missing` };
}

function clamp01(n: number): number {
  return Math.max(0, Math.min(1, n));
}

export function checkMembership(
  value: string | null,
  allowed: ReadonlyMap<string, unknown>,
  label = "value"
): ConstraintResult {
  if (value == null) return missing(label);
  if (allowed.has(value)) {
    return { score: 1, satisfied: true, error_kind: null, message: `${value} is a known ${label}` };
  }
  return {
    score: 0,
    satisfied: false,
    error_kind: "ValidationError",
    message: `${value} is not one of: ${Array.from(allowed.keys()).join(", ")}`
  };
}

/** observed ≥ threshold; below it the score is observed/threshold, floored at 0. */
export function checkAtLeast(observed: number | null, threshold: number, label: string): ConstraintResult {
  if (observed == null) return missing(label);
  if (!isFiniteNumber(observed)) {
    return { score: 0, satisfied: false, error_kind: "ValidationError", message: `${label} is not a finite number` };
  }
  if (observed >= threshold) {
    return { score: 1, satisfied: true, error_kind: null, message: `${label} ${observed} meets ≥ ${threshold}`, observed: { [label]: observed } };
  }
  const score = threshold > 0 ? clamp01(observed / threshold) : 0;
  return {
    score,
    satisfied: false,
    error_kind: null,
    message: `${label} ${observed} is below the required ${threshold}`,
    observed: { [label]: observed }
  };
}

/** observed ≤ limit; above it the score falls linearly to 0 at twice the limit. */
export function checkAtMost(observed: number | null, limit: number, label: string): ConstraintResult {
  if (observed == null) return missing(label);
  if (!isFiniteNumber(observed)) {
    return { score: 0, satisfied: false, error_kind: "ValidationError", message: `${label} is not a finite number` };
  }
  if (observed <= limit) {
    return { score: 1, satisfied: true, error_kind: null, message: `${label} ${observed} within ≤ ${limit}`, observed: { [label]: observed } };
  }
  const score = limit > 0 ? clamp01(1 - (observed - limit) / limit) : 0;
  return {
    score,
    satisfied: false,
    error_kind: null,
    message: `${label} ${observed} exceeds the limit ${limit}`,
    observed: { [label]: observed }
  };
}

/** Max shear stress in a solid circular shaft: τ = 16T / (πd³). */
export function shaftShearStress(torqueNm: number, diameterM: number): number {
  return (16 * torqueNm) / (Math.PI * diameterM ** 3);
}

export type SafetyFactorInput = {
  material: string | null;
  materials: ReadonlyMap<string, number>;
  diameterM: number | null;
  torqueNm: number;
  requiredSafetyFactor: number;
};

/**
 * Compound check: the material must exist in the table, and its yield strength
 * over the shear stress at the submitted diameter must reach the required
 * safety factor. Shortfalls score achieved/required.
 */
export function checkSafetyFactor(input: SafetyFactorInput): ConstraintResult {
  const membership = checkMembership(input.material, input.materials, "material");
  if (!membership.satisfied || input.material == null) return membership;
  if (input.diameterM == null) return missing("calculated_diameter_m");
  if (!isFiniteNumber(input.diameterM) || input.diameterM <= 0) {
    return { score: 0, satisfied: false, error_kind: "ValidationError", message: "Diameter must be a positive number" };
  }
  const yieldPa = input.materials.get(input.material) ?? 0;
  const tau = shaftShearStress(input.torqueNm, input.diameterM);
  const achieved = yieldPa / tau;
  const observed = { shear_stress_pa: tau, achieved_safety_factor: achieved };
  if (achieved >= input.requiredSafetyFactor) {
    return {
      score: 1,
      satisfied: true,
      error_kind: null,
      message: `Safety factor ${achieved.toFixed(2)} meets required ${input.requiredSafetyFactor}`,
      observed
    };
  }
  return {
    score: clamp01(achieved / input.requiredSafetyFactor),
    satisfied: false,
    error_kind: null,
    message: `Safety factor ${achieved.toFixed(2)} is below required ${input.requiredSafetyFactor} (shear stress ${(tau / 1e6).toFixed(1)} MPa)`,
    observed
  };
}
