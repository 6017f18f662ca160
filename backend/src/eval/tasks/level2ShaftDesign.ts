/**
 * Level 2: choose a material and size a solid shaft for 10 kW at 1500 rpm with
 * a safety factor of 2. Reference diameter: d = ∛(16T / (π·τ_allow)),
 * T = P/ω, τ_allow = Sy / SF.
 */

import { z } from "zod";
import { checkMembership, checkSafetyFactor, type ConstraintResult } from "../../services/evaluation/constraints";
import { verifyNumeric } from "../../services/evaluation/numericalVerifier";
import type { ReasoningJudge } from "../../services/evaluation/reasoningJudge";
import type { CriterionOutcome, FieldIssue, Thresholds } from "../../services/evaluation/types";
import { MATERIAL_YIELD_STRENGTH_PA } from "./materials";
import { TaskDefinition, findIssue, readField, type ParsedSubmission } from "./taskDefinition";

export const LEVEL2_PARAMETERS = {
  powerW: 10_000,
  speedRpm: 1500,
  safetyFactor: 2
} as const;

export function torqueFromPower(powerW: number, speedRpm: number): number {
  const omega = (speedRpm * 2 * Math.PI) / 60;
  return powerW / omega;
}

export function requiredShaftDiameter(torqueNm: number, allowableShearPa: number): number {
  return Math.cbrt((16 * torqueNm) / (Math.PI * allowableShearPa));
}

export type Level2Submission = {
  chosen_material: string | null;
  calculated_diameter_m: number | null;
};

type Level2Context = {
  submission: ParsedSubmission<Level2Submission>;
  torqueNm: number;
  referenceDiameterM: number | null;
};

export type Level2Options = {
  tolerance: number;
  falloff: number;
  thresholds: Thresholds;
  materials?: ReadonlyMap<string, number>;
  /** When set, submitted reasoning gets an unweighted `reasoning` entry. */
  reasoningJudge?: ReasoningJudge | null;
};

const REFERENCE_REASONING = `Angular velocity ω = 1500 rpm × 2π/60 ≈ 157.08 rad/s, so the transmitted torque is T = P/ω = 10 000 W / 157.08 rad/s ≈ 63.66 N·m.
The allowable shear stress is the yield strength over the safety factor: for Steel_1020, τ_allow = 350 MPa / 2 = 175 MPa.
For a solid circular shaft τ = T·r/J with J = π·d⁴/32, i.e. τ = 16T/(π·d³), so d_min = ∛(16T/(π·τ_allow)) ≈ 12.3 mm for Steel_1020.
Steel_1020 is a common, inexpensive shaft material, and any diameter at or above d_min respects the stress constraint.`;

const KEY_CONCEPTS = [
  "torque calculation",
  "power transmission",
  "material selection",
  "shear stress",
  "safety factor",
  "torsion formula",
  "polar moment of inertia",
  "stress constraint",
  "angular velocity",
  "ductile material"
];

export function parseLevel2Submission(raw: Record<string, unknown>): ParsedSubmission<Level2Submission> {
  const issues: ParsedSubmission<Level2Submission>["issues"] = [];
  const fields: Level2Submission = {
    chosen_material: readField(raw, "chosen_material", z.string().trim().min(1), issues),
    calculated_diameter_m: readField(raw, "calculated_diameter_m", z.number().finite(), issues)
  };
  return { fields, issues };
}

/** A constraint input that was present but unreadable is a ValidationError, not a MissingField. */
function fromConstraint(result: ConstraintResult, issues: FieldIssue[], fields: string[]): CriterionOutcome {
  if (result.error_kind === "MissingField") {
    const malformed = issues.find((i) => i.reason === "malformed" && fields.includes(i.field));
    if (malformed) return { score: 0, error_kind: "ValidationError", message: malformed.message };
  }
  return {
    score: result.score,
    error_kind: result.error_kind ?? undefined,
    message: result.message,
    observed: result.observed
  };
}

function scoreDiameter(ctx: Level2Context, options: Level2Options): CriterionOutcome {
  const { calculated_diameter_m, chosen_material } = ctx.submission.fields;
  if (calculated_diameter_m == null) {
    const issue = findIssue(ctx.submission.issues, "calculated_diameter_m");
    return { score: 0, error_kind: "ValidationError", message: issue?.message ?? "calculated_diameter_m is missing" };
  }
  if (ctx.referenceDiameterM == null) {
    return {
      score: 0,
      error_kind: "ValidationError",
      message: `No reference diameter for material ${chosen_material ?? "(none)"}`
    };
  }
  const check = verifyNumeric(calculated_diameter_m, ctx.referenceDiameterM, options.tolerance, options.falloff);
  const observed: Record<string, number> = {
    reference_diameter_m: ctx.referenceDiameterM,
    submitted_diameter_m: calculated_diameter_m
  };
  if (check.relative_error != null) observed.relative_error = check.relative_error;
  return { score: check.score, message: check.message, observed };
}

export function createLevel2Task(options: Level2Options) {
  const materials = options.materials ?? MATERIAL_YIELD_STRENGTH_PA;
  const { powerW, speedRpm, safetyFactor } = LEVEL2_PARAMETERS;
  const torqueNm = torqueFromPower(powerW, speedRpm);

  return new TaskDefinition<Level2Submission, Level2Context>({
    level: 2,
    taskId: "level2_shaft_design",
    description:
      "Select a suitable material and determine the minimum required diameter for a solid circular shaft to transmit 10kW of power at 1500 RPM. The maximum shear stress must not exceed the material's yield strength divided by a safety factor of 2.",
    requiredFields: ["chosen_material", "calculated_diameter_m"],
    submissionFormat: {
      chosen_material: "MATERIAL_NAME",
      calculated_diameter_m: "YOUR_NUMERICAL_ANSWER",
      reasoning: "OPTIONAL_EXPLANATION"
    },
    constraints: { power_w: powerW, speed_rpm: speedRpm, safety_factor: safetyFactor },
    data: {
      materials: Array.from(materials, ([name, yieldPa]) => ({ material: name, yield_strength_pa: yieldPa }))
    },
    referenceReasoning: REFERENCE_REASONING,
    keyConcepts: KEY_CONCEPTS,
    thresholds: options.thresholds,
    reasoningJudge: options.reasoningJudge,
    parse: parseLevel2Submission,
    buildContext: async (submission) => {
      const material = submission.fields.chosen_material;
      const yieldPa = material == null ? undefined : materials.get(material);
      const referenceDiameterM = yieldPa == null ? null : requiredShaftDiameter(torqueNm, yieldPa / safetyFactor);
      return { submission, torqueNm, referenceDiameterM };
    },
    criteria: [
      {
        name: "valid_material_choice",
        weight: 0.4,
        evaluate: (ctx) => {
          const result = checkMembership(ctx.submission.fields.chosen_material, materials, "material");
          return fromConstraint(result, ctx.submission.issues, ["chosen_material"]);
        }
      },
      { name: "diameter_accuracy", weight: 0.4, evaluate: (ctx) => scoreDiameter(ctx, options) },
      {
        name: "safety_factor_satisfied",
        weight: 0.2,
        evaluate: (ctx) => {
          const result = checkSafetyFactor({
            material: ctx.submission.fields.chosen_material,
            materials,
            diameterM: ctx.submission.fields.calculated_diameter_m,
            torqueNm: ctx.torqueNm,
            requiredSafetyFactor: safetyFactor
          });
          return fromConstraint(result, ctx.submission.issues, ["chosen_material", "calculated_diameter_m"]);
        }
      }
    ]
  });
}
