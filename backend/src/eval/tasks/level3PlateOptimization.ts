/**
 * Level 3: stiffen a mounting plate. The submitted model is analysed by the
 * CAD/FEA collaborator; deflection must drop by at least 25 % while mass grows
 * by at most 15 %. Manufacturability comes from the reasoning judge, or a
 * fixed neutral score when none is wired in.
 */

import { z } from "zod";
import { checkAtLeast, checkAtMost, type ConstraintResult } from "../../services/evaluation/constraints";
import {
  PlateAnalysisSchema,
  unavailableCadEvaluator,
  type CadEvaluator,
  type PlateAnalysis
} from "../../services/evaluation/collaborators";
import { runJudge, type ReasoningJudge } from "../../services/evaluation/reasoningJudge";
import type { CriterionOutcome, ErrorKind, Thresholds } from "../../services/evaluation/types";
import { TaskDefinition, findIssue, readField, type ParsedSubmission } from "./taskDefinition";

export const LEVEL3_PARAMETERS = {
  loadN: 1000,
  initialModel: "tasks/level3/mounting_plate_initial.step",
  minDeflectionReduction: 0.25,
  maxMassIncrease: 0.15
} as const;

export type Level3Submission = {
  modified_cad_file_path: string | null;
  reasoning: string | null;
};

type Failure = { error_kind: ErrorKind; message: string };

type Level3Context = {
  submission: ParsedSubmission<Level3Submission>;
  analysis: { ok: true; value: PlateAnalysis } | ({ ok: false } & Failure);
  manufacturability: CriterionOutcome;
};

export type Level3Options = {
  thresholds: Thresholds;
  cadEvaluator?: CadEvaluator;
  reasoningJudge?: ReasoningJudge | null;
  /** Manufacturability score used when no judge is configured. */
  neutralScore: number;
};

const REFERENCE_REASONING = `Start from a finite element analysis of the baseline plate to find the maximum deflection, the stress concentration zones and the load path under the 1 kN off-axis load.
Candidate changes are local thickness increases, ribs or stiffeners across the bending direction, and geometry changes that shorten the load path.
Each change is judged on deflection reduction per unit of added mass and on manufacturability; a short parametric study over rib height and thickness converges on a design.
Stiffening ribs in the load transfer region, combined with selective thickening, typically reach the 25 % deflection reduction while keeping the mass increase under 15 %.`;

const KEY_CONCEPTS = [
  "finite element analysis",
  "deflection reduction",
  "stress concentration",
  "optimization",
  "parametric study",
  "design iteration",
  "load path",
  "stiffness improvement",
  "mass constraint",
  "design trade-off"
];

export function parseLevel3Submission(raw: Record<string, unknown>): ParsedSubmission<Level3Submission> {
  const issues: ParsedSubmission<Level3Submission>["issues"] = [];
  const fields: Level3Submission = {
    modified_cad_file_path: readField(raw, "modified_cad_file_path", z.string().trim().min(1), issues),
    reasoning: readField(raw, "reasoning", z.string(), issues)
  };
  return { fields, issues };
}

/** Fractional deflection reduction and mass increase relative to the baseline. */
export function plateChanges(analysis: PlateAnalysis): { deflection_reduction: number; mass_increase: number } {
  return {
    deflection_reduction: (analysis.deflection_before - analysis.deflection_after) / analysis.deflection_before,
    mass_increase: (analysis.mass_after - analysis.mass_before) / analysis.mass_before
  };
}

async function analyze(
  submission: ParsedSubmission<Level3Submission>,
  cadEvaluator: CadEvaluator
): Promise<Level3Context["analysis"]> {
  const filePath = submission.fields.modified_cad_file_path;
  if (filePath == null) {
    const issue = findIssue(submission.issues, "modified_cad_file_path");
    return issue?.reason === "malformed"
      ? { ok: false, error_kind: "ValidationError", message: issue.message }
      : { ok: false, error_kind: "MissingField", message: "modified_cad_file_path is missing" };
  }
  let raw: unknown;
  try {
    raw = await cadEvaluator(filePath);
  } catch (err) {
    return { ok: false, error_kind: "RuntimeFault", message: err instanceof Error ? err.message : String(err) };
  }
  const parsed = PlateAnalysisSchema.safeParse(raw);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    return { ok: false, error_kind: "ValidationError", message: `CAD analysis returned invalid metrics: ${message}` };
  }
  return { ok: true, value: parsed.data };
}

async function judgeManufacturability(
  submission: ParsedSubmission<Level3Submission>,
  judge: ReasoningJudge | null,
  neutralScore: number
): Promise<CriterionOutcome> {
  if (!judge) {
    return { score: neutralScore, message: "No reasoning judge configured; neutral score applied" };
  }
  const reasoning = submission.fields.reasoning;
  if (reasoning == null || reasoning.trim() === "") {
    return { score: 0, error_kind: "MissingField", message: "No reasoning submitted for the judge" };
  }
  return runJudge(judge, {
    submitted_reasoning: reasoning,
    reference_reasoning: REFERENCE_REASONING,
    key_concepts: [...KEY_CONCEPTS]
  });
}

function fromConstraint(result: ConstraintResult, analysis: PlateAnalysis): CriterionOutcome {
  return {
    score: result.score,
    error_kind: result.error_kind ?? undefined,
    message: result.message,
    observed: { ...analysis, ...result.observed }
  };
}

export function createLevel3Task(options: Level3Options) {
  const cadEvaluator = options.cadEvaluator ?? unavailableCadEvaluator;
  const judge = options.reasoningJudge ?? null;
  const { loadN, initialModel, minDeflectionReduction, maxMassIncrease } = LEVEL3_PARAMETERS;

  return new TaskDefinition<Level3Submission, Level3Context>({
    level: 3,
    taskId: "level3_plate_optimization",
    description:
      "Modify the provided mounting plate to reduce max deflection by at least 25% while increasing total mass by no more than 15%. An off-axis load of 1kN will be applied for the test.",
    requiredFields: ["modified_cad_file_path"],
    submissionFormat: {
      modified_cad_file_path: "path/to/your/modified_plate.step",
      reasoning: "OPTIONAL_DESIGN_RATIONALE"
    },
    constraints: {
      min_deflection_reduction: minDeflectionReduction,
      max_mass_increase: maxMassIncrease,
      load_n: loadN
    },
    data: { initial_cad_file: initialModel },
    referenceReasoning: REFERENCE_REASONING,
    keyConcepts: KEY_CONCEPTS,
    thresholds: options.thresholds,
    parse: parseLevel3Submission,
    buildContext: async (submission) => {
      const analysis = await analyze(submission, cadEvaluator);
      // Without a readable model there is no design to judge.
      const manufacturability: CriterionOutcome =
        !analysis.ok && submission.fields.modified_cad_file_path == null
          ? { score: 0, error_kind: analysis.error_kind, message: analysis.message }
          : await judgeManufacturability(submission, judge, options.neutralScore);
      return { submission, analysis, manufacturability };
    },
    criteria: [
      {
        name: "deflection_reduction",
        weight: 0.5,
        evaluate: (ctx) => {
          if (!ctx.analysis.ok) return { score: 0, error_kind: ctx.analysis.error_kind, message: ctx.analysis.message };
          const { deflection_reduction } = plateChanges(ctx.analysis.value);
          return fromConstraint(
            checkAtLeast(deflection_reduction, minDeflectionReduction, "deflection_reduction"),
            ctx.analysis.value
          );
        }
      },
      {
        name: "mass_increase",
        weight: 0.3,
        evaluate: (ctx) => {
          if (!ctx.analysis.ok) return { score: 0, error_kind: ctx.analysis.error_kind, message: ctx.analysis.message };
          const { mass_increase } = plateChanges(ctx.analysis.value);
          return fromConstraint(checkAtMost(mass_increase, maxMassIncrease, "mass_increase"), ctx.analysis.value);
        }
      },
      { name: "manufacturability", weight: 0.2, evaluate: (ctx) => ctx.manufacturability }
    ]
  });
}
