/**
 * Level 1: maximum bending stress in a simply supported round bar with a
 * midspan point load. The answer is checked against σ = M·c/I; optional
 * reasoning code is run in the sandbox and its `result` cross-checked.
 */

import { z } from "zod";
import { executeCode, type ExecuteOptions, type ExecutionResult } from "../../../../services/runner/src/index";
import { relativeError, verifyNumeric } from "../../services/evaluation/numericalVerifier";
import type { ReasoningJudge } from "../../services/evaluation/reasoningJudge";
import type { CriterionOutcome, ExecutionSummary, Thresholds } from "../../services/evaluation/types";
import { TaskDefinition, findIssue, readField, type ParsedSubmission } from "./taskDefinition";

export const LEVEL1_PARAMETERS = {
  loadN: 100,
  spanM: 1,
  diameterM: 0.02
} as const;

/** σ = M·c/I with M = PL/4, I = πd⁴/64, c = d/2. */
export function bendingStressPa(params: { loadN: number; spanM: number; diameterM: number } = LEVEL1_PARAMETERS): number {
  const moment = (params.loadN * params.spanM) / 4;
  const inertia = (Math.PI * params.diameterM ** 4) / 64;
  const c = params.diameterM / 2;
  return (moment * c) / inertia;
}

export type Level1Submission = {
  answer_pa: number | null;
  reasoning_code: string | null;
};

type Level1Context = {
  submission: ParsedSubmission<Level1Submission>;
  reference: number;
  execution: ExecutionResult | null;
};

export type CodeExecutor = (options: ExecuteOptions) => Promise<ExecutionResult>;

export type Level1Options = {
  tolerance: number;
  falloff: number;
  thresholds: Thresholds;
  sandbox: { timeoutMs: number; memoryMb: number };
  execute?: CodeExecutor;
  /** When set, submitted reasoning gets an unweighted `reasoning` entry. */
  reasoningJudge?: ReasoningJudge | null;
};

const REFERENCE_REASONING = `For a simply supported beam with a point load at midspan the maximum bending moment is M = P·L/4 = 100 N × 1 m / 4 = 25 N·m.
The round section has I = π·d⁴/64 = π × 0.02⁴ / 64 ≈ 7.854e-9 m⁴ and the extreme fibre sits at c = d/2 = 0.01 m.
The flexure formula gives σ = M·c/I = 25 × 0.01 / 7.854e-9 ≈ 31.83 MPa, assuming linear-elastic behaviour.`;

const KEY_CONCEPTS = [
  "bending stress",
  "moment of inertia",
  "flexure formula",
  "simply supported beam",
  "neutral axis",
  "extreme fiber",
  "circular cross-section",
  "point load at midspan"
];

const STDOUT_EXCERPT_CHARS = 500;

export function summarizeExecution(result: ExecutionResult): ExecutionSummary {
  return {
    succeeded: result.succeeded,
    error_kind: result.error_kind,
    error_message: result.error_message,
    stdout_excerpt: result.stdout_text.slice(0, STDOUT_EXCERPT_CHARS),
    output_value: result.output_value
  };
}

export function parseLevel1Submission(raw: Record<string, unknown>): ParsedSubmission<Level1Submission> {
  const issues: ParsedSubmission<Level1Submission>["issues"] = [];
  const fields: Level1Submission = {
    answer_pa: readField(raw, "answer_pa", z.number().finite(), issues),
    reasoning_code: readField(raw, "reasoning_code", z.string(), issues)
  };
  return { fields, issues };
}

function scoreAccuracy(ctx: Level1Context, options: Level1Options): CriterionOutcome {
  const { answer_pa } = ctx.submission.fields;
  const observed: Record<string, number> = { reference_pa: ctx.reference };
  if (answer_pa == null) {
    const issue = findIssue(ctx.submission.issues, "answer_pa");
    return { score: 0, error_kind: "ValidationError", message: issue?.message ?? "answer_pa is missing", observed };
  }
  const check = verifyNumeric(answer_pa, ctx.reference, options.tolerance, options.falloff);
  observed.submitted_pa = answer_pa;
  if (check.relative_error != null) observed.relative_error = check.relative_error;
  return { score: check.score, message: check.message, observed };
}

function scoreCodeExecution(ctx: Level1Context, options: Level1Options): CriterionOutcome {
  const { answer_pa, reasoning_code } = ctx.submission.fields;
  if (reasoning_code == null || ctx.execution == null) {
    const issue = findIssue(ctx.submission.issues, "reasoning_code");
    if (issue?.reason === "malformed") return { score: 0, error_kind: "ValidationError", message: issue.message };
    return { score: 0, error_kind: "MissingField", message: "No reasoning_code submitted" };
  }
  const execution = summarizeExecution(ctx.execution);
  if (!ctx.execution.succeeded) {
    return {
      score: 0,
      error_kind: ctx.execution.error_kind ?? "RuntimeFault",
      message: ctx.execution.error_message ?? "Code execution failed",
      execution
    };
  }
  const produced = ctx.execution.output_value;
  if (typeof produced !== "number" || !Number.isFinite(produced)) {
    return { score: 0.5, message: "Code ran but did not assign a numeric `result`", execution };
  }
  if (answer_pa == null) {
    return { score: 0.5, message: "Code ran but answer_pa is missing, so the result cannot be cross-checked", execution };
  }
  const relErr = relativeError(produced, answer_pa);
  if (relErr > options.tolerance) {
    return {
      score: 0.5,
      message: `Code result ${produced} does not match answer_pa ${answer_pa}`,
      observed: { code_result: produced, relative_error: relErr },
      execution
    };
  }
  return { score: 1, observed: { code_result: produced }, execution };
}

export function createLevel1Task(options: Level1Options) {
  const execute = options.execute ?? executeCode;
  const reference = bendingStressPa();

  return new TaskDefinition<Level1Submission, Level1Context>({
    level: 1,
    taskId: "level1_stress",
    description:
      "Calculate the maximum bending stress in a 1-meter long, 20mm diameter steel rod supported at both ends with a 100N point load in the center. Return your answer in Pascals (Pa).",
    requiredFields: ["answer_pa"],
    submissionFormat: {
      answer_pa: "YOUR_NUMERICAL_ANSWER",
      reasoning_code: "OPTIONAL_JAVASCRIPT_THAT_ASSIGNS_result"
    },
    referenceReasoning: REFERENCE_REASONING,
    keyConcepts: KEY_CONCEPTS,
    thresholds: options.thresholds,
    reasoningJudge: options.reasoningJudge,
    parse: parseLevel1Submission,
    buildContext: async (submission) => {
      const code = submission.fields.reasoning_code;
      const execution =
        code == null
          ? null
          : await execute({
              code,
              resultVariable: "result",
              timeoutMs: options.sandbox.timeoutMs,
              memoryMb: options.sandbox.memoryMb
            });
      return { submission, reference, execution };
    },
    criteria: [
      { name: "numerical_accuracy", weight: 0.7, evaluate: (ctx) => scoreAccuracy(ctx, options) },
      { name: "code_executes", weight: 0.3, evaluate: (ctx) => scoreCodeExecution(ctx, options) }
    ]
  });
}
