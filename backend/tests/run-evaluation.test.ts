import { describe, expect, test } from "vitest";
import { createEvaluationService } from "../src/services/evaluation/runEvaluation";
import { createStaticCadEvaluator } from "../src/services/evaluation/collaborators";
import { NoopReasoningJudge } from "../src/services/evaluation/reasoningJudge";
import { PLATE_FIXTURES, TEST_SETTINGS, executionResult, fixedExecutor } from "./helpers";

const REFERENCE = 31_830_988.6;

const service = createEvaluationService({
  cadEvaluator: createStaticCadEvaluator(PLATE_FIXTURES),
  settings: TEST_SETTINGS,
  execute: fixedExecutor(executionResult({ output_value: REFERENCE }))
});

describe("createEvaluationService", () => {
  test("shapes the response envelope", async () => {
    const res = await service.evaluate({ task_level: 1, submission: { answer_pa: REFERENCE } });
    expect(res.task_id).toBe("level1_stress");
    expect(res.task_level).toBe(1);
    expect(res.final_score).toBe(0.7);
    expect(res.passed).toBe(true);
    expect(res.excellent).toBe(false);
    expect(res.details).toEqual({ numerical_accuracy: 1, code_executes: 0 });
    expect(res.breakdown.numerical_accuracy.observed?.submitted_pa).toBe(REFERENCE);
    expect(res.breakdown.code_executes).toEqual({
      score: 0,
      weight: 0.3,
      error_kind: "MissingField",
      message: "No reasoning_code submitted"
    });
    expect(res.error).toBeUndefined();
  });

  test("plate scenario passes with excellence", async () => {
    const res = await service.evaluate({
      task_level: 3,
      submission: { modified_cad_file_path: "uploads/ribbed_v2.step" }
    });
    expect(res.details).toEqual({ deflection_reduction: 1, mass_increase: 1, manufacturability: 0.5 });
    expect(res.final_score).toBe(0.9);
    expect(res.passed).toBe(true);
    expect(res.excellent).toBe(true);
  });

  test("evaluation is idempotent", async () => {
    const envelope = {
      task_level: 1,
      submission: { answer_pa: REFERENCE * 1.07, reasoning_code: "const result = 1;" }
    };
    const first = await service.evaluate(envelope);
    const second = await service.evaluate(envelope);
    expect(second).toEqual(first);
  });

  test("does not mutate the submission", async () => {
    const submission = { chosen_material: "Steel_1020", calculated_diameter_m: 0.0123 };
    const copy = structuredClone(submission);
    await service.evaluate({ task_level: 2, submission });
    expect(submission).toEqual(copy);
  });

  test("a non-object submission is scored as empty", async () => {
    const res = await service.evaluate({ task_level: 2, submission: "Steel, 12mm" });
    expect(res.task_id).toBe("level2_shaft_design");
    expect(res.final_score).toBe(0);
    expect(res.breakdown.valid_material_choice.error_kind).toBe("MissingField");
  });

  test("unknown task level yields an error envelope", async () => {
    const res = await service.evaluate({ task_level: 4, submission: {} });
    expect(res).toEqual({
      task_id: null,
      task_level: null,
      final_score: 0,
      passed: false,
      excellent: false,
      details: {},
      breakdown: {},
      error: { error_kind: "ValidationError", message: "Unknown task level 4; expected 1, 2 or 3" }
    });
  });

  test("malformed envelopes yield an error envelope", async () => {
    const wrongType = await service.evaluate({ task_level: "1", submission: {} });
    expect(wrongType.error?.message).toBe("Invalid evaluation request: task_level: Expected number, received string");
    const notAnObject = await service.evaluate(null);
    expect(notAnObject.error?.message).toBe("Invalid evaluation request: request: Expected object, received null");
  });

  test("custom thresholds apply", async () => {
    const strict = createEvaluationService({ settings: { ...TEST_SETTINGS, thresholds: { pass: 75, excellence: 95 } } });
    const res = await strict.evaluate({ task_level: 1, submission: { answer_pa: REFERENCE } });
    expect(res.final_score).toBe(0.7);
    expect(res.passed).toBe(false);
  });

  test("lists the three tasks in level order", () => {
    expect(service.listTasks().map((t) => t.taskId)).toEqual([
      "level1_stress",
      "level2_shaft_design",
      "level3_plate_optimization"
    ]);
    expect(service.getTask(2)?.prompt().level).toBe(2);
    expect(service.getTask(9)).toBeNull();
  });

  test("a wired judge adds an unweighted reasoning score to the envelope", async () => {
    const judged = createEvaluationService({ settings: TEST_SETTINGS, reasoningJudge: new NoopReasoningJudge(0.5) });
    const res = await judged.evaluate({
      task_level: 1,
      submission: { answer_pa: REFERENCE, reasoning: "σ = Mc/I with M = PL/4." }
    });
    expect(res.details).toEqual({ numerical_accuracy: 1, code_executes: 0, reasoning: 0.5 });
    expect(res.breakdown.reasoning.weight).toBe(0);
    expect(res.final_score).toBe(0.7);
  });
});
