/**
 * Evaluation entry point: validates the request envelope, runs the task for
 * its level and shapes the response. Tasks are built once per service and
 * shared across calls; nothing here holds per-submission state.
 */

import { z } from "zod";
import { env } from "../../config/env";
import { createTaskRegistry, type CodeExecutor, type ScoringSettings, type ScoringTask } from "../../eval/tasks";
import type { CadEvaluator } from "./collaborators";
import type { ReasoningJudge } from "./reasoningJudge";
import type { EvaluationResponse, ScoreReport } from "./types";

export const EvaluationRequestSchema = z.object({
  task_level: z.number().int(),
  submission: z.unknown()
});

export type EvaluationServiceOptions = {
  cadEvaluator?: CadEvaluator;
  reasoningJudge?: ReasoningJudge | null;
  settings?: Partial<ScoringSettings>;
  /** Sandbox replacement for level 1; defaults to the worker-based executor. */
  execute?: CodeExecutor;
};

export type EvaluationService = {
  evaluate(envelope: unknown): Promise<EvaluationResponse>;
  getTask(level: number): ScoringTask | null;
  listTasks(): ScoringTask[];
};

export function settingsFromEnv(): ScoringSettings {
  return {
    thresholds: { pass: env.EVAL_PASS_THRESHOLD, excellence: env.EVAL_EXCELLENCE_THRESHOLD },
    tolerance: env.NUMERIC_TOLERANCE,
    falloff: env.NUMERIC_FALLOFF_MULTIPLIER,
    sandbox: { timeoutMs: env.SANDBOX_TIMEOUT_MS, memoryMb: env.SANDBOX_MEMORY_MB },
    neutralScore: env.QUALITATIVE_DEFAULT_SCORE
  };
}

export function toResponse(report: ScoreReport): EvaluationResponse {
  return {
    task_id: report.task_id,
    task_level: report.task_level,
    final_score: report.final_score,
    passed: report.passed,
    excellent: report.excellent,
    details: Object.fromEntries(Object.entries(report.details).map(([name, d]) => [name, d.score])),
    breakdown: report.details
  };
}

function rejectEnvelope(message: string): EvaluationResponse {
  return {
    task_id: null,
    task_level: null,
    final_score: 0,
    passed: false,
    excellent: false,
    details: {},
    breakdown: {},
    error: { error_kind: "ValidationError", message }
  };
}

export function createEvaluationService(options: EvaluationServiceOptions = {}): EvaluationService {
  const settings: ScoringSettings = { ...settingsFromEnv(), ...options.settings };
  const registry = createTaskRegistry({
    settings,
    cadEvaluator: options.cadEvaluator,
    reasoningJudge: options.reasoningJudge,
    execute: options.execute
  });

  return {
    async evaluate(envelope) {
      const parsed = EvaluationRequestSchema.safeParse(envelope);
      if (!parsed.success) {
        const message = parsed.error.issues.map((i) => `${i.path.join(".") || "request"}: ${i.message}`).join("; ");
        return rejectEnvelope(`Invalid evaluation request: ${message}`);
      }
      const task = registry.getTask(parsed.data.task_level);
      if (!task) {
        return rejectEnvelope(`Unknown task level ${parsed.data.task_level}; expected 1, 2 or 3`);
      }
      const report = await task.evaluate(parsed.data.submission);
      return toResponse(report);
    },
    getTask: (level) => registry.getTask(level),
    listTasks: () => registry.listTasks()
  };
}
