import type { CodeExecutor } from "../src/eval/tasks/level1Stress";
import type { ScoringSettings } from "../src/eval/tasks";
import type { ExecutionResult } from "../src/services/evaluation/types";

export const TEST_SETTINGS: ScoringSettings = {
  thresholds: { pass: 60, excellence: 85 },
  tolerance: 0.05,
  falloff: 4,
  sandbox: { timeoutMs: 2000, memoryMb: 64 },
  neutralScore: 0.5
};

export function executionResult(overrides: Partial<ExecutionResult> = {}): ExecutionResult {
  return {
    succeeded: true,
    output_value: null,
    stdout_text: "",
    error_kind: null,
    error_message: null,
    duration_ms: 7,
    ...overrides
  };
}

/** Executor stand-in that returns a fixed result without starting a worker. */
export function fixedExecutor(result: ExecutionResult): CodeExecutor {
  return async () => result;
}

export const PLATE_FIXTURES = {
  ribbed: { deflection_before: 2.1, deflection_after: 1.5, mass_before: 1.5, mass_after: 1.7 },
  thickened: { deflection_before: 2.1, deflection_after: 1.8, mass_before: 1.5, mass_after: 1.8 }
};
