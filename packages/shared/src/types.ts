/**
 * Shared types for submission scoring (envelopes, sandbox results, error kinds).
 * Used by the sandbox runner and the scoring backend.
 */

export type TaskLevel = 1 | 2 | 3;

export type ErrorKind =
  | "ValidationError"
  | "Timeout"
  | "ForbiddenOperation"
  | "RuntimeFault"
  | "MissingField";

export type ExecutionErrorKind = Extract<ErrorKind, "Timeout" | "RuntimeFault" | "ForbiddenOperation">;

/** Outcome of one sandboxed code execution. Never thrown; always returned. */
export interface ExecutionResult {
  succeeded: boolean;
  output_value: unknown;
  stdout_text: string;
  error_kind: ExecutionErrorKind | null;
  error_message: string | null;
  duration_ms: number;
}

/** Execution info carried into a score breakdown (no timings, so reports stay reproducible). */
export interface ExecutionSummary {
  succeeded: boolean;
  error_kind: ExecutionErrorKind | null;
  error_message: string | null;
  stdout_excerpt: string;
  output_value: unknown;
}

export interface CriterionDetail {
  score: number;
  weight: number;
  error_kind?: ErrorKind;
  message?: string;
  observed?: Record<string, number>;
  execution?: ExecutionSummary;
}

export interface EvaluationResponse {
  task_id: string | null;
  task_level: TaskLevel | null;
  final_score: number;
  passed: boolean;
  excellent: boolean;
  /** Criterion name → score in [0, 1]. */
  details: Record<string, number>;
  breakdown: Record<string, CriterionDetail>;
  error?: { error_kind: ErrorKind; message: string };
}
