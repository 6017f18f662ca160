/**
 * Shared types for submission scoring (criteria → outcomes → report).
 * Every criterion score is explained by an error kind or a message when it is not 1.
 */

import type {
  CriterionDetail,
  ErrorKind,
  EvaluationResponse,
  ExecutionResult,
  ExecutionSummary,
  TaskLevel
} from "../../../../packages/shared/src/types";

export type {
  CriterionDetail,
  ErrorKind,
  EvaluationResponse,
  ExecutionResult,
  ExecutionSummary,
  TaskLevel
};

export type CriterionOutcome = {
  /** null when the criterion could not be computed; counted as 0. */
  score: number | null;
  error_kind?: ErrorKind;
  message?: string;
  observed?: Record<string, number>;
  execution?: ExecutionSummary;
};

export type Criterion<TContext> = {
  name: string;
  weight: number;
  evaluate: (context: TContext) => CriterionOutcome;
};

export type Thresholds = {
  /** 0–100 scale. */
  pass: number;
  excellence: number;
};

export type ScoreReport = {
  task_id: string;
  task_level: TaskLevel;
  final_score: number;
  passed: boolean;
  excellent: boolean;
  details: Record<string, CriterionDetail>;
};

/** Why a submission field could not be read. */
export type FieldIssue = {
  field: string;
  reason: "missing" | "malformed";
  message: string;
};
