/**
 * Evaluation service: sandboxed code checks, numeric verification, design
 * constraints and weighted scoring for the three benchmark levels.
 * To add a level: add a task in backend/src/eval/tasks/ and register it in createTaskRegistry.
 */

export {
  createEvaluationService,
  settingsFromEnv,
  toResponse,
  EvaluationRequestSchema
} from "./runEvaluation";
export type { EvaluationService, EvaluationServiceOptions } from "./runEvaluation";
export { relativeError, toleranceScore, verifyNumeric, DEFAULT_FALLOFF_MULTIPLIER } from "./numericalVerifier";
export type { NumericCheck } from "./numericalVerifier";
export { checkAtLeast, checkAtMost, checkMembership, checkSafetyFactor, shaftShearStress } from "./constraints";
export type { ConstraintResult } from "./constraints";
export { assertWeights, assertThresholds, clampScore, combineScores } from "./aggregate";
export {
  CadAnalysisError,
  PlateAnalysisSchema,
  createStaticCadEvaluator,
  unavailableCadEvaluator
} from "./collaborators";
export type { CadEvaluator, PlateAnalysis } from "./collaborators";
export { KeywordConceptJudge, NoopReasoningJudge, runJudge } from "./reasoningJudge";
export type { JudgeVerdict, ReasoningJudge, ReasoningJudgeInput } from "./reasoningJudge";
export type {
  CriterionDetail,
  ErrorKind,
  EvaluationResponse,
  ScoreReport,
  TaskLevel,
  Thresholds
} from "./types";
