/**
 * Task definitions for the benchmark levels.
 *
 * A task is built once from fixed parameters: it parses a raw submission into
 * its typed shape, gathers whatever the criteria share (sandbox run, CAD
 * analysis, judge score), scores every criterion and combines the result.
 * `evaluate` never rejects; setup mistakes throw ConfigurationError from the
 * constructor instead.
 *
 * With a reasoning judge wired in, submitted reasoning is also compared with
 * the task's reference reasoning and reported as an unweighted `reasoning`
 * entry; it never moves the final score.
 *
 * To add a level: write a create*Task factory beside the existing ones and
 * register it in createTaskRegistry().
 */

import type { ZodType } from "zod";
import { assertThresholds, assertWeights, clampScore, combineScores } from "../../services/evaluation/aggregate";
import { runJudge, type ReasoningJudge } from "../../services/evaluation/reasoningJudge";
import { ConfigurationError } from "../../utils/configurationError";
import type {
  Criterion,
  CriterionDetail,
  CriterionOutcome,
  FieldIssue,
  ScoreReport,
  TaskLevel,
  Thresholds
} from "../../services/evaluation/types";

export type ParsedSubmission<TFields> = {
  fields: TFields;
  issues: FieldIssue[];
};

export type TaskPrompt = {
  task_id: string;
  level: TaskLevel;
  description: string;
  submission_format: Record<string, string>;
  constraints?: Record<string, number>;
  data?: Record<string, unknown>;
};

export type TaskDefinitionConfig<TFields, TContext> = {
  level: TaskLevel;
  taskId: string;
  description: string;
  requiredFields: string[];
  submissionFormat: Record<string, string>;
  constraints?: Record<string, number>;
  data?: Record<string, unknown>;
  referenceReasoning: string;
  keyConcepts: string[];
  thresholds: Thresholds;
  parse: (raw: Record<string, unknown>) => ParsedSubmission<TFields>;
  buildContext: (submission: ParsedSubmission<TFields>) => Promise<TContext>;
  criteria: Criterion<TContext>[];
  reasoningJudge?: ReasoningJudge | null;
};

export const REASONING_DETAIL = "reasoning";

/** Submission keys that may carry free-text reasoning, in lookup order. */
const REASONING_KEYS = ["reasoning", "reasoning_code", "explanation", "approach"];

/** What the orchestrator needs from any level, independent of its field and context types. */
export interface ScoringTask {
  readonly level: TaskLevel;
  readonly taskId: string;
  readonly requiredFields: readonly string[];
  readonly referenceReasoning: string;
  readonly keyConcepts: readonly string[];
  weights(): Record<string, number>;
  prompt(): TaskPrompt;
  evaluate(submission: unknown): Promise<ScoreReport>;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read one field through its schema. Absent and null values are "missing";
 * values the schema rejects are "malformed". Either way the field reads as null.
 */
export function readField<T>(
  raw: Record<string, unknown>,
  field: string,
  schema: ZodType<T>,
  issues: FieldIssue[]
): T | null {
  const value = Object.prototype.hasOwnProperty.call(raw, field) ? raw[field] : undefined;
  if (value === undefined || value === null) {
    issues.push({ field, reason: "missing", message: `${field} is missing` });
    return null;
  }
  const result = schema.safeParse(value);
  if (!result.success) {
    const message = result.error.issues.map((i) => i.message).join(", ");
    issues.push({ field, reason: "malformed", message: `${field}: ${message}` });
    return null;
  }
  return result.data;
}

/** First non-blank string among the reasoning keys, or null. */
export function extractReasoning(raw: Record<string, unknown>): string | null {
  for (const key of REASONING_KEYS) {
    if (!Object.prototype.hasOwnProperty.call(raw, key)) continue;
    const value = raw[key];
    if (typeof value === "string" && value.trim() !== "") return value;
  }
  return null;
}

export function findIssue(issues: FieldIssue[], field: string): FieldIssue | undefined {
  return issues.find((i) => i.field === field);
}

function toDetail(outcome: CriterionOutcome, weight: number): CriterionDetail {
  const detail: CriterionDetail = { score: clampScore(outcome.score), weight };
  if (outcome.error_kind) detail.error_kind = outcome.error_kind;
  if (outcome.message) detail.message = outcome.message;
  if (outcome.observed) detail.observed = outcome.observed;
  if (outcome.execution) detail.execution = outcome.execution;
  return detail;
}

type ContextResult<TContext> = { ok: true; value: TContext } | { ok: false; message: string };

export class TaskDefinition<TFields, TContext> implements ScoringTask {
  readonly level: TaskLevel;
  readonly taskId: string;
  readonly requiredFields: readonly string[];
  readonly referenceReasoning: string;
  readonly keyConcepts: readonly string[];
  private readonly config: TaskDefinitionConfig<TFields, TContext>;

  constructor(config: TaskDefinitionConfig<TFields, TContext>) {
    assertWeights(config.criteria);
    assertThresholds(config.thresholds);
    if (config.reasoningJudge && config.criteria.some((c) => c.name === REASONING_DETAIL)) {
      throw new ConfigurationError(`Criterion name "${REASONING_DETAIL}" is reserved when a reasoning judge is set`);
    }
    this.config = { ...config, criteria: [...config.criteria], thresholds: { ...config.thresholds } };
    this.level = config.level;
    this.taskId = config.taskId;
    this.requiredFields = Object.freeze([...config.requiredFields]);
    this.referenceReasoning = config.referenceReasoning;
    this.keyConcepts = Object.freeze([...config.keyConcepts]);
    Object.freeze(this);
  }

  weights(): Record<string, number> {
    return Object.fromEntries(this.config.criteria.map((c) => [c.name, c.weight]));
  }

  prompt(): TaskPrompt {
    const { taskId, level, description, submissionFormat, constraints, data } = this.config;
    const prompt: TaskPrompt = {
      task_id: taskId,
      level,
      description,
      submission_format: { ...submissionFormat }
    };
    if (constraints) prompt.constraints = { ...constraints };
    if (data) prompt.data = structuredClone(data);
    return prompt;
  }

  async evaluate(submission: unknown): Promise<ScoreReport> {
    const raw = isRecord(submission) ? submission : {};
    const context = await this.prepare(raw);

    const details: Record<string, CriterionDetail> = {};
    for (const criterion of this.config.criteria) {
      const outcome = context.ok ? this.score(criterion, context.value) : { score: null, error_kind: "RuntimeFault" as const, message: context.message };
      details[criterion.name] = toDetail(outcome, criterion.weight);
    }

    const reasoning = await this.judgeReasoning(raw);
    if (reasoning) details[REASONING_DETAIL] = toDetail(reasoning, 0);

    const combined = combineScores(
      this.config.criteria.map((c) => ({ name: c.name, weight: c.weight, score: details[c.name].score })),
      this.config.thresholds
    );
    return {
      task_id: this.taskId,
      task_level: this.level,
      ...combined,
      details
    };
  }

  private async prepare(raw: Record<string, unknown>): Promise<ContextResult<TContext>> {
    try {
      const parsed = this.config.parse(raw);
      return { ok: true, value: await this.config.buildContext(parsed) };
    } catch (err) {
      console.error(`[evaluation] ${this.taskId}: failed to prepare submission:`, err);
      return { ok: false, message: `Evaluation setup failed: ${err instanceof Error ? err.message : String(err)}` };
    }
  }

  private async judgeReasoning(raw: Record<string, unknown>): Promise<CriterionOutcome | null> {
    const judge = this.config.reasoningJudge;
    if (!judge) return null;
    const submitted = extractReasoning(raw);
    if (submitted == null) return null;
    return runJudge(judge, {
      submitted_reasoning: submitted,
      reference_reasoning: this.referenceReasoning,
      key_concepts: [...this.keyConcepts]
    });
  }

  private score(criterion: Criterion<TContext>, context: TContext): CriterionOutcome {
    try {
      return criterion.evaluate(context);
    } catch (err) {
      console.error(`[evaluation] ${this.taskId}: criterion ${criterion.name} failed:`, err);
      return {
        score: null,
        error_kind: "RuntimeFault",
        message: `Criterion failed: ${err instanceof Error ? err.message : String(err)}`
      };
    }
  }
}
