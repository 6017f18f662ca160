/**
 * Reasoning-quality judge strategy. The scoring core depends only on this
 * interface; an LLM-backed implementation lives outside the core.
 */

import type { ErrorKind } from "./types";

export type ReasoningJudgeInput = {
  submitted_reasoning: string;
  reference_reasoning: string;
  key_concepts: string[];
};

export interface ReasoningJudge {
  readonly name: string;
  /** Score in [0, 1]. May reject; callers treat a rejection as 0. */
  score(input: ReasoningJudgeInput): Promise<number>;
}

/** Deterministic judge that returns the same score for every input. */
export class NoopReasoningJudge implements ReasoningJudge {
  readonly name = "noop";

  constructor(private readonly fixedScore: number) {}

  async score(_input: ReasoningJudgeInput): Promise<number> {
    return this.fixedScore;
  }
}

function normalize(text: string): string {
  return text.toLowerCase().replace(/[-_]/g, " ").replace(/\s+/g, " ");
}

/** Fraction of key concepts the submitted reasoning mentions (case-insensitive). */
export class KeywordConceptJudge implements ReasoningJudge {
  readonly name = "keyword-concepts";

  async score(input: ReasoningJudgeInput): Promise<number> {
    if (input.key_concepts.length === 0) return input.submitted_reasoning.trim() ? 1 : 0;
    const text = normalize(input.submitted_reasoning);
    const hits = input.key_concepts.filter((c) => text.includes(normalize(c))).length;
    return Math.round((hits / input.key_concepts.length) * 100) / 100;
  }
}

export type JudgeVerdict = {
  score: number;
  error_kind?: Extract<ErrorKind, "ValidationError" | "RuntimeFault">;
  message: string;
};

/** Runs the judge and turns a rejection or a non-numeric score into a zero verdict. */
export async function runJudge(judge: ReasoningJudge, input: ReasoningJudgeInput): Promise<JudgeVerdict> {
  try {
    const score = await judge.score(input);
    if (!Number.isFinite(score)) {
      return { score: 0, error_kind: "ValidationError", message: `Judge ${judge.name} returned a non-numeric score` };
    }
    return { score: Math.max(0, Math.min(1, score)), message: `Scored by ${judge.name}` };
  } catch (err) {
    console.error(`[judge] ${judge.name} failed:`, err);
    return {
      score: 0,
      error_kind: "RuntimeFault",
      message: `Judge ${judge.name} failed: ${err instanceof Error ? err.message : String(err)}`
    };
  }
}
