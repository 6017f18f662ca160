/**
 * Final score and pass/excellence flags from weighted criterion scores.
 * Fixed weights; a null or NaN score counts as 0.
 */

import { ConfigurationError } from "../../utils/configurationError";
import type { Thresholds } from "./types";

export const WEIGHT_SUM_EPSILON = 1e-6;

export type WeightedScore = {
  name: string;
  weight: number;
  score: number | null;
};

function round4(n: number): number {
  return Math.round(n * 10_000) / 10_000;
}

export function clampScore(score: number | null): number {
  if (score == null || Number.isNaN(score)) return 0;
  return Math.max(0, Math.min(1, score));
}

export function assertWeights(entries: { name: string; weight: number }[]): void {
  if (entries.length === 0) throw new ConfigurationError("A task needs at least one criterion");
  const names = new Set<string>();
  for (const e of entries) {
    if (!(e.weight > 0 && e.weight <= 1)) {
      throw new ConfigurationError(`Criterion ${e.name} has weight ${e.weight}; expected (0, 1]`);
    }
    if (names.has(e.name)) throw new ConfigurationError(`Duplicate criterion name: ${e.name}`);
    names.add(e.name);
  }
  const sum = entries.reduce((acc, e) => acc + e.weight, 0);
  if (Math.abs(sum - 1) > WEIGHT_SUM_EPSILON) {
    throw new ConfigurationError(`Criterion weights sum to ${sum}; expected 1.0`);
  }
}

export function assertThresholds(thresholds: Thresholds): void {
  const { pass, excellence } = thresholds;
  if (!(pass >= 0 && pass <= 100 && excellence >= 0 && excellence <= 100)) {
    throw new ConfigurationError(`Thresholds must lie in [0, 100]; got pass=${pass}, excellence=${excellence}`);
  }
  if (excellence < pass) {
    throw new ConfigurationError(`Excellence threshold ${excellence} is below pass threshold ${pass}`);
  }
}

export function combineScores(
  entries: WeightedScore[],
  thresholds: Thresholds
): { final_score: number; passed: boolean; excellent: boolean } {
  let weightedSum = 0;
  for (const e of entries) {
    weightedSum += e.weight * clampScore(e.score);
  }
  const final_score = round4(Math.max(0, Math.min(1, weightedSum)));
  const percent = Math.round(final_score * 10_000) / 100;
  return {
    final_score,
    passed: percent >= thresholds.pass,
    excellent: percent >= thresholds.excellence
  };
}
