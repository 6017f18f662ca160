/**
 * CAD/FEA collaborator used by the plate-optimization task. The geometry work
 * happens outside this package; the scoring core only sees the numbers.
 */

import { z } from "zod";

export const PlateAnalysisSchema = z.object({
  deflection_before: z.number().positive(),
  deflection_after: z.number().nonnegative(),
  mass_before: z.number().positive(),
  mass_after: z.number().positive()
});

export type PlateAnalysis = z.infer<typeof PlateAnalysisSchema>;

export type CadEvaluator = (filePath: string) => Promise<PlateAnalysis>;

export class CadAnalysisError extends Error {
  constructor(public filePath: string, reason: string) {
    super(`CAD analysis failed for ${filePath}: ${reason}`);
    this.name = "CadAnalysisError";
  }
}

export const unavailableCadEvaluator: CadEvaluator = async (filePath) => {
  throw new CadAnalysisError(filePath, "no CAD evaluator is configured");
};

/**
 * Evaluator backed by precomputed results, keyed by a fragment of the file
 * path (first match wins). Unknown files fail like a broken model would.
 */
export function createStaticCadEvaluator(results: Record<string, PlateAnalysis>): CadEvaluator {
  const entries = Object.entries(results);
  return async (filePath) => {
    const hit = entries.find(([fragment]) => filePath.includes(fragment));
    if (!hit) throw new CadAnalysisError(filePath, "no analysis result for this model");
    return hit[1];
  };
}
