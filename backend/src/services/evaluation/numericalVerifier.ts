/**
 * Relative-tolerance scoring of numeric answers against analytical references.
 *
 * Full credit inside the tolerance band; outside it the score falls linearly
 * from 1 at `tolerance` to 0 at `falloff * tolerance`, and stays at 0 beyond.
 */

import type { ErrorKind } from "./types";

export const DEFAULT_FALLOFF_MULTIPLIER = 4;

export type NumericCheck = {
  score: number;
  relative_error: number | null;
  error_kind: Extract<ErrorKind, "ValidationError"> | null;
  message?: string;
};

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/** |submitted − reference| / |reference|; a zero reference only matches exactly. */
export function relativeError(submitted: number, reference: number): number {
  if (reference === 0) return submitted === 0 ? 0 : Number.POSITIVE_INFINITY;
  return Math.abs(submitted - reference) / Math.abs(reference);
}

export function toleranceScore(
  relErr: number,
  tolerance: number,
  falloff: number = DEFAULT_FALLOFF_MULTIPLIER
): number {
  if (Number.isNaN(relErr)) return 0;
  if (relErr <= tolerance) return 1;
  const zeroAt = falloff * tolerance;
  if (relErr >= zeroAt) return 0;
  return (zeroAt - relErr) / (zeroAt - tolerance);
}

export function verifyNumeric(
  submitted: unknown,
  reference: number,
  tolerance: number,
  falloff: number = DEFAULT_FALLOFF_MULTIPLIER
): NumericCheck {
  if (!isFiniteNumber(submitted)) {
    return {
      score: 0,
      relative_error: null,
      error_kind: "ValidationError",
      message: submitted == null ? "No numeric answer submitted" : `Expected a finite number, received ${typeof submitted}`
    };
  }
  const relErr = relativeError(submitted, reference);
  const score = toleranceScore(relErr, tolerance, falloff);
  const pct = (relErr * 100).toFixed(2);
  return {
    score,
    relative_error: relErr,
    error_kind: null,
    message: score === 1 ? undefined : `Relative error ${pct}% exceeds ${(tolerance * 100).toFixed(2)}% tolerance`
  };
}
