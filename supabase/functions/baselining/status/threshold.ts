import type { Baseline, DeviationResult, DeviationStatus, Direction, DirectionalityPolicy } from "./types.ts";
import { StatusInputError } from "./errors.ts";

type Band = {
  status: DeviationStatus;
  matches: (z: number, optimal: number, warning: number) => boolean;
};

// Ordered bands per direction; the first match wins. Boundaries are sigma multiples.
const BANDS: Record<Direction, Band[]> = {
  lowerIsBetter: [
    { status: "optimal", matches: (z, _o, w) => z < -w },
    { status: "normal", matches: (z, o, w) => z >= -w && z <= o },
    { status: "warning", matches: (z, o, w) => z > o && z <= w },
    { status: "concerning", matches: (z, _o, w) => z > w },
  ],
  higherIsBetter: [
    { status: "optimal", matches: (z, _o, w) => z > w },
    { status: "normal", matches: (z, o, w) => z >= -o && z <= w },
    { status: "warning", matches: (z, o, w) => z >= -w && z < -o },
    { status: "concerning", matches: (z, _o, w) => z < -w },
  ],
  // optimal is not reachable without a preferred direction
  symmetric: [
    { status: "normal", matches: (z, o) => Math.abs(z) <= o },
    { status: "warning", matches: (z, o, w) => Math.abs(z) > o && Math.abs(z) <= w },
    { status: "concerning", matches: (z, _o, w) => Math.abs(z) > w },
  ],
};

export const DIRECTIONS: readonly Direction[] = ["lowerIsBetter", "higherIsBetter", "symmetric"];

export function isDirection(x: unknown): x is Direction {
  return typeof x === "string" && DIRECTIONS.some((d) => d === x);
}

export function validatePolicy(policy: DirectionalityPolicy): void {
  if (!isDirection(policy.direction)) {
    throw new StatusInputError(`unknown directionality policy: ${String(policy.direction)}`);
  }
  const { optimalBoundary: o, warningBoundary: w } = policy;
  if (!Number.isFinite(o) || !Number.isFinite(w) || o < 0 || w < o) {
    throw new StatusInputError(`invalid boundaries optimal=${o} warning=${w}; need 0 <= optimal <= warning`);
  }
}

export function zScore(currentValue: number, mean: number, stddev: number): number {
  return (currentValue - mean) / stddev;
}

/**
 * Classify a value against its baseline.
 *
 * Absent history (no mean, or a single sample with no stddev) is `no_baseline`.
 * Zero historical variance leaves no intermediate grade: equal is `normal`, any
 * difference is `concerning`. Only invalid input throws.
 */
export function evaluateDeviation(
  currentValue: number,
  baseline: Baseline,
  policy: DirectionalityPolicy,
): DeviationResult {
  validatePolicy(policy);
  if (!Number.isFinite(currentValue)) {
    throw new StatusInputError(`current value must be finite, got ${currentValue}`);
  }

  const { mean, stddev } = baseline;
  if (mean == null) return { status: "no_baseline", zScore: null };
  if (stddev == null) return { status: "no_baseline", zScore: null };
  if (stddev === 0) {
    return { status: currentValue === mean ? "normal" : "concerning", zScore: null };
  }

  const z = zScore(currentValue, mean, stddev);
  const band = BANDS[policy.direction].find((b) => b.matches(z, policy.optimalBoundary, policy.warningBoundary));
  if (!band) throw new Error(`no band matched z=${z} for ${policy.direction}`);
  return { status: band.status, zScore: z };
}

export function classifyDeviation(
  currentValue: number,
  baseline: Baseline,
  policy: DirectionalityPolicy,
): DeviationStatus {
  return evaluateDeviation(currentValue, baseline, policy).status;
}
