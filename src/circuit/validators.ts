import { NoiseErrors } from "../utils/errorCatalog";

// Sums may overshoot 1 by float rounding (0.1 + 0.2 + 0.7).
const SUM_TOLERANCE = 1e-12;

export function checkProbability(label: string, value: number): number {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw NoiseErrors.numericOutOfRange(label, value, "[0, 1]");
  }
  return value;
}

export function checkPositive(label: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw NoiseErrors.numericOutOfRange(label, value, "(0, inf)");
  }
  return value;
}

export function checkNonNegative(label: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw NoiseErrors.numericOutOfRange(label, value, "[0, inf)");
  }
  return value;
}

export function checkProbabilitySum(entries: Record<string, number>): void {
  const labels = Object.keys(entries);
  const total = labels.reduce((acc, k) => acc + entries[k], 0);
  if (total > 1 + SUM_TOLERANCE) throw NoiseErrors.probabilitySum(labels, total);
}

export function checkSeed(seed: number | undefined): number | undefined {
  if (seed === undefined) return undefined;
  if (!Number.isInteger(seed) || seed < 0) {
    throw NoiseErrors.numericOutOfRange("seed", seed, "non-negative integers");
  }
  return seed;
}
