import type { Normalization } from "../types/config.js";

export type Normalizer = (rewards: readonly number[], logBase: number) => number[];

/**
 * Scores for a set with no spread (max == min, or stddev == 0):
 * 0 for every item when the shared reward is 0, 1 otherwise.
 */
function flatScores(rewards: readonly number[]): number[] {
  const fill = rewards[0] === 0 ? 0 : 1;
  return rewards.map(() => fill);
}

function minMax(rewards: readonly number[]): number[] {
  if (rewards.length === 0) return [];
  const min = Math.min(...rewards);
  const max = Math.max(...rewards);
  if (max === min) return flatScores(rewards);
  if (Number.isFinite(max - min)) {
    return rewards.map((r) => (r - min) / (max - min));
  }
  // span wider than the float range: halving is exact and brings it back
  const span = max / 2 - min / 2;
  return rewards.map((r) => (r / 2 - min / 2) / span);
}

function logNorm(rewards: readonly number[], logBase: number): number[] {
  const denom = Math.log(logBase);
  return rewards.map((r) => (Math.sign(r) * Math.log1p(Math.abs(r))) / denom);
}

/** z-scores, or null when the mean or variance leaves the float range. */
function zScores(rewards: readonly number[]): number[] | null {
  const mean = rewards.reduce((acc, r) => acc + r, 0) / rewards.length;
  const variance = rewards.reduce((acc, r) => acc + (r - mean) ** 2, 0) / rewards.length;
  const std = Math.sqrt(variance);
  if (!Number.isFinite(std)) return null;
  if (std === 0) return flatScores(rewards);
  return rewards.map((r) => (r - mean) / std);
}

function standard(rewards: readonly number[]): number[] {
  if (rewards.length === 0) return [];
  const direct = zScores(rewards);
  if (direct) return direct;
  // z-scores do not change under scaling; rewards within [-1, 1] cannot overflow
  const scale = Math.max(...rewards.map((r) => Math.abs(r)));
  return zScores(rewards.map((r) => r / scale)) ?? flatScores(rewards);
}

export const NORMALIZERS: Record<Normalization, Normalizer> = {
  naive: (rewards) => [...rewards],
  "min-max": minMax,
  log: logNorm,
  standard,
};
