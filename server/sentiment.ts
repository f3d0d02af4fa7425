import type { SentimentLabel, Stance } from "./types/signals";

export type ToxicityLabel = "low" | "medium" | "high";

export function clampScore(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(-1, Math.min(1, value));
}

export function sentimentLabel(score: number): SentimentLabel {
  if (score >= 0.7) return "Strongly Positive";
  if (score >= 0.3) return "Positive";
  if (score > -0.3) return "Neutral";
  if (score > -0.7) return "Negative";
  return "Strongly Negative";
}

export function toxicityLabel(toxicity: number): ToxicityLabel {
  if (toxicity >= 0.7) return "high";
  if (toxicity >= 0.4) return "medium";
  return "low";
}

export function stanceFor(score: number): Stance {
  if (score >= 0.3) return "support";
  if (score <= -0.3) return "oppose";
  return "neutral";
}

/** Engagement weight: a comment with 500 likes counts six times as much as one with none. */
export function engagementWeight(likeCount: number): number {
  return 1 + Math.max(0, likeCount) / 100;
}

export interface Weighted {
  value: number;
  weight: number;
}

/**
 * Weighted mean of scores. Falls back to the simple average when the weights
 * sum to zero, and returns 0 for an empty set.
 */
export function weightedMean(items: readonly Weighted[]): number {
  if (items.length === 0) return 0;

  const totalWeight = items.reduce((sum, item) => sum + item.weight, 0);
  if (totalWeight <= 0) {
    return items.reduce((sum, item) => sum + item.value, 0) / items.length;
  }

  return items.reduce((sum, item) => sum + item.value * item.weight, 0) / totalWeight;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function stddev(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  return Math.sqrt(mean(values.map((v) => (v - m) ** 2)));
}

/** Smallest and largest value, both 0 for an empty list. */
export function extent(values: readonly number[]): { min: number; max: number } {
  if (values.length === 0) return { min: 0, max: 0 };
  return values.reduce(
    (acc, v) => ({ min: Math.min(acc.min, v), max: Math.max(acc.max, v) }),
    { min: Infinity, max: -Infinity }
  );
}

export function round(value: number, digits = 4): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
