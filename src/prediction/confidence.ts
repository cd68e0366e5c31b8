import type { ConfidenceTier } from '../types/prediction.js';

/**
 * Tier thresholds on the declared side's probability. One set, used for
 * prediction cards and for the validation breakdown alike.
 */
export const CONFIDENCE_THRESHOLDS = {
  high: 0.7,
  medium: 0.6,
} as const;

/** Probability of whichever side is declared, clamped to [0.5, 1]. */
export function confidenceOf(probability: number): number {
  if (!Number.isFinite(probability)) return 0.5;
  const c = Math.max(probability, 1 - probability);
  return Math.min(1, Math.max(0.5, c));
}

export function confidenceTier(confidence: number): ConfidenceTier {
  if (confidence >= CONFIDENCE_THRESHOLDS.high) return 'high';
  if (confidence >= CONFIDENCE_THRESHOLDS.medium) return 'medium';
  return 'low';
}
