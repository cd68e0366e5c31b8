import type { FeatureVector } from './feature.js';
import type { SeasonId } from './team.js';

export type WinLossSide = 'HOME' | 'AWAY';
export type OverUnderSide = 'OVER' | 'UNDER';
export type ConfidenceTier = 'high' | 'medium' | 'low';

export interface Fixture {
  homeTeam: string;
  awayTeam: string;
}

export interface WinLossResult {
  homeWinProbability: number;
  awayWinProbability: number;
  prediction: WinLossSide;
  /** Probability of the declared side, always in [0.5, 1] */
  confidence: number;
  tier: ConfidenceTier;
}

export interface OverUnderResult {
  overProbability: number;
  underProbability: number;
  prediction: OverUnderSide;
  confidence: number;
  tier: ConfidenceTier;
  /** Total-points line the prediction was made against */
  line: number;
}

export interface Prediction {
  matchup: Fixture;
  season: SeasonId;
  winLoss: WinLossResult;
  overUnder: OverUnderResult;
  /** Feature values that produced this prediction, kept for auditing. */
  features: {
    winLoss: FeatureVector;
    overUnder: FeatureVector;
  };
  /** ISO timestamp */
  timestamp: string;
}

export type PredictionOutcome =
  | { ok: true; fixture: Fixture; prediction: Prediction }
  | { ok: false; fixture: Fixture; error: { code: string; message: string } };
