import type { CompletedGame } from './game.js';
import type { ConfidenceTier, OverUnderSide, Prediction, WinLossSide } from './prediction.js';

export interface ActualOutcome {
  winner: WinLossSide;
  total: number;
  overUnder: OverUnderSide;
}

export interface ValidationRecord {
  game: CompletedGame;
  prediction: Prediction;
  actual: ActualOutcome;
  winLossCorrect: boolean;
  overUnderCorrect: boolean;
  bothCorrect: boolean;
}

export interface SkippedGame {
  game: CompletedGame;
  error: { code: string; message: string };
}

export interface RunningAccuracyPoint {
  /** 1-based position in the evaluated sequence */
  game: number;
  date: string;
  winLoss: number;
  overUnder: number;
  both: number;
}

export interface TierAccuracy {
  games: number;
  winLossAccuracy: number | null;
  overUnderAccuracy: number | null;
}

export interface ValidationReport {
  totalGames: number;
  evaluatedGames: number;
  winLossAccuracy: number;
  overUnderAccuracy: number;
  bothCorrectRate: number;
  /** At least one of the two picks right */
  eitherCorrectRate: number;
  runningAccuracy: RunningAccuracyPoint[];
  byConfidenceTier: Record<ConfidenceTier, TierAccuracy>;
  records: ValidationRecord[];
  skipped: SkippedGame[];
  line: number;
  generatedAt: string;
}
