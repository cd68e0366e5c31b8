import { InsufficientDataError, isEngineError } from '../errors.js';
import { confidenceTier } from '../prediction/confidence.js';
import type { Predictor } from '../prediction/prediction-engine.js';
import type { CompletedGame } from '../types/game.js';
import type { ConfidenceTier, Prediction } from '../types/prediction.js';
import type {
  ActualOutcome,
  RunningAccuracyPoint,
  SkippedGame,
  TierAccuracy,
  ValidationRecord,
  ValidationReport,
} from '../types/validation.js';

/** Per-game failures that mark one game as skipped instead of ending the run. */
const PER_GAME_ERRORS = new Set(['TEAM_NOT_FOUND', 'FEATURE_UNAVAILABLE']);

/**
 * Pure grading: a tied final counts as an away winner and a total landing
 * exactly on the line counts as under.
 */
export function actualOutcome(game: CompletedGame, line: number): ActualOutcome {
  const total = game.homeScore + game.awayScore;
  return {
    winner: game.homeScore > game.awayScore ? 'HOME' : 'AWAY',
    total,
    overUnder: total > line ? 'OVER' : 'UNDER',
  };
}

export function gradePrediction(
  game: CompletedGame,
  prediction: Prediction,
  line: number,
): ValidationRecord {
  const actual = actualOutcome(game, line);
  const winLossCorrect = prediction.winLoss.prediction === actual.winner;
  const overUnderCorrect = prediction.overUnder.prediction === actual.overUnder;
  return {
    game,
    prediction,
    actual,
    winLossCorrect,
    overUnderCorrect,
    bothCorrect: winLossCorrect && overUnderCorrect,
  };
}

export function runningAccuracy(records: readonly ValidationRecord[]): RunningAccuracyPoint[] {
  let wl = 0;
  let ou = 0;
  let both = 0;
  return records.map((r, i) => {
    if (r.winLossCorrect) wl++;
    if (r.overUnderCorrect) ou++;
    if (r.bothCorrect) both++;
    const n = i + 1;
    return { game: n, date: r.game.date, winLoss: wl / n, overUnder: ou / n, both: both / n };
  });
}

/** Tier of the mean of the two confidences. */
export function recordTier(record: ValidationRecord): ConfidenceTier {
  const { winLoss, overUnder } = record.prediction;
  return confidenceTier((winLoss.confidence + overUnder.confidence) / 2);
}

export function accuracyByTier(
  records: readonly ValidationRecord[],
): Record<ConfidenceTier, TierAccuracy> {
  const summarize = (tier: ConfidenceTier): TierAccuracy => {
    const inTier = records.filter((r) => recordTier(r) === tier);
    if (!inTier.length) return { games: 0, winLossAccuracy: null, overUnderAccuracy: null };
    return {
      games: inTier.length,
      winLossAccuracy: inTier.filter((r) => r.winLossCorrect).length / inTier.length,
      overUnderAccuracy: inTier.filter((r) => r.overUnderCorrect).length / inTier.length,
    };
  };
  return { high: summarize('high'), medium: summarize('medium'), low: summarize('low') };
}

/**
 * Replays completed games through the predictor and scores the declared
 * sides against the final scores. Holds no state between runs.
 *
 * Only team names reach the predictor; final scores are used for grading
 * alone.
 */
export class ValidationEngine {
  constructor(
    private readonly predictor: Predictor,
    private readonly now: () => Date = () => new Date(),
  ) {}

  validate(games: readonly CompletedGame[]): ValidationReport {
    if (!games.length) {
      throw new InsufficientDataError('No completed games supplied for validation');
    }

    const line = this.predictor.overUnderLine;
    const records: ValidationRecord[] = [];
    const skipped: SkippedGame[] = [];

    for (const game of games) {
      let prediction: Prediction;
      try {
        prediction = this.predictor.predict(game.homeTeam, game.awayTeam);
      } catch (err) {
        if (isEngineError(err) && PER_GAME_ERRORS.has(err.code)) {
          skipped.push({ game, error: err.toJSON() });
          continue;
        }
        throw err;
      }
      records.push(gradePrediction(game, prediction, line));
    }

    const n = records.length;
    if (n === 0) {
      throw new InsufficientDataError(
        `None of the ${games.length} games could be predicted`,
      );
    }

    return {
      totalGames: games.length,
      evaluatedGames: n,
      winLossAccuracy: records.filter((r) => r.winLossCorrect).length / n,
      overUnderAccuracy: records.filter((r) => r.overUnderCorrect).length / n,
      bothCorrectRate: records.filter((r) => r.bothCorrect).length / n,
      eitherCorrectRate: records.filter((r) => r.winLossCorrect || r.overUnderCorrect).length / n,
      runningAccuracy: runningAccuracy(records),
      byConfidenceTier: accuracyByTier(records),
      records,
      skipped,
      line,
      generatedAt: this.now().toISOString(),
    };
  }
}
