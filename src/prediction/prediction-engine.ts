import { winLossFeatures, overUnderFeatures, toOrderedValues } from '../features/feature-calculator.js';
import { ModelOutputInvalidError, ModelsNotLoadedError, isEngineError } from '../errors.js';
import { confidenceOf, confidenceTier } from './confidence.js';
import type { ModelRegistry } from '../models/model-registry.js';
import type { TeamStatsStore } from '../stats/team-stats-store.js';
import type { Classifier, FeatureScaler } from '../types/model.js';
import type { FeatureVector } from '../types/feature.js';
import type { Fixture, Prediction, PredictionOutcome } from '../types/prediction.js';

export interface PredictionEngineOptions {
  stats: TeamStatsStore;
  models: ModelRegistry;
  /** Total-points line for over/under predictions */
  overUnderLine: number;
  /** Clock for prediction timestamps */
  now?: () => Date;
}

/** Anything that turns a fixture into a prediction; the validation engine only needs this. */
export interface Predictor {
  readonly overUnderLine: number;
  predict(homeTeam: string, awayTeam: string): Prediction;
}

function positiveProbability(
  model: Classifier,
  scaler: FeatureScaler,
  vector: FeatureVector,
): number {
  const scaled = scaler.transform(toOrderedValues(vector, scaler.featureNames));
  const proba = model.predictProba(scaled);
  const p = proba[1];
  if (!Number.isFinite(p) || p < 0 || p > 1) {
    throw new ModelOutputInvalidError(
      `Classifier for ${vector.schema} returned probability ${String(p)}`,
    );
  }
  return p;
}

export class PredictionEngine implements Predictor {
  readonly overUnderLine: number;
  private readonly stats: TeamStatsStore;
  private readonly models: ModelRegistry;
  private readonly now: () => Date;

  constructor(options: PredictionEngineOptions) {
    this.stats = options.stats;
    this.models = options.models;
    this.overUnderLine = options.overUnderLine;
    this.now = options.now ?? (() => new Date());
  }

  predict(homeTeam: string, awayTeam: string): Prediction {
    // One snapshot for the whole call
    const models = this.models.models();
    if (!models) throw new ModelsNotLoadedError(this.models.missing());

    const season = this.stats.latestSeason();
    const home = this.stats.lookup(homeTeam, season);
    const away = this.stats.lookup(awayTeam, season);

    const wlVector = winLossFeatures(home, away);
    const ouVector = overUnderFeatures(home, away);

    const homeWinProbability = positiveProbability(models.winLossModel, models.winLossScaler, wlVector);
    const overProbability = positiveProbability(models.overUnderModel, models.overUnderScaler, ouVector);

    const wlConfidence = confidenceOf(homeWinProbability);
    const ouConfidence = confidenceOf(overProbability);

    return {
      matchup: { homeTeam, awayTeam },
      season,
      winLoss: {
        homeWinProbability,
        awayWinProbability: 1 - homeWinProbability,
        prediction: homeWinProbability > 0.5 ? 'HOME' : 'AWAY',
        confidence: wlConfidence,
        tier: confidenceTier(wlConfidence),
      },
      overUnder: {
        overProbability,
        underProbability: 1 - overProbability,
        prediction: overProbability > 0.5 ? 'OVER' : 'UNDER',
        confidence: ouConfidence,
        tier: confidenceTier(ouConfidence),
        line: this.overUnderLine,
      },
      features: { winLoss: wlVector, overUnder: ouVector },
      timestamp: this.now().toISOString(),
    };
  }

  /**
   * Predict each fixture independently. Results come back in input order,
   * one failed fixture never stops the rest.
   */
  predictBatch(fixtures: readonly Fixture[]): PredictionOutcome[] {
    return fixtures.map((fixture): PredictionOutcome => {
      try {
        return { ok: true, fixture, prediction: this.predict(fixture.homeTeam, fixture.awayTeam) };
      } catch (err) {
        if (isEngineError(err)) return { ok: false, fixture, error: err.toJSON() };
        const message = err instanceof Error ? err.message : String(err);
        return { ok: false, fixture, error: { code: 'INTERNAL_ERROR', message } };
      }
    });
  }
}
