import { OVER_UNDER_FEATURES, WIN_LOSS_FEATURES } from '../../src/features/feature-calculator.js';
import { ModelRegistry } from '../../src/models/model-registry.js';
import { StandardScaler } from '../../src/models/standard-scaler.js';
import { PredictionEngine } from '../../src/prediction/prediction-engine.js';
import { TeamStatsStore } from '../../src/stats/team-stats-store.js';
import type { Classifier, ModelSet } from '../../src/types/model.js';
import { loadFixture } from './fixture-loader.js';

export const FIXED_NOW = new Date('2024-03-01T12:00:00.000Z');

/** Positive-class probability computed from the already-scaled row. */
export class StubClassifier implements Classifier {
  calls = 0;

  constructor(private readonly score: (features: readonly number[]) => number) {}

  predictProba(features: readonly number[]): readonly [number, number] {
    this.calls++;
    const p = this.score(features);
    return [1 - p, p];
  }
}

export function identityScaler(names: readonly string[]): StandardScaler {
  return new StandardScaler(
    names,
    names.map(() => 0),
    names.map(() => 1),
  );
}

/**
 * Win/loss: 0.5 + win_pct_diff. Over/under: 0.5 + (combined_ppg - 230) / 100.
 * Both read straight off the identity-scaled features.
 */
export function stubModels(): ModelSet {
  return {
    winLossModel: new StubClassifier((x) => 0.5 + (x[2] ?? 0)),
    overUnderModel: new StubClassifier((x) => 0.5 + ((x[2] ?? 0) - 230) / 100),
    winLossScaler: identityScaler(WIN_LOSS_FEATURES),
    overUnderScaler: identityScaler(OVER_UNDER_FEATURES),
  };
}

export function loadedStats(): TeamStatsStore {
  const stats = new TeamStatsStore();
  stats.loadCsv(loadFixture('teams.csv'), 'teams.csv');
  return stats;
}

export function readyRegistry(models: ModelSet = stubModels()): ModelRegistry {
  const registry = new ModelRegistry();
  registry.use(models);
  return registry;
}

export function buildEngine(
  overrides: { stats?: TeamStatsStore; models?: ModelRegistry; overUnderLine?: number } = {},
): PredictionEngine {
  return new PredictionEngine({
    stats: overrides.stats ?? loadedStats(),
    models: overrides.models ?? readyRegistry(),
    overUnderLine: overrides.overUnderLine ?? 235,
    now: () => FIXED_NOW,
  });
}
