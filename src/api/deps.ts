import type { ModelRegistry } from '../models/model-registry.js';
import type { PredictionEngine } from '../prediction/prediction-engine.js';
import type { ScoreboardFeed } from '../results/scoreboard-feed.js';
import type { TeamStatsStore } from '../stats/team-stats-store.js';
import type { ValidationEngine } from '../validation/validation-engine.js';

/** Everything the routes read, built once at startup and passed in. */
export type AppDeps = {
  stats: TeamStatsStore;
  models: ModelRegistry;
  engine: PredictionEngine;
  validator: ValidationEngine;
  feed: ScoreboardFeed;
  /** Today's date as YYYY-MM-DD */
  today: () => string;
};
