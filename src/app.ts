import { config, type Config } from './config.js';
import { ModelRegistry } from './models/model-registry.js';
import { TeamNameResolver } from './pipeline/team-names.js';
import { PredictionEngine } from './prediction/prediction-engine.js';
import { ScoreboardFeed } from './results/scoreboard-feed.js';
import { TeamStatsStore } from './stats/team-stats-store.js';
import { todayDateString } from './utils/date.js';
import { logger } from './utils/logger.js';
import { ValidationEngine } from './validation/validation-engine.js';
import type { AppDeps } from './api/deps.js';

/**
 * Load statistics and model artifacts and wire the engine. Missing models or
 * statistics leave the service up in a degraded state: predictions fail with
 * MODELS_NOT_LOADED / DATA_UNAVAILABLE until the data is in place.
 */
export async function bootstrap(cfg: Config = config): Promise<AppDeps> {
  const stats = new TeamStatsStore();
  try {
    await stats.load(cfg.TEAM_STATS_PATH);
    logger.info(
      { path: cfg.TEAM_STATS_PATH, rows: stats.size(), latestSeason: stats.latestSeason() },
      'Team statistics loaded',
    );
  } catch (err) {
    logger.warn({ err, path: cfg.TEAM_STATS_PATH }, 'Team statistics unavailable');
  }

  const models = new ModelRegistry();
  const loadResult = await models.load(cfg.MODELS_DIR);
  if (!loadResult.ready) {
    logger.warn({ missing: models.missing() }, 'Models not ready, predictions disabled');
  }

  const engine = new PredictionEngine({ stats, models, overUnderLine: cfg.OVER_UNDER_LINE });
  const validator = new ValidationEngine(engine);
  const feed = new ScoreboardFeed({
    baseUrl: cfg.ESPN_BASE_URL,
    resolver: TeamNameResolver.fromFile(cfg.TEAM_ALIASES_PATH),
  });

  return { stats, models, engine, validator, feed, today: todayDateString };
}
