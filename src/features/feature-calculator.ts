import { FeatureUnavailableError } from '../errors.js';
import type { FeatureSchemaName, FeatureVector } from '../types/feature.js';
import type { StatField, TeamStatistics } from '../types/team.js';

/**
 * Feature orders the classifiers and scalers were fitted on.
 * Scaler artifacts must list exactly these names, in this order.
 */
export const WIN_LOSS_FEATURES = [
  'home_win_pct',
  'away_win_pct',
  'win_pct_diff',
  'home_net_rating',
  'away_net_rating',
  'net_rating_diff',
] as const;

export const OVER_UNDER_FEATURES = [
  'home_ppg',
  'away_ppg',
  'combined_ppg',
  'home_def_rating',
  'away_def_rating',
  'combined_def_rating',
  'pace_estimate',
] as const;

export const FEATURE_SCHEMAS: Record<FeatureSchemaName, readonly string[]> = {
  win_loss: WIN_LOSS_FEATURES,
  over_under: OVER_UNDER_FEATURES,
};

type WinLossFeatureName = (typeof WIN_LOSS_FEATURES)[number];
type OverUnderFeatureName = (typeof OVER_UNDER_FEATURES)[number];

function stat(team: TeamStatistics, field: StatField): number {
  const value = team[field];
  if (value === null || !Number.isFinite(value)) {
    throw new FeatureUnavailableError(team.teamName, field);
  }
  return value;
}

function toVector<N extends string>(
  schema: FeatureSchemaName,
  names: readonly N[],
  values: Record<N, number>,
): FeatureVector {
  return { schema, names, values: names.map((n) => values[n]) };
}

export function winLossFeatures(home: TeamStatistics, away: TeamStatistics): FeatureVector {
  const homeWinPct = stat(home, 'winPct');
  const awayWinPct = stat(away, 'winPct');
  const homeNet = stat(home, 'netRating');
  const awayNet = stat(away, 'netRating');

  const values: Record<WinLossFeatureName, number> = {
    home_win_pct: homeWinPct,
    away_win_pct: awayWinPct,
    win_pct_diff: homeWinPct - awayWinPct,
    home_net_rating: homeNet,
    away_net_rating: awayNet,
    net_rating_diff: homeNet - awayNet,
  };
  return toVector('win_loss', WIN_LOSS_FEATURES, values);
}

/**
 * A side's defensive rating is what its opponent allows: home_def_rating is
 * the away team's OPP_PTS and away_def_rating the home team's.
 */
export function overUnderFeatures(home: TeamStatistics, away: TeamStatistics): FeatureVector {
  const homePpg = stat(home, 'ppg');
  const awayPpg = stat(away, 'ppg');
  const homeOpp = stat(home, 'oppPpg');
  const awayOpp = stat(away, 'oppPpg');
  const homePace = stat(home, 'pace');
  const awayPace = stat(away, 'pace');

  const values: Record<OverUnderFeatureName, number> = {
    home_ppg: homePpg,
    away_ppg: awayPpg,
    combined_ppg: homePpg + awayPpg,
    home_def_rating: awayOpp,
    away_def_rating: homeOpp,
    combined_def_rating: homeOpp + awayOpp,
    pace_estimate: (homePace + awayPace) / 2,
  };
  return toVector('over_under', OVER_UNDER_FEATURES, values);
}

/** Keyed view of a vector, for display and audit. */
export function featureRecord(vector: FeatureVector): Record<string, number> {
  const out: Record<string, number> = {};
  vector.names.forEach((name, i) => {
    const v = vector.values[i];
    if (v !== undefined) out[name] = v;
  });
  return out;
}

/**
 * Values of `vector` in `order`. Fails when `order` names a feature the
 * vector does not carry, so a scaler fitted on another schema cannot be fed.
 */
export function toOrderedValues(vector: FeatureVector, order: readonly string[]): number[] {
  const byName = featureRecord(vector);
  return order.map((name) => {
    const v = byName[name];
    if (v === undefined) throw new FeatureUnavailableError(vector.schema, name);
    return v;
  });
}
