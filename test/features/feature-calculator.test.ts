import { describe, it, expect } from 'vitest';
import {
  OVER_UNDER_FEATURES,
  WIN_LOSS_FEATURES,
  featureRecord,
  overUnderFeatures,
  toOrderedValues,
  winLossFeatures,
} from '../../src/features/feature-calculator.js';
import { FeatureUnavailableError } from '../../src/errors.js';
import type { TeamStatistics } from '../../src/types/team.js';

const home: TeamStatistics = {
  teamName: 'Home Team',
  season: '2023-24',
  winPct: 0.75,
  netRating: 8,
  ppg: 120,
  oppPpg: 110,
  pace: 100,
};

const away: TeamStatistics = {
  teamName: 'Away Team',
  season: '2023-24',
  winPct: 0.5,
  netRating: -2,
  ppg: 112,
  oppPpg: 114,
  pace: 96,
};

describe('winLossFeatures', () => {
  it('should compute the six features in schema order', () => {
    const vector = winLossFeatures(home, away);
    expect(vector.schema).toBe('win_loss');
    expect(vector.names).toEqual(WIN_LOSS_FEATURES);
    expect(vector.values).toEqual([0.75, 0.5, 0.25, 8, -2, 10]);
  });

  it('should fail when a required stat is missing', () => {
    expect(() => winLossFeatures(home, { ...away, netRating: null })).toThrowError(
      FeatureUnavailableError,
    );
    expect(() => winLossFeatures({ ...home, winPct: Number.NaN }, away)).toThrowError(
      /"winPct" unavailable for Home Team/,
    );
  });
});

describe('overUnderFeatures', () => {
  it('should compute the seven features in schema order', () => {
    const vector = overUnderFeatures(home, away);
    expect(vector.schema).toBe('over_under');
    expect(vector.names).toEqual(OVER_UNDER_FEATURES);
    expect(vector.values).toEqual([120, 112, 232, 114, 110, 224, 98]);
  });

  // Intentional: a side's defensive rating is what its opponent gives up
  it('should take home_def_rating from the away team and away_def_rating from the home team', () => {
    const features = featureRecord(overUnderFeatures(home, away));
    expect(features['home_def_rating']).toBe(away.oppPpg);
    expect(features['away_def_rating']).toBe(home.oppPpg);
  });

  it('should fail when pace is missing', () => {
    expect(() => overUnderFeatures(home, { ...away, pace: null })).toThrowError(
      /"pace" unavailable for Away Team/,
    );
  });

  it('should be deterministic', () => {
    expect(overUnderFeatures(home, away)).toEqual(overUnderFeatures(home, away));
  });
});

describe('toOrderedValues', () => {
  it('should reorder values to the requested order', () => {
    const vector = winLossFeatures(home, away);
    expect(toOrderedValues(vector, ['net_rating_diff', 'home_win_pct'])).toEqual([10, 0.75]);
  });

  it('should fail when the order names a feature from another schema', () => {
    const vector = winLossFeatures(home, away);
    expect(() => toOrderedValues(vector, ['home_ppg'])).toThrowError(FeatureUnavailableError);
  });
});
