import { describe, it, expect } from 'vitest';
import { ModelRegistry } from '../../src/models/model-registry.js';
import { TeamStatsStore } from '../../src/stats/team-stats-store.js';
import {
  DataUnavailableError,
  FeatureUnavailableError,
  ModelOutputInvalidError,
  ModelsNotLoadedError,
  TeamNotFoundError,
} from '../../src/errors.js';
import { featureRecord } from '../../src/features/feature-calculator.js';
import { FIXED_NOW, StubClassifier, buildEngine, readyRegistry, stubModels } from '../helpers/engine.js';
import type { Prediction } from '../../src/types/prediction.js';

function expectInvariants(p: Prediction): void {
  expect(p.winLoss.homeWinProbability + p.winLoss.awayWinProbability).toBeCloseTo(1, 12);
  expect(p.overUnder.overProbability + p.overUnder.underProbability).toBeCloseTo(1, 12);
  for (const c of [p.winLoss.confidence, p.overUnder.confidence]) {
    expect(c).toBeGreaterThanOrEqual(0.5);
    expect(c).toBeLessThanOrEqual(1);
  }
  expect(p.winLoss.prediction).toBe(p.winLoss.homeWinProbability > 0.5 ? 'HOME' : 'AWAY');
  expect(p.overUnder.prediction).toBe(p.overUnder.overProbability > 0.5 ? 'OVER' : 'UNDER');
}

describe('PredictionEngine', () => {
  describe('predict', () => {
    it('should predict a matchup from the latest season', () => {
      const p = buildEngine().predict('Boston Celtics', 'Miami Heat');

      expect(p.matchup).toEqual({ homeTeam: 'Boston Celtics', awayTeam: 'Miami Heat' });
      expect(p.season).toBe('2023-24');
      expect(p.timestamp).toBe(FIXED_NOW.toISOString());

      // 0.5 + (0.78 - 0.56)
      expect(p.winLoss.homeWinProbability).toBeCloseTo(0.72, 10);
      expect(p.winLoss.prediction).toBe('HOME');
      expect(p.winLoss.confidence).toBeCloseTo(0.72, 10);
      expect(p.winLoss.tier).toBe('high');

      // 0.5 + (120.5 + 110 - 230) / 100
      expect(p.overUnder.overProbability).toBeCloseTo(0.505, 10);
      expect(p.overUnder.prediction).toBe('OVER');
      expect(p.overUnder.tier).toBe('low');
      expect(p.overUnder.line).toBe(235);

      expectInvariants(p);
    });

    it('should keep the feature vectors that produced the prediction', () => {
      const p = buildEngine().predict('Boston Celtics', 'Miami Heat');
      expect(featureRecord(p.features.overUnder)).toEqual({
        home_ppg: 120.5,
        away_ppg: 110,
        combined_ppg: 230.5,
        home_def_rating: 108.5,
        away_def_rating: 109,
        combined_def_rating: 217.5,
        pace_estimate: 96,
      });
      expect(p.features.winLoss.values.slice(3)).toEqual([11.5, 0.5, 11]);
    });

    it('should declare the away side when the home probability is below 0.5', () => {
      const p = buildEngine().predict('Miami Heat', 'Boston Celtics');
      expect(p.winLoss.prediction).toBe('AWAY');
      expect(p.winLoss.awayWinProbability).toBeCloseTo(0.72, 10);
      expect(p.winLoss.confidence).toBeCloseTo(0.72, 10);
      expectInvariants(p);
    });

    it('should declare AWAY and UNDER at exactly 0.5', () => {
      const models = readyRegistry({
        ...stubModels(),
        winLossModel: new StubClassifier(() => 0.5),
        overUnderModel: new StubClassifier(() => 0.5),
      });
      const p = buildEngine({ models }).predict('Boston Celtics', 'Miami Heat');
      expect(p.winLoss.prediction).toBe('AWAY');
      expect(p.overUnder.prediction).toBe('UNDER');
      expect(p.winLoss.confidence).toBe(0.5);
    });

    it('should use the configured over/under line', () => {
      const p = buildEngine({ overUnderLine: 228.5 }).predict('Denver Nuggets', 'Miami Heat');
      expect(p.overUnder.line).toBe(228.5);
    });

    it('should be deterministic for unchanged inputs', () => {
      const engine = buildEngine();
      expect(engine.predict('Denver Nuggets', 'Miami Heat')).toEqual(
        engine.predict('Denver Nuggets', 'Miami Heat'),
      );
    });

    it('should fail with TeamNotFound for an unknown team', () => {
      expect(() => buildEngine().predict('Unknown Team', 'Boston Celtics')).toThrowError(
        TeamNotFoundError,
      );
    });

    it('should fail with TeamNotFound for a team only present in an older season', () => {
      const stats = new TeamStatsStore();
      stats.loadCsv(
        [
          'TEAM_NAME,SEASON,WIN_PCT,NET_RATING,PTS,OPP_PTS,PACE',
          'Boston Celtics,2023-24,0.78,11.5,120.5,109,97',
          'Miami Heat,2022-23,0.53,-0.3,109.5,109.8,96.3',
        ].join('\n'),
      );
      expect(() => buildEngine({ stats }).predict('Boston Celtics', 'Miami Heat')).toThrowError(
        /Team "Miami Heat" not found for season 2023-24/,
      );
    });

    it('should fail with ModelsNotLoaded when no artifacts are loaded', () => {
      const models = new ModelRegistry();
      expect(() => buildEngine({ models }).predict('Boston Celtics', 'Miami Heat')).toThrowError(
        ModelsNotLoadedError,
      );
    });

    it('should name the missing artifacts', () => {
      expect(() => buildEngine({ models: new ModelRegistry() }).predict('Boston Celtics', 'Miami Heat')).toThrowError(
        'Models not loaded: winLossModel, overUnderModel, winLossScaler, overUnderScaler',
      );
    });

    it('should query each classifier once per prediction', () => {
      const winLossModel = new StubClassifier(() => 0.6);
      const overUnderModel = new StubClassifier(() => 0.4);
      const models = readyRegistry({ ...stubModels(), winLossModel, overUnderModel });
      buildEngine({ models }).predict('Boston Celtics', 'Miami Heat');
      expect(winLossModel.calls).toBe(1);
      expect(overUnderModel.calls).toBe(1);
    });

    it('should fail with DataUnavailable when statistics are not loaded', () => {
      const stats = new TeamStatsStore();
      expect(() => buildEngine({ stats }).predict('Boston Celtics', 'Miami Heat')).toThrowError(
        DataUnavailableError,
      );
    });

    it('should fail with FeatureUnavailable for a row with a missing stat', () => {
      expect(() => buildEngine().predict('Charlotte Hornets', 'Miami Heat')).toThrowError(
        FeatureUnavailableError,
      );
    });

    it('should reject a classifier probability outside [0, 1]', () => {
      // 0.5 + (0.70 - 0.17) > 1
      expect(() => buildEngine().predict('Denver Nuggets', 'Detroit Pistons')).toThrowError(
        ModelOutputInvalidError,
      );
    });
  });

  describe('predictBatch', () => {
    it('should return one outcome per fixture in input order', () => {
      const results = buildEngine().predictBatch([
        { homeTeam: 'Boston Celtics', awayTeam: 'Miami Heat' },
        { homeTeam: 'Unknown Team', awayTeam: 'Denver Nuggets' },
        { homeTeam: 'Denver Nuggets', awayTeam: 'Miami Heat' },
      ]);

      expect(results).toHaveLength(3);
      expect(results.map((r) => r.ok)).toEqual([true, false, true]);
      expect(results.map((r) => r.fixture.homeTeam)).toEqual([
        'Boston Celtics',
        'Unknown Team',
        'Denver Nuggets',
      ]);

      const failed = results[1];
      expect(failed).toEqual({
        ok: false,
        fixture: { homeTeam: 'Unknown Team', awayTeam: 'Denver Nuggets' },
        error: {
          code: 'TEAM_NOT_FOUND',
          message: 'Team "Unknown Team" not found for season 2023-24',
        },
      });
    });

    it('should match single predictions for successful fixtures', () => {
      const engine = buildEngine();
      const [first] = engine.predictBatch([{ homeTeam: 'Boston Celtics', awayTeam: 'Miami Heat' }]);
      expect(first?.ok && first.prediction).toEqual(engine.predict('Boston Celtics', 'Miami Heat'));
    });

    it('should report unexpected classifier failures per fixture', () => {
      const models = readyRegistry({
        ...stubModels(),
        overUnderModel: new StubClassifier(() => {
          throw new Error('boom');
        }),
      });
      const [result] = buildEngine({ models }).predictBatch([
        { homeTeam: 'Boston Celtics', awayTeam: 'Miami Heat' },
      ]);
      expect(result).toMatchObject({ ok: false, error: { code: 'INTERNAL_ERROR', message: 'boom' } });
    });

    it('should return an empty list for no fixtures', () => {
      expect(buildEngine().predictBatch([])).toEqual([]);
    });
  });
});
