/** Season identifier, e.g. '2023-24'. */
export type SeasonId = string;

/**
 * One row of the per-season team statistics dataset.
 * Numeric fields are null when the source cell was empty or non-numeric.
 */
export interface TeamStatistics {
  teamName: string;
  season: SeasonId;
  winPct: number | null;
  netRating: number | null;
  /** Points scored per game */
  ppg: number | null;
  /** Points allowed per game */
  oppPpg: number | null;
  pace: number | null;
}

export type StatField = 'winPct' | 'netRating' | 'ppg' | 'oppPpg' | 'pace';
