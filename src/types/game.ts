/** A game whose final score is known. */
export interface CompletedGame {
  homeTeam: string;
  awayTeam: string;
  homeScore: number;
  awayScore: number;
  /** ISO date string, e.g. '2024-01-15' */
  date: string;
}

export type ScoreboardStatus = 'final' | 'scheduled' | 'in_progress';

/** Game as read off the scoreboard feed, before any filtering. */
export interface ScoreboardGame {
  gameId: string;
  homeTeam: string;
  awayTeam: string;
  homeScore: number | null;
  awayScore: number | null;
  date: string;
  status: ScoreboardStatus;
}
