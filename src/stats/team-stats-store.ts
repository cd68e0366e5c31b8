import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { DataUnavailableError, TeamNotFoundError } from '../errors.js';
import type { SeasonId, TeamStatistics } from '../types/team.js';

export const REQUIRED_COLUMNS = [
  'TEAM_NAME',
  'SEASON',
  'WIN_PCT',
  'NET_RATING',
  'PTS',
  'OPP_PTS',
  'PACE',
] as const;

type Column = (typeof REQUIRED_COLUMNS)[number];

const csvRowsSchema = z.array(z.record(z.string()));

interface StatsIndex {
  source: string;
  /** season -> team name -> row */
  bySeason: Map<SeasonId, Map<string, TeamStatistics>>;
  latestSeason: SeasonId | null;
  rowCount: number;
}

function parseNumeric(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const trimmed = raw.trim();
  if (trimmed === '') return null;
  const n = Number(trimmed);
  return Number.isFinite(n) ? n : null;
}

function buildIndex(text: string, source: string): StatsIndex {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      bom: true,
      columns: true,
      skip_empty_lines: true,
      trim: true,
    });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DataUnavailableError(`Malformed statistics CSV: ${reason}`, source);
  }
  const rows = csvRowsSchema.parse(parsed);

  const first = rows[0];
  if (!first) {
    throw new DataUnavailableError('Statistics dataset has no rows', source);
  }

  const missing = REQUIRED_COLUMNS.filter((c) => !(c in first));
  if (missing.length) {
    throw new DataUnavailableError(
      `Statistics dataset missing columns: ${missing.join(', ')}`,
      source,
    );
  }

  const bySeason = new Map<SeasonId, Map<string, TeamStatistics>>();
  let latestSeason: SeasonId | null = null;

  for (const [i, row] of rows.entries()) {
    const cell = (c: Column): string => row[c] ?? '';
    const teamName = cell('TEAM_NAME');
    const season = cell('SEASON');
    // Header is line 1
    const line = i + 2;
    if (!teamName || !season) {
      throw new DataUnavailableError(`Row ${line} has no team name or season`, source);
    }

    let teams = bySeason.get(season);
    if (!teams) {
      teams = new Map();
      bySeason.set(season, teams);
    }
    if (teams.has(teamName)) {
      throw new DataUnavailableError(
        `Duplicate row for ${teamName} in season ${season} (line ${line})`,
        source,
      );
    }

    teams.set(teamName, {
      teamName,
      season,
      winPct: parseNumeric(row['WIN_PCT']),
      netRating: parseNumeric(row['NET_RATING']),
      ppg: parseNumeric(row['PTS']),
      oppPpg: parseNumeric(row['OPP_PTS']),
      pace: parseNumeric(row['PACE']),
    });

    if (latestSeason === null || season > latestSeason) latestSeason = season;
  }

  return { source, bySeason, latestSeason, rowCount: rows.length };
}

/**
 * Read-only view over the per-season team statistics dataset.
 *
 * A load parses into a fresh index and swaps it in whole, so a failed reload
 * leaves the previous data serving lookups.
 */
export class TeamStatsStore {
  private index: StatsIndex | null = null;

  async load(path: string): Promise<void> {
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new DataUnavailableError(`Cannot read statistics file: ${reason}`, path);
    }
    this.loadCsv(text, path);
  }

  loadCsv(text: string, source = 'inline'): void {
    this.index = buildIndex(text, source);
  }

  isLoaded(): boolean {
    return this.index !== null;
  }

  size(): number {
    return this.index?.rowCount ?? 0;
  }

  source(): string | null {
    return this.index?.source ?? null;
  }

  latestSeason(): SeasonId {
    const season = this.index?.latestSeason;
    if (!season) {
      throw new DataUnavailableError('Team statistics not loaded');
    }
    return season;
  }

  seasons(): SeasonId[] {
    return this.index ? [...this.index.bySeason.keys()].sort() : [];
  }

  /** Exact-name lookup. Name normalization belongs to whoever supplies the name. */
  lookup(teamName: string, season: SeasonId): TeamStatistics {
    if (!this.index) {
      throw new DataUnavailableError('Team statistics not loaded');
    }
    const row = this.index.bySeason.get(season)?.get(teamName);
    if (!row) throw new TeamNotFoundError(teamName, season);
    return row;
  }

  teams(season: SeasonId = this.latestSeason()): string[] {
    const teams = this.index?.bySeason.get(season);
    return teams ? [...teams.keys()].sort() : [];
  }
}
