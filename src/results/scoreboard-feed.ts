import { request } from 'undici';
import { z } from 'zod';
import type { TeamNameResolver } from '../pipeline/team-names.js';
import type { CompletedGame, ScoreboardGame, ScoreboardStatus } from '../types/game.js';
import type { Fixture } from '../types/prediction.js';
import { addDays } from '../utils/date.js';
import { logger } from '../utils/logger.js';

const competitorSchema = z.object({
  homeAway: z.enum(['home', 'away']),
  team: z.object({ displayName: z.string() }),
  score: z.string().optional(),
});

const statusSchema = z.object({
  type: z.object({
    name: z.string(),
    state: z.string().optional(),
    completed: z.boolean().optional(),
  }),
});

const eventSchema = z.object({
  id: z.string(),
  date: z.string().optional(),
  competitions: z.array(
    z.object({
      date: z.string().optional(),
      competitors: z.array(competitorSchema),
      status: statusSchema.optional(),
    }),
  ),
  status: statusSchema.optional(),
});

const scoreboardSchema = z.object({
  events: z.array(eventSchema).optional(),
});

type EspnStatus = z.infer<typeof statusSchema>;

export type FetchJson = (url: string) => Promise<unknown>;

function mapStatus(status: EspnStatus | undefined): ScoreboardStatus | null {
  if (!status) return null;
  const { name, state, completed } = status.type;
  if (name === 'STATUS_FINAL' || (completed === true && state === 'post')) return 'final';
  if (name === 'STATUS_SCHEDULED' || state === 'pre') return 'scheduled';
  if (name === 'STATUS_IN_PROGRESS' || name === 'STATUS_HALFTIME' || state === 'in') {
    return 'in_progress';
  }
  // Postponed, cancelled, suspended
  return null;
}

function parseScore(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const n = parseInt(raw, 10);
  return isNaN(n) ? null : n;
}

/**
 * Read games off an ESPN scoreboard response. Events without both sides or
 * with an unrecognised status are dropped.
 */
export function parseScoreboard(json: unknown, dateStr: string): ScoreboardGame[] {
  const parsed = scoreboardSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn({ date: dateStr, issues: parsed.error.issues.length }, 'Unexpected scoreboard shape');
    return [];
  }

  const games: ScoreboardGame[] = [];
  for (const event of parsed.data.events ?? []) {
    const comp = event.competitions[0];
    if (!comp) continue;

    const status = mapStatus(comp.status ?? event.status);
    if (!status) continue;

    const home = comp.competitors.find((c) => c.homeAway === 'home');
    const away = comp.competitors.find((c) => c.homeAway === 'away');
    if (!home || !away) continue;

    const rawDate = comp.date ?? event.date;
    games.push({
      gameId: event.id,
      homeTeam: home.team.displayName,
      awayTeam: away.team.displayName,
      homeScore: parseScore(home.score),
      awayScore: parseScore(away.score),
      date: rawDate ? rawDate.slice(0, 10) : dateStr,
      status,
    });
  }
  return games;
}

async function fetchJsonHttp(url: string): Promise<unknown> {
  const { statusCode, body } = await request(url, {
    method: 'GET',
    headers: { 'User-Agent': 'courtcast/1.0', Accept: 'application/json' },
    headersTimeout: 10000,
    bodyTimeout: 15000,
  });
  if (statusCode >= 400) {
    await body.dump();
    throw new Error(`Scoreboard request failed with HTTP ${statusCode}`);
  }
  return body.json();
}

export interface ScoreboardFeedOptions {
  baseUrl: string;
  resolver: TeamNameResolver;
  fetchJson?: FetchJson;
}

/**
 * Completed-game and upcoming-fixture source backed by the public ESPN
 * scoreboard. A day that fails to load is logged and left out.
 */
export class ScoreboardFeed {
  private readonly baseUrl: string;
  private readonly resolver: TeamNameResolver;
  private readonly fetchJson: FetchJson;

  constructor(options: ScoreboardFeedOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.resolver = options.resolver;
    this.fetchJson = options.fetchJson ?? fetchJsonHttp;
  }

  async fetchScoreboard(dateStr: string): Promise<ScoreboardGame[]> {
    const url = `${this.baseUrl}/scoreboard?dates=${dateStr.replace(/-/g, '')}`;
    const log = logger.child({ date: dateStr });

    let json: unknown;
    try {
      json = await this.fetchJson(url);
    } catch (err) {
      log.warn({ err, url }, 'Scoreboard fetch failed');
      return [];
    }

    const games = parseScoreboard(json, dateStr).map((g) => ({
      ...g,
      homeTeam: this.resolver.resolve(g.homeTeam),
      awayTeam: this.resolver.resolve(g.awayTeam),
    }));
    log.debug({ count: games.length }, 'Scoreboard fetched');
    return games;
  }

  /** Finals from the `daysBack` days before `today`, oldest first. */
  async fetchCompletedGames(daysBack: number, today: string): Promise<CompletedGame[]> {
    const completed: CompletedGame[] = [];
    for (let i = daysBack; i >= 1; i--) {
      const games = await this.fetchScoreboard(addDays(today, -i));
      for (const g of games) {
        if (g.status !== 'final' || g.homeScore === null || g.awayScore === null) continue;
        completed.push({
          homeTeam: g.homeTeam,
          awayTeam: g.awayTeam,
          homeScore: g.homeScore,
          awayScore: g.awayScore,
          date: g.date,
        });
      }
    }
    logger.info({ daysBack, count: completed.length }, 'Completed games fetched');
    return completed;
  }

  /** Scheduled games from `today` through the next `daysAhead` days. */
  async fetchUpcomingFixtures(daysAhead: number, today: string): Promise<Fixture[]> {
    const fixtures: Fixture[] = [];
    for (let i = 0; i <= daysAhead; i++) {
      const games = await this.fetchScoreboard(addDays(today, i));
      for (const g of games) {
        if (g.status === 'scheduled') fixtures.push({ homeTeam: g.homeTeam, awayTeam: g.awayTeam });
      }
    }
    logger.info({ daysAhead, count: fixtures.length }, 'Upcoming fixtures fetched');
    return fixtures;
  }

  /** Games under way on `date`, with the current score. */
  async fetchLiveGames(date: string): Promise<ScoreboardGame[]> {
    const games = await this.fetchScoreboard(date);
    return games.filter((g) => g.status === 'in_progress');
  }
}
