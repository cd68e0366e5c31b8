import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { isSeasonActive, seasonForDate } from '../../utils/date.js';
import type { AppDeps } from '../deps.js';

const teamsQuery = z.object({ season: z.string().optional() });

export const healthRoutes: FastifyPluginAsync<AppDeps> = async (app, { stats, models }) => {
  app.get('/health', async () => {
    const modelsReady = models.isReady();
    const statsLoaded = stats.isLoaded();
    const now = new Date();
    return {
      status: modelsReady && statsLoaded ? 'healthy' : 'degraded',
      timestamp: now.toISOString(),
      currentSeason: seasonForDate(now),
      seasonActive: isSeasonActive(now),
      latestSeason: statsLoaded ? stats.latestSeason() : null,
      services: {
        models: modelsReady ? 'up' : 'down',
        teamStats: statsLoaded ? 'up' : 'down',
      },
    };
  });

  // Lets a consumer choose between live predictions and a demo view
  app.get('/models/status', async () => models.status());

  app.get('/teams', async (request) => {
    const { season } = teamsQuery.parse(request.query);
    const resolved = season ?? stats.latestSeason();
    const teams = stats.teams(resolved);
    return { season: resolved, data: teams, count: teams.length };
  });
};
